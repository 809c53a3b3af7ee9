import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import type { ComponentSpec } from '../../types/index.js';
import { checkComponent, hasAllClasses, labelElements, locateElements } from '../matcher.js';

const CAROUSELS = `
  <div class="carousel" id="first"><h3 class="title">Ofertas</h3></div>
  <div class="carousel"><h3 class="title">Comprados juntos</h3></div>
  <div class="carousel"><h3 class="title">Comprados juntos</h3></div>
`;

describe('locateElements', () => {
  it('requires every class token on the element', () => {
    const $ = cheerio.load('<div class="a b">x</div>');

    const spec = (value: string): ComponentSpec => ({ name: 'Box', identifierType: 'class', identifierValue: value });
    expect(locateElements($, spec('a c'))).toHaveLength(0);
    expect(locateElements($, spec('b a'))).toHaveLength(1);
  });

  it('returns every element carrying the classes, in document order', () => {
    const $ = cheerio.load(CAROUSELS);
    const found = locateElements($, { name: 'Carousel', identifierType: 'class', identifierValue: 'carousel' });

    expect(found.map((el) => el.attribs.id ?? null)).toEqual(['first', null, null]);
  });

  it('accepts either test id attribute', () => {
    const $ = cheerio.load('<section data-test-id="recs">a</section><aside data-testid="cart">b</aside>');

    expect(locateElements($, { name: 'Recs', identifierType: 'attribute', identifierValue: 'recs' })).toHaveLength(1);
    expect(locateElements($, { name: 'Cart', identifierType: 'attribute', identifierValue: 'cart' })).toHaveLength(1);
  });
});

describe('checkComponent', () => {
  it('reports a diagnostic only for id lookups', () => {
    const $ = cheerio.load('<p>nothing here</p>');

    const byId = checkComponent($, { name: 'Cross Sell', identifierType: 'id', identifierValue: 'cross-sell' });
    expect(byId).toEqual({
      componentName: 'Cross Sell',
      found: false,
      details: null,
      diagnostic: 'Element #cross-sell not found in the HTML',
    });

    const byClass = checkComponent($, { name: 'Banner', identifierType: 'class', identifierValue: 'hero' });
    expect(byClass.found).toBe(false);
    expect(byClass.diagnostic).toBeUndefined();
  });

  it('treats an empty identifier as an absent component', () => {
    const $ = cheerio.load('<p>x</p>');
    const result = checkComponent($, { name: 'Broken', identifierType: 'class', identifierValue: '  ' });

    expect(result.found).toBe(false);
    expect(result.diagnostic).toBe("Component 'Broken' has an empty identifier value");
  });

  it('has no details when no strategies are declared', () => {
    const $ = cheerio.load('<div id="cross-sell">x</div>');

    expect(checkComponent($, { name: 'Cross Sell', identifierType: 'id', identifierValue: 'cross-sell' })).toEqual({
      componentName: 'Cross Sell',
      found: true,
      details: null,
    });
  });

  it('stops a strategy at the first element that satisfies it', () => {
    const $ = cheerio.load(CAROUSELS);
    const result = checkComponent($, {
      name: 'Carousel',
      identifierType: 'class',
      identifierValue: 'carousel',
      strategyKind: 'carousel',
      strategies: [{ strategyName: 'Strategy 1', textPattern: 'comprados juntos', containerClass: 'title' }],
    });

    expect(result.details?.labels).toEqual(['first', 'carousel-2', 'carousel-3']);
    expect(result.details?.strategies).toEqual({
      strategiesFound: { 'Strategy 1': true },
      strategiesDetails: { 'Strategy 1': { foundIn: ['el-2'] } },
      potentialMatches: { 'Strategy 1': ['Ofertas'] },
    });
  });

  it('searches the element itself when no container class is given', () => {
    const $ = cheerio.load('<div data-testid="cart-recs"><h4>Completa tu compra</h4></div>');
    const result = checkComponent($, {
      name: 'Cart Recommendations',
      identifierType: 'attribute',
      identifierValue: 'cart-recs',
      strategyKind: 'text',
      strategies: [
        { strategyName: 'Complete', textPattern: 'completa tu compra' },
        { strategyName: 'Others', textPattern: 'otros clientes' },
      ],
    });

    expect(result.details).toEqual({
      labels: ['el-1'],
      strategies: {
        strategiesFound: { Complete: true, Others: false },
        strategiesDetails: { Complete: { foundIn: ['el-1'] }, Others: { foundIn: [] } },
        potentialMatches: { Complete: [], Others: ['Completa tu compra'] },
      },
    });
  });

  it('ignores text that only appears inside scripts and styles', () => {
    const $ = cheerio.load(
      '<div data-testid="recs">' +
        '<script type="application/ld+json">{"name":"Comprados juntos"}</script>' +
        '<style>.comprados-juntos { color: red; }</style>' +
        '<h2>Ofertas</h2>' +
        '</div>'
    );
    const result = checkComponent($, {
      name: 'Recs',
      identifierType: 'attribute',
      identifierValue: 'recs',
      strategyKind: 'text',
      strategies: [
        { strategyName: 'Bundle', textPattern: 'comprados juntos' },
        { strategyName: 'Color', textPattern: 'color' },
      ],
    });

    expect(result.details?.strategies).toEqual({
      strategiesFound: { Bundle: false, Color: false },
      strategiesDetails: { Bundle: { foundIn: [] }, Color: { foundIn: [] } },
      potentialMatches: { Bundle: ['Ofertas'], Color: ['Ofertas'] },
    });
  });

  it('collects no candidates when no container matches', () => {
    const $ = cheerio.load('<div data-testid="recs"><h2 class="heading">Ofertas</h2></div>');
    const result = checkComponent($, {
      name: 'Recs',
      identifierType: 'attribute',
      identifierValue: 'recs',
      strategyKind: 'carousel',
      strategies: [{ strategyName: 'Strategy 1', textPattern: 'Ofertas', containerClass: 'carousel-title' }],
    });

    expect(result.details?.strategies.strategiesFound).toEqual({ 'Strategy 1': false });
    expect(result.details?.strategies.potentialMatches).toEqual({ 'Strategy 1': [] });
  });
});

describe('labelElements', () => {
  it('prefers the element id over the positional label', () => {
    const $ = cheerio.load('<i id="one"></i><i></i>');
    const labels = labelElements($('i').toArray(), 'el').map((item) => item.label);

    expect(labels).toEqual(['one', 'el-2']);
  });
});

describe('hasAllClasses', () => {
  it('never matches an empty token list', () => {
    const $ = cheerio.load('<div class="a"></div>');
    const [div] = $('div').toArray();

    expect(hasAllClasses(div, [])).toBe(false);
    expect(hasAllClasses(div, ['a'])).toBe(true);
  });
});
