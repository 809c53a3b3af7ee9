/**
 * Component matcher
 * Locates configured components in a rendered document and runs their text strategies
 */

import type { CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { MatchError } from '../utils/errors.js';
import { partialMatch, strippedText } from '../utils/text.js';
import type { ComponentSpec, MatchResult, StrategyOutcome, StrategySpec } from '../types/index.js';

/**
 * Equivalent marker attributes for identifierType "attribute"
 */
export const TEST_ID_ATTRIBUTES = ['data-testid', 'data-test-id'] as const;

/**
 * Matched element with the label it is reported under
 */
export interface LabeledElement {
  label: string;
  element: Element;
}

/**
 * Check presence of a component and, when found, its strategies
 */
export function checkComponent($: CheerioAPI, spec: ComponentSpec): MatchResult {
  let elements: Element[];
  try {
    elements = locateElements($, spec);
  } catch (error) {
    if (error instanceof MatchError) {
      return { componentName: spec.name, found: false, details: null, diagnostic: error.message };
    }
    throw error;
  }

  if (elements.length === 0) {
    const result: MatchResult = { componentName: spec.name, found: false, details: null };
    // Only id lookups report a diagnostic
    if (spec.identifierType === 'id') {
      result.diagnostic = `Element #${spec.identifierValue} not found in the HTML`;
    }
    return result;
  }

  if (!spec.strategies) {
    return { componentName: spec.name, found: true, details: null };
  }

  const prefix = spec.strategyKind === 'carousel' ? 'carousel' : 'el';
  return {
    componentName: spec.name,
    found: true,
    details: {
      labels: labelElements(elements, prefix).map((item) => item.label),
      // foundIn always uses the "el-N" fallback, whatever the component kind
      strategies: findStrategiesInElements(labelElements(elements, 'el'), spec.strategies),
    },
  };
}

/**
 * Elements matching the component identifier, in document order
 */
export function locateElements($: CheerioAPI, spec: ComponentSpec): Element[] {
  const value = spec.identifierValue;
  if (value.trim().length === 0) {
    throw new MatchError(spec.name, `Component '${spec.name}' has an empty identifier value`);
  }

  const all = $('*').toArray().filter(isTag);

  switch (spec.identifierType) {
    case 'attribute': {
      const element = all.find((el) => TEST_ID_ATTRIBUTES.some((attr) => el.attribs[attr] === value));
      return element ? [element] : [];
    }
    case 'class': {
      const tokens = splitClasses(value);
      return all.filter((el) => hasAllClasses(el, tokens));
    }
    case 'id': {
      const element = all.find((el) => el.attribs.id === value);
      return element ? [element] : [];
    }
  }
}

/**
 * Element id, or a 1-indexed positional fallback such as "el-2"
 */
export function labelElements(elements: Element[], prefix: 'el' | 'carousel'): LabeledElement[] {
  return elements.map((element, idx) => ({
    label: element.attribs.id || `${prefix}-${idx + 1}`,
    element,
  }));
}

/**
 * Search strategies across matched elements; the first satisfying element wins
 */
export function findStrategiesInElements(
  elements: LabeledElement[],
  strategies: StrategySpec[]
): StrategyOutcome {
  const outcome: StrategyOutcome = {
    strategiesFound: {},
    strategiesDetails: {},
    potentialMatches: {},
  };

  for (const strategy of strategies) {
    outcome.strategiesFound[strategy.strategyName] = false;
    outcome.strategiesDetails[strategy.strategyName] = { foundIn: [] };
    outcome.potentialMatches[strategy.strategyName] = [];
  }

  for (const { label, element } of elements) {
    for (const strategy of strategies) {
      const name = strategy.strategyName;
      if (outcome.strategiesFound[name]) continue;

      for (const scope of searchScopes(element, strategy.containerClass)) {
        const text = strippedText(scope);
        if (partialMatch(text, strategy.textPattern)) {
          outcome.strategiesFound[name] = true;
          outcome.strategiesDetails[name].foundIn.push(label);
          break;
        }
        outcome.potentialMatches[name].push(text);
      }
    }
  }

  return outcome;
}

function searchScopes(element: Element, containerClass: string | undefined): Element[] {
  const tokens = containerClass ? splitClasses(containerClass) : [];
  if (tokens.length === 0) {
    return [element];
  }
  return descendants(element).filter((el) => hasAllClasses(el, tokens));
}

function descendants(element: Element): Element[] {
  const found: Element[] = [];
  for (const child of element.children) {
    if (isTag(child)) {
      found.push(child, ...descendants(child));
    }
  }
  return found;
}

function splitClasses(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

export function hasAllClasses(element: Element, tokens: string[]): boolean {
  if (tokens.length === 0) return false;
  const classes = new Set(splitClasses(element.attribs.class ?? ''));
  return tokens.every((token) => classes.has(token));
}
