import * as cheerio from 'cheerio';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ComponentConfigSchema } from '../../config/schema.js';
import type { RenderSession, RenderSessionFactory } from '../../infrastructure/playwright/browser.js';
import type { TargetConfig } from '../../types/index.js';
import { RenderError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';

export const NOW = new Date('2025-03-10T14:05:00.000Z');
export const NOW_ISO = NOW.toISOString();

export function quietLogger(): Logger {
  return new Logger('ERROR');
}

export const PDP_URL = 'https://shop.test/pdp';
export const HOME_URL = 'https://shop.test/';
export const SETUP_URL = 'https://shop.test/product/1';

export const PDP_HTML = '<html><body><main id="pdp"><h1>Zapatilla</h1></main></body></html>';
export const HOME_HTML =
  '<html><body><section data-testid="recs"><h2 class="carousel-title">Lo más vendido</h2></section></body></html>';

/**
 * One target: "Cross Sell" missing on PDP, both carousel strategies failing on HOME
 */
export function scenarioTargets(name = 'CL'): TargetConfig[] {
  return ComponentConfigSchema.parse({
    [name]: {
      setup_product_url: SETUP_URL,
      PDP: {
        url_example: PDP_URL,
        components: [{ name: 'Cross Sell', identifier_type: 'id', identifier_value: 'cross-sell' }],
      },
      HOME: {
        url_example: HOME_URL,
        components: [
          {
            name: 'Purchased With Recently Purchased',
            identifier_type: 'data-testid',
            identifier_value: 'recs',
            carousel_strategies: [
              { strategy_name: 'Strategy 1', text_pattern: 'Comprados juntos', container_class: 'carousel-title' },
              { strategy_name: 'Strategy 2', text_pattern: 'Vistos recientemente', container_class: 'carousel-title' },
            ],
          },
        ],
      },
    },
  });
}

export interface FakeSessionOptions {
  /** Targets whose session cannot be opened */
  failOpen?: string[];
  /** Render delay per target, in ms */
  delays?: Record<string, number>;
}

/**
 * Render sessions serving fixed HTML by URL; unknown URLs fail to render
 */
export class FakeSessions implements RenderSessionFactory {
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  readonly primed: string[] = [];
  readonly rendered: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly pages: Record<string, string> = { [PDP_URL]: PDP_HTML, [HOME_URL]: HOME_HTML },
    private readonly options: FakeSessionOptions = {}
  ) {}

  async open(target: string): Promise<RenderSession> {
    if (this.options.failOpen?.includes(target)) {
      throw new Error(`cannot launch browser for ${target}`);
    }
    this.opened.push(target);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    const delay = this.options.delays?.[target] ?? 0;
    return {
      prime: async (url: string) => {
        this.primed.push(url);
      },
      render: async (url: string) => {
        if (delay > 0) {
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
        this.rendered.push(url);
        const html = this.pages[url];
        if (html === undefined) {
          throw new RenderError(url, `net::ERR_NAME_NOT_RESOLVED at ${url}`);
        }
        return cheerio.load(html);
      },
      close: async () => {
        this.active -= 1;
        this.closed.push(target);
      },
    };
  }
}

export function tempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'sentinel-'));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}
