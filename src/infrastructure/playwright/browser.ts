/**
 * Playwright render sessions
 * Each crawl job owns one session (browser, context, page) for its whole lifetime
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { BrowserConfig } from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';
import { RenderError, toError } from '../../utils/errors.js';

const LAUNCH_ARGS = ['--no-sandbox', '--ignore-certificate-errors', '--disable-dev-shm-usage'];

const POPOVER_SELECTOR = '[data-testid="coachmark-popover"]';
const POPOVER_BUTTON_SELECTOR = '[data-testid="popover-button"]';
const ADD_TO_CART_SELECTOR = 'button#add-to-cart-button, button#testId-btn-add-to-cart';

/**
 * Rendering collaborator used by crawl jobs
 */
export interface RenderSession {
  /** Navigate a setup product and add it to the cart so later pages render with a session */
  prime(setupUrl: string): Promise<void>;
  render(url: string): Promise<CheerioAPI>;
  close(): Promise<void>;
}

export interface RenderSessionFactory {
  open(target: string): Promise<RenderSession>;
}

/**
 * Script scrolling to the bottom in steps so lazy content loads
 */
function scrollToBottomScript(stepPx: number, intervalMs: number): string {
  return `new Promise((resolve) => {
    let total = 0;
    const timer = setInterval(() => {
      const height = document.body.scrollHeight;
      window.scrollBy(0, ${stepPx});
      total += ${stepPx};
      if (total >= height) {
        clearInterval(timer);
        resolve(undefined);
      }
    }, ${intervalMs});
  })`;
}

export class PlaywrightRenderSession implements RenderSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private config: BrowserConfig,
    private logger: Logger
  ) {}

  /**
   * Get the session page, launching browser and context on first use
   */
  private async getPage(): Promise<Page> {
    if (this.page && !this.page.isClosed()) {
      return this.page;
    }

    let browser = this.browser;
    if (!browser || !browser.isConnected()) {
      browser = await chromium.launch({ headless: this.config.headless, args: LAUNCH_ARGS });
      this.browser = browser;
      this.context = null;
      this.logger.debug('Browser launched');
    }

    let context = this.context;
    if (!context) {
      context = await browser.newContext({
        ignoreHTTPSErrors: true,
        userAgent: this.config.userAgent,
        ...(this.config.viewport ? { viewport: this.config.viewport } : {}),
      });
      context.setDefaultNavigationTimeout(this.config.timeoutMs);
      context.setDefaultTimeout(this.config.timeoutMs);
      this.context = context;
    }

    const page = await context.newPage();
    this.page = page;
    return page;
  }

  async prime(setupUrl: string): Promise<void> {
    const page = await this.getPage();
    this.logger.info(`Priming session with setup product: ${setupUrl}`);

    try {
      await page.goto(setupUrl, { waitUntil: 'domcontentloaded', timeout: this.config.timeoutMs });
    } catch (error) {
      throw new RenderError(setupUrl, `Setup navigation failed: ${toError(error).message}`, { cause: error });
    }

    try {
      const popover = await page.$(POPOVER_SELECTOR);
      const button = popover ? await popover.$(POPOVER_BUTTON_SELECTOR) : null;
      if (button) {
        await button.click();
        await page.waitForTimeout(1000);
      } else {
        this.logger.debug('No coachmark popover to dismiss');
      }
    } catch (error) {
      this.logger.warn(`Popover dismissal failed: ${toError(error).message}`);
    }

    try {
      const addToCart = await page.waitForSelector(ADD_TO_CART_SELECTOR, { state: 'visible', timeout: 6000 });
      await addToCart.click();
      await page.waitForTimeout(3000);
      this.logger.info('Setup product added to cart');
    } catch (error) {
      this.logger.warn(`Add to cart failed: ${toError(error).message}`);
    }
  }

  async render(url: string): Promise<CheerioAPI> {
    const page = await this.getPage();

    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.timeoutMs });
    } catch (error) {
      throw new RenderError(url, `Navigation to ${url} failed: ${toError(error).message}`, { cause: error });
    }

    await this.scrollPage(page);

    try {
      return cheerio.load(await page.content());
    } catch (error) {
      throw new RenderError(url, `Could not read content of ${url}: ${toError(error).message}`, { cause: error });
    }
  }

  /**
   * Scroll down to trigger lazy loading, then back to the top
   */
  private async scrollPage(page: Page): Promise<void> {
    try {
      await page.evaluate(scrollToBottomScript(this.config.scrollStepPx, this.config.scrollIntervalMs));
      await page.waitForTimeout(1000);
      await page.evaluate('window.scrollTo(0, 0)');
      await page.waitForTimeout(this.config.settleMs);
    } catch (error) {
      this.logger.warn(`Scrolling failed: ${toError(error).message}`);
    }
  }

  /**
   * Close browser resources
   */
  async close(): Promise<void> {
    const { page, context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;

    const steps: Array<[string, () => Promise<void>]> = [];
    if (page) steps.push(['page', () => page.close({ runBeforeUnload: false })]);
    if (context) steps.push(['context', () => context.close()]);
    if (browser) steps.push(['browser', () => browser.close()]);

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        this.logger.debug(`Closing ${name} failed: ${toError(error).message}`);
      }
    }
  }
}

export class PlaywrightSessionFactory implements RenderSessionFactory {
  constructor(
    private config: BrowserConfig,
    private logger: Logger
  ) {}

  async open(target: string): Promise<RenderSession> {
    return new PlaywrightRenderSession(this.config, this.logger.child(target));
  }
}

/**
 * Create a render session factory backed by Playwright chromium
 */
export function createSessionFactory(config: BrowserConfig, logger: Logger): RenderSessionFactory {
  return new PlaywrightSessionFactory(config, logger);
}
