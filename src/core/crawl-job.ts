/**
 * Target crawl job
 * Renders every page type of one target, checks its components and turns misses into alerts
 */

import type { CheerioAPI } from 'cheerio';
import type { RenderSession, RenderSessionFactory } from '../infrastructure/playwright/browser.js';
import type { AlertStore } from '../infrastructure/storage/json-store.js';
import type { Alert, MatchResult, PageCheck, PageResult, PageSpec, TargetConfig, TargetResult } from '../types/index.js';
import { JobError, StorageError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { truncate } from '../utils/text.js';
import { checkComponent } from './matcher.js';

/**
 * Candidate texts quoted in a rename alert, and their display length
 */
const SAMPLE_CANDIDATES = 3;
const SAMPLE_LENGTH = 80;

export interface CrawlJobOptions {
  sessions: RenderSessionFactory;
  store?: AlertStore | null;
  logger: Logger;
  alertOnPageError?: boolean;
  now?: () => Date;
}

/**
 * Outcome of one job; alerts travel beside the result, never through shared state
 */
export interface CrawlJobOutcome {
  result: TargetResult;
  alerts: Alert[];
}

export class TargetCrawlJob {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly target: TargetConfig,
    private readonly options: CrawlJobOptions
  ) {
    this.logger = options.logger.child(target.target);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the job; failures are returned as a failed result, never thrown
   */
  async run(): Promise<CrawlJobOutcome> {
    this.logger.info(`Starting job for ${this.target.target}`);

    try {
      return await this.crawl();
    } catch (err) {
      const error = new JobError(this.target.target, toError(err).message, { cause: err });
      this.logger.error(`Job failed for ${this.target.target}`, error);
      return {
        result: {
          target: this.target.target,
          status: 'failed',
          alertsCount: 0,
          error: error.message,
          timestamp: this.now().toISOString(),
        },
        alerts: [],
      };
    }
  }

  private async crawl(): Promise<CrawlJobOutcome> {
    const session = await this.options.sessions.open(this.target.target);
    const pages: PageResult[] = [];
    const alerts: Alert[] = [];

    try {
      let primed = false;

      for (const page of this.target.pages) {
        if (!page.url) {
          this.logger.warn(`No URL configured for ${this.target.target}/${page.pageType}, skipping`);
          continue;
        }

        if (!primed && (this.target.setupProductUrl || page.setupRequired)) {
          primed = true;
          await this.prime(session, page);
        }

        const result = await this.checkPage(session, page, page.url);
        pages.push(result);
        alerts.push(...this.toAlerts(result));
      }

      await this.persist(alerts);
    } finally {
      await session.close();
    }

    this.logger.info(`Job completed for ${this.target.target}: ${alerts.length} alerts`);

    return {
      result: {
        target: this.target.target,
        status: 'success',
        alertsCount: alerts.length,
        pages,
        timestamp: this.now().toISOString(),
      },
      alerts,
    };
  }

  private async prime(session: RenderSession, page: PageSpec): Promise<void> {
    const setupUrl = this.target.setupProductUrl;
    if (!setupUrl) {
      this.logger.warn(`${page.pageType} requires setup but no setup_product_url is configured`);
      return;
    }

    const reason = page.setupRequired ? `required by ${page.pageType}` : 'target setup URL';
    try {
      await session.prime(setupUrl);
      this.logger.info(`Session primed (${reason})`);
    } catch (error) {
      this.logger.warn(`Session setup failed, continuing without it: ${toError(error).message}`);
    }
  }

  private async checkPage(session: RenderSession, page: PageSpec, url: string): Promise<PageResult> {
    this.logger.info(`Checking ${page.pageType}: ${url}`);

    let document: CheerioAPI;
    try {
      document = await session.render(url);
    } catch (error) {
      const message = toError(error).message;
      this.logger.error(`Render failed for ${page.pageType}: ${message}`);
      return {
        status: 'error',
        pageType: page.pageType,
        url,
        timestamp: this.now().toISOString(),
        error: message,
      };
    }

    const components = page.components.map((component) => checkComponent(document, component));
    components.forEach((result) => this.report(result));

    return {
      status: 'ok',
      pageType: page.pageType,
      url,
      timestamp: this.now().toISOString(),
      components,
    };
  }

  private report(result: MatchResult): void {
    if (result.diagnostic) {
      this.logger.warn(result.diagnostic);
    }
    this.logger.info(`${result.found ? 'FOUND' : 'NOT FOUND'}: ${result.componentName}`);

    const strategies = result.details?.strategies;
    if (!strategies) return;

    for (const [name, found] of Object.entries(strategies.strategiesFound)) {
      const foundIn = strategies.strategiesDetails[name]?.foundIn ?? [];
      if (found) {
        this.logger.info(`  + ${name}${foundIn.length > 0 ? ` (in ${foundIn.join(', ')})` : ''}`);
      } else {
        this.logger.info(`  - ${name}: not found`);
      }
    }
  }

  private toAlerts(page: PageResult): Alert[] {
    if (page.status === 'error') {
      if (!this.options.alertOnPageError) return [];
      return [
        {
          date: page.timestamp,
          target: this.target.target,
          pageType: page.pageType,
          component: 'N/A',
          status: 'ERROR',
          message: page.error,
        },
      ];
    }
    return buildAlerts(this.target.target, page);
  }

  private async persist(alerts: Alert[]): Promise<void> {
    const store = this.options.store;
    if (alerts.length === 0) {
      this.logger.info('No alerts to store');
      return;
    }
    if (!store) {
      this.logger.warn(`Storage unavailable, ${alerts.length} alerts kept in memory only`);
      return;
    }

    try {
      await store.insertAlerts(alerts);
      this.logger.info(`${alerts.length} alerts stored`);
    } catch (err) {
      const error = err instanceof StorageError ? err : new StorageError(toError(err).message, { cause: err });
      this.logger.error('Storing alerts failed, keeping them in memory', error);
    }
  }
}

/**
 * Alerts for one checked page, in component then strategy declaration order
 */
export function buildAlerts(target: string, page: PageCheck): Alert[] {
  const alerts: Alert[] = [];

  for (const component of page.components) {
    if (!component.found) {
      alerts.push({
        date: page.timestamp,
        target,
        pageType: page.pageType,
        component: component.componentName,
        status: 'MISSING_COMPONENT',
        message: `Componente '${component.componentName}' no encontrado en ${page.pageType}`,
      });
      continue;
    }

    const strategies = component.details?.strategies;
    if (!strategies) continue;

    for (const [name, found] of Object.entries(strategies.strategiesFound)) {
      if (found) continue;

      alerts.push({
        date: page.timestamp,
        target,
        pageType: page.pageType,
        component: `${component.componentName} - ${name}`,
        status: 'MISSING_COMPONENT',
        message: strategyMessage(component.componentName, name, strategies.potentialMatches[name] ?? []),
      });
    }
  }

  return alerts;
}

function strategyMessage(component: string, strategy: string, candidates: string[]): string {
  if (candidates.length === 0) {
    return `Estrategia '${strategy}' no encontrada en componente '${component}'`;
  }
  const sample = candidates
    .slice(0, SAMPLE_CANDIDATES)
    .map((candidate) => truncate(candidate, SAMPLE_LENGTH))
    .join('; ');
  return `Se encontraron títulos diferentes para '${strategy}': ${sample}. Revisar posible cambio de nombre.`;
}
