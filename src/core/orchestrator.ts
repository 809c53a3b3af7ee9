/**
 * Crawl orchestrator
 * Runs one crawl job per target in a bounded pool and aggregates the run report
 */

import PQueue from 'p-queue';
import type { RenderSessionFactory } from '../infrastructure/playwright/browser.js';
import type { AlertStore } from '../infrastructure/storage/json-store.js';
import type { Alert, RunReport, TargetConfig, TargetResult } from '../types/index.js';
import { JobError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { TargetCrawlJob, type CrawlJobOutcome } from './crawl-job.js';

export interface OrchestratorOptions {
  sessions: RenderSessionFactory;
  store?: AlertStore | null;
  logger: Logger;
  /** Pool size; defaults to one worker per target */
  maxWorkers?: number;
  alertOnPageError?: boolean;
  now?: () => Date;
}

/**
 * "<minutes>m <seconds>s", both truncated toward zero
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  const minutes = Math.trunc(totalSeconds / 60);
  const seconds = Math.trunc(totalSeconds % 60);
  return `${minutes}m ${seconds}s`;
}

export class CrawlOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly collected: Alert[] = [];
  readonly maxWorkers: number;

  constructor(
    private readonly targets: TargetConfig[],
    private readonly options: OrchestratorOptions
  ) {
    this.logger = options.logger.child('orchestrator');
    this.now = options.now ?? (() => new Date());
    this.maxWorkers = options.maxWorkers ?? Math.max(1, targets.length);

    this.logger.info(`Targets: ${targets.map((t) => t.target).join(', ') || 'none'}`);
    this.logger.info(`Parallel workers: ${this.maxWorkers}`);
    this.logger.info(`Storage: ${options.store ? options.store.location : 'in memory only'}`);
  }

  /**
   * Alerts emitted by jobs of the runs so far
   */
  get alerts(): readonly Alert[] {
    return this.collected;
  }

  async run(): Promise<RunReport> {
    const startTime = this.now();
    const queue = new PQueue({ concurrency: this.maxWorkers });
    // Completion order; re-sorted by configuration position below
    const completed: Array<{ index: number; result: TargetResult }> = [];

    const joins = this.targets.map((target, index) =>
      queue
        .add(() => this.createJob(target).run())
        .then(
          (outcome) =>
            outcome ? outcome : this.failedOutcome(target, new JobError(target.target, 'Job produced no result')),
          (error: unknown) => this.failedOutcome(target, error)
        )
        .then((outcome) => {
          this.collected.push(...outcome.alerts);
          completed.push({ index, result: outcome.result });
        })
    );

    await Promise.all(joins);
    const endTime = this.now();

    const results = completed.sort((a, b) => a.index - b.index).map((entry) => entry.result);
    const report: RunReport = {
      executionTime: formatDuration(endTime.getTime() - startTime.getTime()),
      startTime: startTime.toISOString(),
      endTime: endTime.toISOString(),
      totalTargets: this.targets.length,
      successful: results.filter((r) => r.status === 'success').length,
      failed: results.filter((r) => r.status === 'failed').length,
      totalAlerts: results.reduce((sum, r) => sum + r.alertsCount, 0),
      results,
    };

    this.printSummary(report);
    return report;
  }

  private createJob(target: TargetConfig): TargetCrawlJob {
    return new TargetCrawlJob(target, {
      sessions: this.options.sessions,
      store: this.options.store,
      logger: this.options.logger,
      alertOnPageError: this.options.alertOnPageError,
      now: this.now,
    });
  }

  private failedOutcome(target: TargetConfig, error: unknown): CrawlJobOutcome {
    const message = toError(error).message;
    this.logger.error(`Job for ${target.target} escaped its boundary: ${message}`);
    return {
      result: {
        target: target.target,
        status: 'failed',
        alertsCount: 0,
        error: message,
        timestamp: this.now().toISOString(),
      },
      alerts: [],
    };
  }

  private printSummary(report: RunReport): void {
    this.logger.info(`Total time: ${report.executionTime}`);
    this.logger.info(`Successful targets: ${report.successful}/${report.totalTargets}`);
    this.logger.info(`Failed targets: ${report.failed}/${report.totalTargets}`);
    this.logger.info(`Alerts generated: ${report.totalAlerts}`);
  }
}
