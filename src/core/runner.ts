/**
 * Crawl runner: guards against overlapping runs, executes the orchestrator and persists the report
 */

import type { AlertStore } from '../infrastructure/storage/json-store.js';
import type { RunReport } from '../types/index.js';
import { StorageError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CrawlOrchestrator } from './orchestrator.js';
import { RunStateTracker, type RunStateSnapshot } from './run-state.js';

export interface CrawlRunnerOptions {
  createOrchestrator: () => CrawlOrchestrator;
  store?: AlertStore | null;
  logger: Logger;
  state?: RunStateTracker;
}

export class CrawlRunner {
  readonly state: RunStateTracker;
  private readonly logger: Logger;
  private current: Promise<RunReport> | null = null;

  constructor(private readonly options: CrawlRunnerOptions) {
    this.state = options.state ?? new RunStateTracker();
    this.logger = options.logger.child('runner');
  }

  status(): RunStateSnapshot {
    return this.state.snapshot();
  }

  /**
   * Start a run in the background; throws ConflictError while one is active
   */
  trigger(): RunStateSnapshot {
    const snapshot = this.state.begin();
    this.current = this.execute();
    void this.current.catch((error: unknown) => {
      this.logger.error('Background crawl failed', error);
    });
    return snapshot;
  }

  /**
   * Run to completion; throws ConflictError while another run is active
   */
  async runNow(): Promise<RunReport> {
    this.state.begin();
    this.current = this.execute();
    return this.current;
  }

  /**
   * Settles when the active run (if any) finishes
   */
  async idle(): Promise<void> {
    if (!this.current) return;
    try {
      await this.current;
    } catch (error) {
      this.logger.debug(`Awaited run ended with error: ${toError(error).message}`);
    }
  }

  private async execute(): Promise<RunReport> {
    try {
      const report = await this.options.createOrchestrator().run();
      await this.persist(report);
      this.state.succeed(report);
      return report;
    } catch (err) {
      const error = toError(err);
      this.state.fail(error.message);
      throw error;
    }
  }

  private async persist(report: RunReport): Promise<void> {
    const store = this.options.store;
    if (!store) {
      this.logger.warn('Storage unavailable, run report kept in memory only');
      return;
    }
    try {
      const stored = await store.insertRunReport(report);
      this.logger.info(`Run report ${stored.id} saved`);
    } catch (err) {
      const error = err instanceof StorageError ? err : new StorageError(toError(err).message, { cause: err });
      this.logger.error('Saving run report failed', error);
    }
  }
}
