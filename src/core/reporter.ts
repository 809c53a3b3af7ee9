/**
 * Digest reporter: latest stored run report -> recency window -> digest -> webhook
 */

import type { AlertStore } from '../infrastructure/storage/json-store.js';
import type { DigestConfig, StoredRunReport, TargetStatus } from '../types/index.js';
import { ConfigError, NotFoundError, NotifyError, StorageError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { buildDigest, filterByRecency } from './digest.js';
import { isSuccessStatus, type Notifier } from './notifier.js';

export interface DigestSendResult {
  status: 'sent';
  statusCode: number;
}

export interface TargetSummary {
  target: string;
  totalAlerts: number;
  status: TargetStatus;
  timestamp: string;
}

export type ReportSummary = Omit<StoredRunReport, 'results'> & { results: TargetSummary[] };

/**
 * Latest report with per-target summaries instead of page details
 */
export function summarizeReport(report: StoredRunReport): ReportSummary {
  return {
    ...report,
    results: report.results.map((result) => ({
      target: result.target,
      totalAlerts: result.alertsCount,
      status: result.status,
      timestamp: result.timestamp,
    })),
  };
}

export class DigestReporter {
  private readonly logger: Logger;

  constructor(
    private readonly store: AlertStore | null,
    private readonly notifier: Notifier | null,
    private readonly config: DigestConfig,
    logger: Logger
  ) {
    this.logger = logger.child('digest');
  }

  async latestReport(): Promise<StoredRunReport> {
    if (!this.store) {
      throw new StorageError('Storage is not available');
    }
    const report = await this.store.latestRunReport();
    if (!report) {
      throw new NotFoundError('No run reports found');
    }
    return report;
  }

  /**
   * Digest text for the latest report's recency window
   */
  async compose(now: Date = new Date()): Promise<string> {
    const report = await this.latestReport();
    const results = report.results ?? [];
    const recent = filterByRecency(results, this.config.windowHours, now);
    this.logger.info(`${recent.length}/${results.length} target results inside the ${this.config.windowHours}h window`);
    return buildDigest(recent, { windowHours: this.config.windowHours, timeZone: this.config.timeZone, now });
  }

  /**
   * Build and post the digest; delivery failures are raised to the caller, never retried
   */
  async send(now: Date = new Date()): Promise<DigestSendResult> {
    if (!this.notifier) {
      throw new ConfigError('TEAMS_WEBHOOK_URL not configured');
    }

    const message = await this.compose(now);
    const statusCode = await this.notifier.send(message);
    if (!isSuccessStatus(statusCode)) {
      throw new NotifyError(`Webhook responded with status ${statusCode}`, statusCode);
    }

    this.logger.info('Digest sent');
    return { status: 'sent', statusCode };
  }
}
