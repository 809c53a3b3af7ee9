/**
 * Alert store: JSON file-based persistence for alerts and run reports
 */

import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import type {
  Alert,
  AlertFilter,
  AlertPage,
  AlertStats,
  GroupCount,
  RunReport,
  StoredAlert,
  StoredRunReport,
} from '../../types/index.js';
import { StorageError, toError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

const ALERTS_FILE = 'alerts.json';
const REPORTS_FILE = 'reports.json';
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Persistence collaborator: written by crawls, read by the API and digest
 */
export interface AlertStore {
  readonly location: string;

  insertAlerts(batch: Alert[]): Promise<StoredAlert[]>;
  listAlerts(filter: AlertFilter, page: number, limit: number): Promise<AlertPage>;
  getAlert(id: string): Promise<StoredAlert | null>;
  getStats(): Promise<AlertStats>;
  deleteAllAlerts(): Promise<number>;

  insertRunReport(report: RunReport): Promise<StoredRunReport>;
  latestRunReport(): Promise<StoredRunReport | null>;
}

export class JsonAlertStore implements AlertStore {
  private readonly alertsPath: string;
  private readonly reportsPath: string;

  constructor(
    readonly location: string,
    private logger?: Logger
  ) {
    try {
      if (!existsSync(location)) {
        mkdirSync(location, { recursive: true });
      }
    } catch (error) {
      throw new StorageError(`Cannot create storage directory ${location}: ${toError(error).message}`, {
        cause: error,
      });
    }
    this.alertsPath = join(location, ALERTS_FILE);
    this.reportsPath = join(location, REPORTS_FILE);
  }

  private readJson<T>(path: string): T[] {
    if (!existsSync(path)) return [];
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (!Array.isArray(parsed)) {
        throw new StorageError(`${path} does not contain a JSON array`);
      }
      return parsed;
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Cannot read ${path}: ${toError(error).message}`, { cause: error });
    }
  }

  private writeJson<T>(path: string, data: T[]): void {
    try {
      writeFileSync(path, JSON.stringify(data, null, 2), 'utf-8');
    } catch (error) {
      throw new StorageError(`Cannot write ${path}: ${toError(error).message}`, { cause: error });
    }
  }

  async insertAlerts(batch: Alert[]): Promise<StoredAlert[]> {
    if (batch.length === 0) return [];

    const stored = batch.map((alert) => ({ ...alert, id: randomUUID() }));
    const alerts = this.readJson<StoredAlert>(this.alertsPath);
    alerts.push(...stored);
    this.writeJson(this.alertsPath, alerts);

    this.logger?.debug(`${stored.length} alerts stored`);
    return stored;
  }

  /**
   * Filtered alerts, newest first, one page at a time
   */
  async listAlerts(filter: AlertFilter, page: number, limit: number): Promise<AlertPage> {
    const matches = this.readJson<StoredAlert>(this.alertsPath)
      .filter(this.buildPredicate(filter))
      .sort((a, b) => (Date.parse(b.date) || 0) - (Date.parse(a.date) || 0));

    const skip = (page - 1) * limit;
    return {
      total: matches.length,
      page,
      limit,
      pages: Math.max(1, Math.ceil(matches.length / limit)),
      alerts: matches.slice(skip, skip + limit),
    };
  }

  private buildPredicate(filter: AlertFilter): (alert: StoredAlert) => boolean {
    const start = this.parseBoundary('startDate', filter.startDate);
    const endDay = this.parseBoundary('endDate', filter.endDate);
    // The end date includes its whole day
    const end = endDay === null ? null : endDay + DAY_MS;

    return (alert) => {
      if (filter.target && alert.target !== filter.target) return false;
      if (filter.pageType && alert.pageType !== filter.pageType) return false;
      if (filter.status && alert.status !== filter.status) return false;
      if (start !== null || end !== null) {
        const time = Date.parse(alert.date);
        if (Number.isNaN(time)) return false;
        if (start !== null && time < start) return false;
        if (end !== null && time >= end) return false;
      }
      return true;
    };
  }

  private parseBoundary(name: string, value: string | undefined): number | null {
    if (!value) return null;
    const time = Date.parse(value);
    if (Number.isNaN(time)) {
      this.logger?.warn(`Ignoring invalid ${name}: ${value}`);
      return null;
    }
    return time;
  }

  async getAlert(id: string): Promise<StoredAlert | null> {
    return this.readJson<StoredAlert>(this.alertsPath).find((alert) => alert.id === id) ?? null;
  }

  async getStats(): Promise<AlertStats> {
    const alerts = this.readJson<StoredAlert>(this.alertsPath);
    return {
      total: alerts.length,
      byTarget: countBy(alerts, (alert) => alert.target),
      byPageType: countBy(alerts, (alert) => alert.pageType),
      byStatus: countBy(alerts, (alert) => alert.status),
    };
  }

  async deleteAllAlerts(): Promise<number> {
    const count = this.readJson<StoredAlert>(this.alertsPath).length;
    this.writeJson<StoredAlert>(this.alertsPath, []);
    return count;
  }

  async insertRunReport(report: RunReport): Promise<StoredRunReport> {
    const stored: StoredRunReport = { ...report, id: randomUUID(), savedAt: new Date().toISOString() };
    const reports = this.readJson<StoredRunReport>(this.reportsPath);
    reports.push(stored);
    this.writeJson(this.reportsPath, reports);
    return stored;
  }

  async latestRunReport(): Promise<StoredRunReport | null> {
    const reports = this.readJson<StoredRunReport>(this.reportsPath);
    let latest: StoredRunReport | null = null;
    for (const report of reports) {
      if (!latest || report.savedAt >= latest.savedAt) {
        latest = report;
      }
    }
    return latest;
  }
}

function countBy<T>(items: T[], key: (item: T) => string): GroupCount[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    const value = key(item);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts, ([value, count]) => ({ key: value, count }));
}

/**
 * Open the JSON store, or null when the directory is unusable
 */
export function createAlertStore(dir: string, logger: Logger): AlertStore | null {
  try {
    return new JsonAlertStore(dir, logger);
  } catch (error) {
    logger.warn(`Storage unavailable, results stay in memory only: ${toError(error).message}`);
    return null;
  }
}
