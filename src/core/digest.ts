/**
 * Alert digest builder
 * Deduplicates component and strategy issues of a results window into one message
 */

import type { TargetResult } from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Distinct problem label -> page types where it occurred
 */
export type IssueSet = Map<string, Set<string>>;

export interface DigestOptions {
  windowHours?: number;
  timeZone?: string;
  now?: Date;
}

export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Results stamped within the last `hours`; unparseable timestamps are dropped
 */
export function filterByRecency(results: TargetResult[], hours: number, now: Date = new Date()): TargetResult[] {
  const cutoff = now.getTime() - hours * HOUR_MS;
  return results.filter((result) => {
    const timestamp = parseTimestamp(result.timestamp);
    return timestamp !== null && timestamp.getTime() >= cutoff;
  });
}

/**
 * Distinct issues of one target result.
 * A component declaring strategies contributes only its failing strategy names.
 */
export function extractIssues(result: TargetResult): IssueSet {
  const issues: IssueSet = new Map();
  const add = (label: string, pageType: string): void => {
    const pageTypes = issues.get(label) ?? new Set<string>();
    pageTypes.add(pageType);
    issues.set(label, pageTypes);
  };

  for (const page of result.pages ?? []) {
    if (page.status !== 'ok') continue;

    for (const component of page.components) {
      const strategies = component.details?.strategies;
      if (strategies) {
        for (const [name, found] of Object.entries(strategies.strategiesFound)) {
          if (!found) add(name, page.pageType);
        }
      } else if (!component.found) {
        add(component.componentName, page.pageType);
      }
    }
  }

  return issues;
}

function dateParts(date: Date, timeZone: string): Record<'day' | 'month' | 'year' | 'hour' | 'minute', string> {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    day: '2-digit',
    month: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? '';
  return { day: pick('day'), month: pick('month'), year: pick('year'), hour: pick('hour'), minute: pick('minute') };
}

/**
 * dd/mm/yyyy
 */
export function formatDay(date: Date, timeZone = 'UTC'): string {
  const { day, month, year } = dateParts(date, timeZone);
  return `${day}/${month}/${year}`;
}

/**
 * dd/mm/yyyy - HH:MM, or "N/A" when the value does not parse
 */
export function formatTimestamp(value: unknown, timeZone = 'UTC'): string {
  const date = parseTimestamp(value);
  if (!date) return 'N/A';
  const { day, month, year, hour, minute } = dateParts(date, timeZone);
  return `${day}/${month}/${year} - ${hour}:${minute}`;
}

/**
 * Digest message for a window of target results (Teams markdown with <br> breaks)
 */
export function buildDigest(results: TargetResult[], options: DigestOptions = {}): string {
  const hours = options.windowHours ?? 24;
  const timeZone = options.timeZone ?? 'UTC';
  const now = options.now ?? new Date();

  const withIssues = results
    .map((result) => ({ result, issues: extractIssues(result) }))
    .filter((entry) => entry.issues.size > 0);
  const total = withIssues.reduce((sum, entry) => sum + entry.issues.size, 0);

  if (total === 0) {
    return `No hay alertas nuevas durante las últimas ${hours} horas.`;
  }

  let message = `**ALERTAS - ÚLTIMAS ${hours} HORAS [${formatDay(now, timeZone)}]**<br><br>`;
  message += `**Total alertas: ${total}**<br>`;
  message += '<br>---<br><br>';

  for (const { result, issues } of withIssues) {
    const timestamp = formatTimestamp(result.timestamp, timeZone);
    message +=
      `**País:** ${result.target}<br>` +
      `**Estado:** ${result.status}<br>` +
      `**Alertas:** ${issues.size}<br>` +
      `**Fecha/Hora:** ${timestamp === 'N/A' ? timestamp : `${timestamp} hrs`}<br>`;

    message += '<br>**Componentes con conflictos:**<br>';
    for (const [label, pageTypes] of issues) {
      message += `- ${label}: ${Array.from(pageTypes).sort().join(', ')}<br>`;
    }
    message += '<br>';
  }

  return message;
}
