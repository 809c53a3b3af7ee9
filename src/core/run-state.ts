/**
 * Crawl run state: idle -> running -> (success | failed) -> idle
 * Readers only ever receive frozen snapshots
 */

import type { RunReport } from '../types/index.js';
import { ConflictError } from '../utils/errors.js';

export type RunPhase = 'idle' | 'running' | 'success' | 'failed';

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
  idle: ['running'],
  running: ['success', 'failed'],
  success: ['idle'],
  failed: ['idle'],
};

export interface RunStateSnapshot {
  readonly phase: RunPhase;
  readonly isRunning: boolean;
  readonly startTime: string | null;
  readonly endTime: string | null;
  readonly alertsCount: number;
  readonly error: string | null;
  readonly lastReport: RunReport | null;
}

const INITIAL_STATE: RunStateSnapshot = Object.freeze({
  phase: 'idle',
  isRunning: false,
  startTime: null,
  endTime: null,
  alertsCount: 0,
  error: null,
  lastReport: null,
});

export class RunStateTracker {
  private state: RunStateSnapshot = INITIAL_STATE;

  snapshot(): RunStateSnapshot {
    return this.state;
  }

  get isRunning(): boolean {
    return this.state.phase === 'running';
  }

  /**
   * Enter "running"; a finished run passes through "idle" first
   */
  begin(now: Date = new Date()): RunStateSnapshot {
    if (this.state.phase === 'running') {
      throw new ConflictError('A crawl run is already in progress');
    }
    if (this.state.phase !== 'idle') {
      this.transition('idle', {});
    }
    return this.transition('running', { startTime: now.toISOString(), endTime: null, error: null });
  }

  succeed(report: RunReport, now: Date = new Date()): RunStateSnapshot {
    return this.transition('success', {
      endTime: now.toISOString(),
      alertsCount: report.totalAlerts,
      lastReport: report,
    });
  }

  fail(error: string, now: Date = new Date()): RunStateSnapshot {
    return this.transition('failed', { endTime: now.toISOString(), error });
  }

  private transition(
    to: RunPhase,
    patch: Partial<Omit<RunStateSnapshot, 'phase' | 'isRunning'>>
  ): RunStateSnapshot {
    const from = this.state.phase;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid run state transition: ${from} -> ${to}`);
    }
    this.state = Object.freeze({ ...this.state, ...patch, phase: to, isRunning: to === 'running' });
    return this.state;
  }
}
