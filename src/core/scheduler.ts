/**
 * Scheduler with jitter support
 */

import type { SchedulerConfig } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Scheduler interface
 */
export interface Scheduler {
  start(callback: () => Promise<void>): void;
  stop(): void;
  readonly running: boolean;
}

/**
 * Periodic scheduler; a tick never overlaps a callback still in progress
 */
export class JitterScheduler implements Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private isRunning: boolean = false;
  private isCallbackRunning: boolean = false;

  constructor(
    private config: Pick<SchedulerConfig, 'baseIntervalMs' | 'jitterRatio'>,
    private logger: Logger,
    private random: () => number = Math.random
  ) {}

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start the scheduler with a callback
   */
  start(callback: () => Promise<void>): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.scheduleNext(callback);
  }

  /**
   * Stop the scheduler
   */
  stop(): void {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Schedule next execution with jitter
   */
  private scheduleNext(callback: () => Promise<void>): void {
    if (!this.isRunning) {
      return;
    }

    const delay = this.calculateDelay();
    this.logger.debug(`Next run in ${Math.round(delay / 1000)}s`);

    this.timer = setTimeout(async () => {
      if (this.isCallbackRunning) {
        this.logger.warn('Callback already running, skipping duplicate execution');
        this.scheduleNext(callback);
        return;
      }

      this.isCallbackRunning = true;
      try {
        await callback();
      } catch (error) {
        this.logger.error('Scheduled callback failed', error);
      } finally {
        this.isCallbackRunning = false;
      }

      this.scheduleNext(callback);
    }, delay);
  }

  /**
   * Base interval +/- jitterRatio, at least one second
   */
  calculateDelay(): number {
    const { baseIntervalMs, jitterRatio } = this.config;

    const jitterRange = baseIntervalMs * jitterRatio;
    const jitter = (this.random() * 2 - 1) * jitterRange;
    const delay = Math.floor(baseIntervalMs + jitter);

    return Math.max(delay, 1000);
  }
}

/**
 * Create a new scheduler
 */
export function createScheduler(config: SchedulerConfig, logger: Logger): Scheduler {
  return new JitterScheduler(config, logger.child('scheduler'));
}
