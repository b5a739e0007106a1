/**
 * NewsRelay — Scheduler
 *
 * Runs cycles back to back with a time-of-day interval in the configured
 * timezone: every 4–6 minutes during the day (06:00–22:00), every
 * 30–60 minutes at night. A failed cycle never stops the loop.
 */

import { TZDate } from '@date-fns/tz';
import { errorMessage, logger } from '../lib/logger';

export interface IntervalRange {
  minMs: number;
  maxMs: number;
}

export interface SchedulerOptions {
  timezone: string;
  dayStartHour?: number;
  dayEndHour?: number;
  day?: IntervalRange;
  night?: IntervalRange;
  /** Pause after a cycle throws */
  retryDelayMs?: number;
  random?: () => number;
  now?: () => Date;
}

const MINUTE_MS = 60_000;

export const DEFAULT_DAY_INTERVAL: IntervalRange = { minMs: 4 * MINUTE_MS, maxMs: 6 * MINUTE_MS };
export const DEFAULT_NIGHT_INTERVAL: IntervalRange = { minMs: 30 * MINUTE_MS, maxMs: 60 * MINUTE_MS };

export class Scheduler {
  private readonly log = logger.child({ component: 'scheduler' });
  private readonly timezone: string;
  private readonly dayStartHour: number;
  private readonly dayEndHour: number;
  private readonly day: IntervalRange;
  private readonly night: IntervalRange;
  private readonly retryDelayMs: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private active = false;
  /** Bumped on every start; a tick from an earlier loop never reschedules */
  private generation = 0;
  private nextRun: Date | null = null;

  constructor(
    private readonly task: () => Promise<unknown>,
    options: SchedulerOptions
  ) {
    this.timezone = options.timezone;
    this.dayStartHour = options.dayStartHour ?? 6;
    this.dayEndHour = options.dayEndHour ?? 22;
    this.day = options.day ?? DEFAULT_DAY_INTERVAL;
    this.night = options.night ?? DEFAULT_NIGHT_INTERVAL;
    this.retryDelayMs = options.retryDelayMs ?? MINUTE_MS;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.active;
  }

  get nextRunAt(): Date | null {
    return this.nextRun;
  }

  /**
   * Delay until the next cycle, drawn uniformly from the range for the
   * local hour of `at`.
   */
  nextDelayMs(at: Date = this.now()): number {
    const hour = new TZDate(at.getTime(), this.timezone).getHours();
    const range = hour >= this.dayStartHour && hour < this.dayEndHour ? this.day : this.night;
    return Math.round(range.minMs + this.random() * (range.maxMs - range.minMs));
  }

  /**
   * Start the loop; the first cycle runs immediately.
   */
  start(): boolean {
    if (this.active) return false;
    this.active = true;
    this.generation++;
    this.log.info('Scheduler started', { timezone: this.timezone });
    this.schedule(0, this.generation);
    return true;
  }

  stop(): boolean {
    if (!this.active) return false;
    this.active = false;
    this.nextRun = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log.info('Scheduler stopped');
    return true;
  }

  private schedule(delayMs: number, generation: number): void {
    if (!this.active || generation !== this.generation) return;
    this.nextRun = new Date(this.now().getTime() + delayMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    let delay: number;
    try {
      await this.task();
      delay = this.nextDelayMs();
      this.log.info('Next cycle scheduled', {
        inMinutes: Math.round((delay / MINUTE_MS) * 10) / 10,
      });
    } catch (error) {
      this.log.error('Scheduled cycle failed', { error: errorMessage(error) });
      delay = this.retryDelayMs;
    }
    this.schedule(delay, generation);
  }
}
