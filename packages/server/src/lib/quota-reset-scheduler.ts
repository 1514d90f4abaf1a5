/**
 * Quota Reset Scheduler: fires QuotaEngine.resetAll at each quota boundary.
 *
 * The next fire time comes from a cron expression evaluated in the reference
 * timezone; each tick re-arms a single timeout so DST shifts are picked up.
 */

import parser from 'cron-parser';
import { getErrorMessage, type QuotaResetResult } from '@quotapass/core';
import type { QuotaEngine } from '../services/quota-engine.js';
import { withRetry, type RetryOptions } from './db-resilience.js';
import { systemClock, type Clock } from './clock.js';
import { createLogger } from './logger.js';

const log = createLogger('QuotaResetScheduler');

/** setTimeout stores its delay in a signed 32-bit int */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface QuotaResetSchedulerOptions {
  /** Cron expression, e.g. '0 0 * * *' for midnight */
  cron: string;
  /** IANA zone the expression is evaluated in */
  timeZone: string;
  clock?: Clock;
  retry?: RetryOptions;
}

export class QuotaResetScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRun: Date | null = null;
  private readonly clock: Clock;

  constructor(
    private readonly quota: QuotaEngine,
    private readonly options: QuotaResetSchedulerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get nextRunAt(): Date | null {
    return this.nextRun;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.scheduleNext();
    log.info('Started', { cron: this.options.cron, timeZone: this.options.timeZone, nextRunAt: this.nextRun?.toISOString() });
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.nextRun = null;
      log.info('Stopped');
    }
  }

  /**
   * Run one reset now (also used by the admin route). Transient store
   * failures are retried with backoff before the error propagates.
   */
  async runOnce(): Promise<QuotaResetResult> {
    return withRetry(() => this.quota.resetAll(this.clock.now()), this.options.retry);
  }

  /** Next fire time strictly after `from`. */
  computeNextRun(from: Date): Date {
    return parser
      .parseExpression(this.options.cron, { currentDate: from, tz: this.options.timeZone })
      .next()
      .toDate();
  }

  private scheduleNext(): void {
    const now = this.clock.now();
    const next = this.computeNextRun(now);
    const delay = Math.min(Math.max(0, next.getTime() - now.getTime()), MAX_TIMER_DELAY_MS);

    this.nextRun = next;
    this.timer = setTimeout(() => this.tick(), delay);
    this.timer.unref();
  }

  private tick(): void {
    // A clamped long delay can wake early; just re-arm.
    if (this.nextRun && this.clock.now().getTime() < this.nextRun.getTime()) {
      this.scheduleNext();
      return;
    }

    this.runOnce()
      .catch((err: unknown) => {
        log.error('Scheduled quota reset failed', { error: getErrorMessage(err) });
      })
      .finally(() => {
        if (this.timer) this.scheduleNext();
      });
  }
}
