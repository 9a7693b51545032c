/**
 * RateLimiter.ts
 *
 * Sliding-window admission control keyed by client identity and limiter class.
 *
 * One instance is created at server start and injected into the app, so each
 * test or server owns its own windows. Pruning and appending for an identity
 * happen synchronously in checkAndRecord, which keeps them atomic on the
 * event loop.
 */

import type { RateLimitBudget } from '../config';
import { StructuredLogger } from '../types/Logger';

export type LimiterClass = 'general' | 'submit' | 'auth';

export type RateLimitBudgets = Record<LimiterClass, RateLimitBudget>;

export interface RateLimitDecision {
  limited: boolean;
  retryAfterSeconds: number;
}

const LIMITER_CLASSES: readonly LimiterClass[] = ['general', 'submit', 'auth'];

export class RateLimiter {
  // limiter class -> identity -> request timestamps (ms), oldest first
  private windows: Record<LimiterClass, Map<string, number[]>> = {
    general: new Map(),
    submit: new Map(),
    auth: new Map()
  };
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private budgets: RateLimitBudgets,
    private logger: StructuredLogger = new StructuredLogger('RateLimit')
  ) {}

  /**
   * Admit or refuse one request. A refused request is not recorded.
   * @param now - epoch milliseconds, defaults to Date.now()
   */
  checkAndRecord(identity: string, limiterClass: LimiterClass, now: number = Date.now()): RateLimitDecision {
    const { maxRequests, windowSeconds } = this.budgets[limiterClass];
    const windowMs = windowSeconds * 1000;
    const store = this.windows[limiterClass];

    const timestamps = (store.get(identity) ?? []).filter(t => t > now - windowMs);

    if (timestamps.length >= maxRequests) {
      store.set(identity, timestamps);
      const oldest = timestamps[0];
      const retryAfterSeconds = Math.max(0, Math.ceil((oldest + windowMs - now) / 1000));
      this.logger.warn(`${limiterClass} limit reached, retry in ${retryAfterSeconds}s`, identity);
      return { limited: true, retryAfterSeconds };
    }

    timestamps.push(now);
    store.set(identity, timestamps);
    return { limited: false, retryAfterSeconds: 0 };
  }

  /**
   * Drop expired timestamps and forget identities with none left
   * @returns number of identities removed
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const limiterClass of LIMITER_CLASSES) {
      const windowMs = this.budgets[limiterClass].windowSeconds * 1000;
      const store = this.windows[limiterClass];
      for (const [identity, timestamps] of store) {
        const live = timestamps.filter(t => t > now - windowMs);
        if (live.length === 0) {
          store.delete(identity);
          removed++;
        } else {
          store.set(identity, live);
        }
      }
    }
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} idle identities`);
    }
    return removed;
  }

  /**
   * Number of identities currently tracked for a class
   */
  size(limiterClass: LimiterClass): number {
    return this.windows[limiterClass].size;
  }

  /**
   * Start the periodic sweep. Runs once per the longest configured window.
   */
  startSweeper(intervalMs: number = this.longestWindowMs()): void {
    if (this.sweepTimer) {
      this.logger.warn('Sweeper already running');
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (!this.sweepTimer) {
      return;
    }
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  reset(): void {
    for (const limiterClass of LIMITER_CLASSES) {
      this.windows[limiterClass].clear();
    }
  }

  private longestWindowMs(): number {
    return Math.max(...LIMITER_CLASSES.map(c => this.budgets[c].windowSeconds)) * 1000;
  }
}
