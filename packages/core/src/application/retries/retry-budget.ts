/**
 * @fileoverview Retry Budget - Bounding Retries by Recent Traffic
 *
 * @packageDocumentation
 * @module @threadline/core/application/retries
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Every request deposits into the budget and every retry withdraws from it.
 * Only activity inside a sliding `ttlMs` window counts:
 *
 * ```
 * balance = floor(minRetriesPerSec * ttlSeconds
 *               + deposits * percentCanRetry
 *               - withdrawals)
 * ```
 *
 * With the defaults (10 s, 10/s, 0.2) an idle client may retry 100 times in
 * a window, and a busy one may additionally retry one request in five.
 *
 * @version 1.0.0
 */

/**
 * Admission control for retries.
 */
export interface IRetryBudget {
  /** Record a request (first attempts only). */
  deposit(): void;

  /** Take one retry if the balance allows. */
  tryWithdraw(): boolean;

  /** Retries currently available. */
  balance(): number;
}

export interface ITokenRetryBudgetOptions {
  /** Window over which deposits and withdrawals count. Default 10 000 ms. */
  ttlMs?: number;

  /** Retries allowed per second regardless of traffic. Default 10. */
  minRetriesPerSec?: number;

  /** Fraction of deposits that may be retried, 0 to 1000. Default 0.2. */
  percentCanRetry?: number;

  /** Clock. Default `Date.now`. */
  now?: () => number;
}

/**
 * Event counts in a sliding window, one slot per distinct millisecond.
 *
 * Expired slots are dropped on every `add` as well as on `count`, so at most
 * `ttlMs` slots are held however much traffic passes through.
 *
 * @internal
 */
export class SlidingWindow {
  private readonly times: number[] = [];
  private readonly counts: number[] = [];
  private total = 0;

  constructor(private readonly ttlMs: number) {}

  /** Slots currently held. */
  get size(): number {
    return this.times.length;
  }

  add(now: number): void {
    this.expire(now);
    const last = this.times.length - 1;
    if (last >= 0 && this.times[last] === now) {
      this.counts[last] = (this.counts[last] ?? 0) + 1;
    } else {
      this.times.push(now);
      this.counts.push(1);
    }
    this.total++;
  }

  count(now: number): number {
    this.expire(now);
    return this.total;
  }

  private expire(now: number): void {
    const cutoff = now - this.ttlMs;
    let expired = 0;
    while (expired < this.times.length && (this.times[expired] ?? 0) <= cutoff) {
      this.total -= this.counts[expired] ?? 0;
      expired++;
    }
    if (expired > 0) {
      this.times.splice(0, expired);
      this.counts.splice(0, expired);
    }
  }
}

export class TokenRetryBudget implements IRetryBudget {
  private readonly options: Required<ITokenRetryBudgetOptions>;
  private readonly reserve: number;
  private readonly deposits: SlidingWindow;
  private readonly withdrawals: SlidingWindow;

  constructor(options: ITokenRetryBudgetOptions = {}) {
    this.options = {
      ttlMs: options.ttlMs ?? 10_000,
      minRetriesPerSec: options.minRetriesPerSec ?? 10,
      percentCanRetry: options.percentCanRetry ?? 0.2,
      now: options.now ?? Date.now,
    };

    const { ttlMs, minRetriesPerSec, percentCanRetry } = this.options;
    if (ttlMs < 1000 || ttlMs > 60_000) {
      throw new RangeError(`ttlMs must be in [1000, 60000], got ${ttlMs}`);
    }
    if (minRetriesPerSec < 0) {
      throw new RangeError(`minRetriesPerSec must be non-negative, got ${minRetriesPerSec}`);
    }
    if (percentCanRetry < 0 || percentCanRetry > 1000) {
      throw new RangeError(`percentCanRetry must be in [0, 1000], got ${percentCanRetry}`);
    }

    this.reserve = minRetriesPerSec * (ttlMs / 1000);
    this.deposits = new SlidingWindow(ttlMs);
    this.withdrawals = new SlidingWindow(ttlMs);
  }

  deposit(): void {
    this.deposits.add(this.options.now());
  }

  tryWithdraw(): boolean {
    if (this.balance() < 1) {
      return false;
    }
    this.withdrawals.add(this.options.now());
    return true;
  }

  balance(): number {
    const now = this.options.now();
    const earned = this.deposits.count(now) * this.options.percentCanRetry;
    return Math.max(0, Math.floor(this.reserve + earned - this.withdrawals.count(now)));
  }

  toString(): string {
    return `TokenRetryBudget(balance=${this.balance()})`;
  }
}

/**
 * A budget that never allows a retry.
 */
export const EMPTY_RETRY_BUDGET: IRetryBudget = {
  deposit: () => undefined,
  tryWithdraw: () => false,
  balance: () => 0,
};
