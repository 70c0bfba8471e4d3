/**
 * @fileoverview StatsFilter - Request Counters and Latency
 *
 * @packageDocumentation
 * @module @threadline/core/application/filters
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Records, on the receiver it is given:
 *
 * | Metric                  | Kind    |
 * |-------------------------|---------|
 * | `requests`              | counter |
 * | `success`               | counter |
 * | `failures`              | counter |
 * | `failures/<ErrorName>`  | counter |
 * | `request_latency_ms`    | stat    |
 *
 * @version 1.0.0
 */

import { type ICounter, type IStat, type IStatsReceiver } from '../../domain/metrics';
import { type IFilter, Role, type Service } from '../../domain/rpc';

export const STATS_ROLE = new Role('RequestStats');

export interface IStatsFilterOptions {
  /** Clock in milliseconds. Default `performance.now`. */
  now?: () => number;
}

export class StatsFilter<TRequest, TResponse> implements IFilter<TRequest, TResponse> {
  private readonly stats: IStatsReceiver;
  private readonly now: () => number;
  private readonly requests: ICounter;
  private readonly success: ICounter;
  private readonly failures: ICounter;
  private readonly latency: IStat;

  constructor(stats: IStatsReceiver, options: IStatsFilterOptions = {}) {
    this.stats = stats;
    this.now = options.now ?? (() => performance.now());
    this.requests = stats.counter('requests');
    this.success = stats.counter('success');
    this.failures = stats.counter('failures');
    this.latency = stats.stat('request_latency_ms');
  }

  async apply(request: TRequest, next: Service<TRequest, TResponse>): Promise<TResponse> {
    const start = this.now();
    this.requests.incr();
    try {
      const reply = await next(request);
      this.success.incr();
      return reply;
    } catch (error) {
      this.failures.incr();
      // Created per failure name; the receiver caches by name
      this.stats.counter('failures', error instanceof Error ? error.name : 'unknown').incr();
      throw error;
    } finally {
      this.latency.add(this.now() - start);
    }
  }
}
