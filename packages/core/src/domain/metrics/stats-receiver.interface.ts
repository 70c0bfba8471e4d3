/**
 * @fileoverview Stats Receiver - Metrics Registration Contract
 *
 * @packageDocumentation
 * @module @threadline/core/domain/metrics
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Components record metrics through this interface without knowing which
 * registry stores them. Names are given as segments; the receiver decides
 * how segments are joined.
 *
 * ```typescript
 * const stats = receiver.scope('clnt', 'users');
 * const requests = stats.counter('requests');  // clnt/users/requests
 * const latency = stats.stat('request_latency_ms');
 *
 * requests.incr();
 * latency.add(12);
 * ```
 *
 * @version 1.0.0
 */

/**
 * How important a metric is. Debug metrics are only recorded when the
 * receiver is configured to accept them.
 */
export enum Verbosity {
  Default = 'default',
  Debug = 'debug',
}

/**
 * Name and verbosity of a metric.
 */
export interface IMetricSchema {
  readonly name: readonly string[];
  readonly verbosity?: Verbosity;
  readonly description?: string;
}

export interface ICounter {
  incr(delta?: number): void;
}

export interface IStat {
  add(value: number): void;
}

export interface IGauge {
  /** Stop reporting this gauge. */
  remove(): void;
}

/**
 * IStatsReceiver - Factory for counters, stats (distributions) and gauges.
 */
export interface IStatsReceiver {
  counter(schema: IMetricSchema): ICounter;
  counter(...name: string[]): ICounter;

  stat(schema: IMetricSchema): IStat;
  stat(...name: string[]): IStat;

  /**
   * Report `read()` whenever the registry is sampled.
   */
  addGauge(schema: IMetricSchema, read: () => number): IGauge;

  /**
   * A receiver whose metric names are prefixed with `namespace`.
   */
  scope(...namespace: string[]): IStatsReceiver;
}

/**
 * Normalise the two call forms of {@link IStatsReceiver.counter} / `stat`.
 */
export function toSchema(args: [IMetricSchema] | string[]): IMetricSchema {
  const [first] = args;
  if (first !== undefined && typeof first !== 'string') {
    return first;
  }
  return { name: args.filter((segment): segment is string => typeof segment === 'string') };
}

/**
 * A receiver that records nothing.
 */
export const NullStatsReceiver: IStatsReceiver = {
  counter: () => ({ incr: () => undefined }),
  stat: () => ({ add: () => undefined }),
  addGauge: () => ({ remove: () => undefined }),
  scope: () => NullStatsReceiver,
};
