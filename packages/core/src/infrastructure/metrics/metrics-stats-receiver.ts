/**
 * @fileoverview MetricsStatsReceiver - IStatsReceiver over MetricsRegistry
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/metrics
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The standard receiver. Name segments are joined with a one-character
 * scope separator (`/` unless configured otherwise).
 *
 * Metrics should be created once and kept in fields. Every `counter`,
 * `stat` and `addGauge` call is counted, and a receiver tree that creates
 * more than {@link MetricsStatsReceiver.CREATE_REQUEST_LIMIT} of one kind
 * reports a lint issue.
 *
 * @version 1.0.0
 */

import {
  type ICounter,
  type IGauge,
  type IMetricSchema,
  type IStat,
  type IStatsReceiver,
  NullStatsReceiver,
  Verbosity,
  toSchema,
} from '../../domain/metrics';
import { type RuntimeConfig } from '../config';
import { defaultLogger, type Logger } from '../logging';

import { MetricsRegistry } from './metrics-registry';
import { InvalidScopeSeparatorError } from './metrics.errors';

export interface IMetricsStatsReceiverOptions {
  /** Joins name segments. Must be exactly one character. Default `/`. */
  separator?: string;

  /** Stat names whose every observed value is logged at `debug`. */
  debugLoggedStatNames?: ReadonlySet<string>;

  /** Whether a `Verbosity.Debug` metric with this name is recorded. Default: never. */
  debugEnabled?: (name: string) => boolean;

  logger?: Logger;
}

/**
 * State shared by a receiver and every receiver scoped from it.
 *
 * @internal
 */
export interface IReceiverState {
  readonly registry: MetricsRegistry;
  readonly separator: string;
  readonly debugLoggedStatNames: ReadonlySet<string>;
  readonly debugEnabled: (name: string) => boolean;
  readonly logger: Logger;
  readonly requests: { counter: number; stat: number; addGauge: number };
}

let defaultRegistry: MetricsRegistry | undefined;

export class MetricsStatsReceiver implements IStatsReceiver {
  /**
   * Creation calls of one kind beyond which a lint issue is reported.
   */
  static readonly CREATE_REQUEST_LIMIT = 100_000;

  /** Process-wide registry used when none is given. */
  static get defaultRegistry(): MetricsRegistry {
    defaultRegistry ??= new MetricsRegistry();
    return defaultRegistry;
  }

  private readonly shared: IReceiverState;
  private readonly prefix: readonly string[];

  /**
   * @param inherited - Set by {@link scope}; not for direct use
   */
  constructor(
    registry: MetricsRegistry = MetricsStatsReceiver.defaultRegistry,
    options: IMetricsStatsReceiverOptions = {},
    inherited?: { shared: IReceiverState; prefix: readonly string[] },
  ) {
    if (inherited) {
      this.shared = inherited.shared;
      this.prefix = inherited.prefix;
      return;
    }

    const separator = options.separator ?? '/';
    if (separator.length !== 1) {
      throw new InvalidScopeSeparatorError(separator);
    }

    this.shared = {
      registry,
      separator,
      debugLoggedStatNames: options.debugLoggedStatNames ?? new Set(),
      debugEnabled: options.debugEnabled ?? (() => false),
      logger: (options.logger ?? defaultLogger()).child({ component: 'MetricsStatsReceiver' }),
      requests: { counter: 0, stat: 0, addGauge: 0 },
    };
    this.prefix = [];
  }

  /**
   * A receiver configured from `STATS_SCOPE_SEPARATOR` and
   * `STATS_DEBUG_LOGGED_NAMES`.
   */
  static fromConfig(
    config: Pick<RuntimeConfig, 'STATS_SCOPE_SEPARATOR' | 'STATS_DEBUG_LOGGED_NAMES'>,
    registry?: MetricsRegistry,
    logger?: Logger,
  ): MetricsStatsReceiver {
    return new MetricsStatsReceiver(registry, {
      separator: config.STATS_SCOPE_SEPARATOR,
      debugLoggedStatNames: config.STATS_DEBUG_LOGGED_NAMES,
      logger,
    });
  }

  get registry(): MetricsRegistry {
    return this.shared.registry;
  }

  counter(schema: IMetricSchema): ICounter;
  counter(...name: string[]): ICounter;
  counter(...args: [IMetricSchema] | string[]): ICounter {
    const schema = toSchema(args);
    const name = this.nameOf(schema);
    this.shared.requests.counter++;
    this.shared.logger.trace({ metric: name }, 'StatsReceiver.counter');

    if (!this.isRecorded(schema, name)) {
      return NullStatsReceiver.counter(schema);
    }
    const counter = this.shared.registry.getOrCreateCounter(name, schema.description);
    return { incr: (delta = 1) => counter.inc(delta) };
  }

  stat(schema: IMetricSchema): IStat;
  stat(...name: string[]): IStat;
  stat(...args: [IMetricSchema] | string[]): IStat {
    const schema = toSchema(args);
    const name = this.nameOf(schema);
    this.shared.requests.stat++;
    this.shared.logger.trace({ metric: name }, 'StatsReceiver.stat');

    if (!this.isRecorded(schema, name)) {
      return NullStatsReceiver.stat(schema);
    }
    const summary = this.shared.registry.getOrCreateStat(name, schema.description);

    if (this.shared.debugLoggedStatNames.has(name)) {
      const logger = this.shared.logger;
      return {
        add(value) {
          logger.debug({ stat: name, value }, 'stat observed');
          summary.observe(value);
        },
      };
    }
    return { add: (value) => summary.observe(value) };
  }

  addGauge(schema: IMetricSchema, read: () => number): IGauge {
    const name = this.nameOf(schema);
    this.shared.requests.addGauge++;
    this.shared.logger.trace({ metric: name }, 'StatsReceiver.addGauge');

    if (!this.isRecorded(schema, name)) {
      return NullStatsReceiver.addGauge(schema, read);
    }
    const registry = this.shared.registry;
    registry.registerGauge(name, read, schema.description);
    return { remove: () => registry.unregisterGauge(name) };
  }

  scope(...namespace: string[]): MetricsStatsReceiver {
    return new MetricsStatsReceiver(this.shared.registry, {}, {
      shared: this.shared,
      prefix: [...this.prefix, ...namespace],
    });
  }

  /**
   * Performance and naming problems found so far.
   */
  lintIssues(): string[] {
    const issues: string[] = [];
    for (const [kind, count] of Object.entries(this.shared.requests)) {
      if (count > MetricsStatsReceiver.CREATE_REQUEST_LIMIT) {
        issues.push(`StatsReceiver.${kind}() has been called ${count} times`);
      }
    }
    for (const collision of this.shared.registry.collisionIssues()) {
      issues.push(`Metric name collision: ${collision}`);
    }
    return issues;
  }

  toString(): string {
    return 'MetricsStatsReceiver';
  }

  private nameOf(schema: IMetricSchema): string {
    return [...this.prefix, ...schema.name].join(this.shared.separator);
  }

  private isRecorded(schema: IMetricSchema, name: string): boolean {
    return schema.verbosity !== Verbosity.Debug || this.shared.debugEnabled(name);
  }
}
