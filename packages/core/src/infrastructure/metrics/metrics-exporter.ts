/**
 * @fileoverview MetricsExporter - Flattened JSON Sample
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/metrics
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Renders {@link MetricsRegistry.sample} as a JSON object with sorted keys.
 * Filters are regular expressions; with `filtered: true`, any metric whose
 * name matches one of them is left out.
 *
 * On `close()` the exporter can dump the final sample to the log, so the
 * last values of a short-lived process are not lost.
 *
 * @version 1.0.0
 */

import { setTimeout as delay } from 'node:timers/promises';

import { type RuntimeConfig } from '../config';
import { defaultLogger, type Logger } from '../logging';

import { type MetricsRegistry } from './metrics-registry';

export interface IMetricsExporterOptions {
  /** Patterns of metric names to leave out of filtered samples. */
  filters?: ReadonlyArray<string | RegExp>;

  /** Log the JSON sample at `error` when the exporter is closed. Default false. */
  logOnShutdown?: boolean;

  logger?: Logger;
}

export interface IJsonOptions {
  /** Indent the output. Default false. */
  pretty?: boolean;

  /** Apply the configured filters. Default false. */
  filtered?: boolean;
}

export interface ICloseOptions {
  /** Upper bound on the shutdown dump. Default 1000 ms. */
  deadlineMs?: number;
}

export class MetricsExporter {
  private readonly registry: MetricsRegistry;
  private readonly filters: readonly RegExp[];
  private readonly logOnShutdown: boolean;
  private readonly logger: Logger;
  private closed = false;

  constructor(registry: MetricsRegistry, options: IMetricsExporterOptions = {}) {
    this.registry = registry;
    this.filters = (options.filters ?? []).map((filter) =>
      typeof filter === 'string' ? new RegExp(filter) : filter,
    );
    this.logOnShutdown = options.logOnShutdown ?? false;
    this.logger = (options.logger ?? defaultLogger()).child({ component: 'MetricsExporter' });
  }

  /**
   * An exporter whose shutdown dump follows `METRICS_LOG_ON_SHUTDOWN`.
   */
  static fromConfig(
    config: Pick<RuntimeConfig, 'METRICS_LOG_ON_SHUTDOWN'>,
    registry: MetricsRegistry,
    options: Omit<IMetricsExporterOptions, 'logOnShutdown'> = {},
  ): MetricsExporter {
    return new MetricsExporter(registry, { ...options, logOnShutdown: config.METRICS_LOG_ON_SHUTDOWN });
  }

  /**
   * The current sample as `{ name: value }`, keys sorted.
   */
  async sample(filtered = false): Promise<Record<string, number>> {
    const values = await this.registry.sample();
    const result: Record<string, number> = {};
    for (const name of Object.keys(values).sort()) {
      if (filtered && this.isFilteredOut(name)) continue;
      const value = values[name];
      if (value !== undefined) result[name] = value;
    }
    return result;
  }

  async json(options: IJsonOptions = {}): Promise<string> {
    const sample = await this.sample(options.filtered ?? false);
    return options.pretty ? JSON.stringify(sample, null, 2) : JSON.stringify(sample);
  }

  /**
   * Stop the exporter. With `logOnShutdown`, the final sample is logged
   * unless producing it takes longer than the deadline.
   */
  async close(options: ICloseOptions = {}): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.logOnShutdown) return;

    const deadlineMs = options.deadlineMs ?? 1000;
    const timeout = new AbortController();
    // The race subscribes to the timer, so its abort rejection below is handled
    const timedOut = delay(deadlineMs, 'timeout' as const, { signal: timeout.signal });

    try {
      const outcome = await Promise.race([this.json(), timedOut]);
      if (outcome === 'timeout') {
        this.logger.warn({ deadlineMs }, 'metrics dump did not finish before the deadline');
        return;
      }
      this.logger.error({ metrics: outcome }, 'metrics on shutdown');
    } finally {
      timeout.abort();
    }
  }

  private isFilteredOut(name: string): boolean {
    return this.filters.some((filter) => filter.test(name));
  }
}
