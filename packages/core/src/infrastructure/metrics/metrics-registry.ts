/**
 * @fileoverview MetricsRegistry - prom-client Registry with a Name Index
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/metrics
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Metrics are addressed by their display name (`clnt/users/requests`). The
 * prom-client metric behind each one gets a sanitised exported name
 * (`clnt_users_requests`). Two display names that sanitise to the same
 * exported name share one metric and are reported as a collision.
 *
 * Stats are prom-client Summaries over a 60 second window rotated in three
 * buckets, so an observation shows up in the percentiles within 20 seconds.
 */

import { Counter, Gauge, Registry, Summary } from 'prom-client';

import { MetricTypeMismatchError } from './metrics.errors';

const PERCENTILES: ReadonlyArray<readonly [number, string]> = [
  [0.5, 'p50'],
  [0.9, 'p90'],
  [0.99, 'p99'],
  [0.999, 'p9990'],
];

type RegisteredMetric =
  | { readonly kind: 'counter'; readonly metric: Counter }
  | { readonly kind: 'stat'; readonly metric: Summary }
  | { readonly kind: 'gauge'; readonly metric: Gauge };

type MetricKind = RegisteredMetric['kind'];

/**
 * Map a display name onto the Prometheus name alphabet.
 */
export function toExportedName(name: string): string {
  const sanitised = name.replace(/[^a-zA-Z0-9_:]/g, '_');
  return /^[0-9]/.test(sanitised) ? `_${sanitised}` : sanitised;
}

export class MetricsRegistry {
  /** The underlying prom-client registry. */
  readonly prometheus: Registry;

  private readonly byName = new Map<string, RegisteredMetric>();
  private readonly byExportedName = new Map<string, { name: string; entry: RegisteredMetric }>();
  private readonly collisions = new Set<string>();

  constructor(prometheus: Registry = new Registry()) {
    this.prometheus = prometheus;
  }

  getOrCreateCounter(name: string, description?: string): Counter {
    const entry = this.getOrCreate(name, 'counter', (exported) => ({
      kind: 'counter',
      metric: new Counter({
        name: exported,
        help: description ?? name,
        registers: [this.prometheus],
      }),
    }));
    if (entry.kind !== 'counter') {
      throw new MetricTypeMismatchError(name, entry.kind, 'counter');
    }
    return entry.metric;
  }

  getOrCreateStat(name: string, description?: string): Summary {
    const entry = this.getOrCreate(name, 'stat', (exported) => ({
      kind: 'stat',
      metric: new Summary({
        name: exported,
        help: description ?? name,
        percentiles: PERCENTILES.map(([quantile]) => quantile),
        maxAgeSeconds: 60,
        ageBuckets: 3,
        registers: [this.prometheus],
      }),
    }));
    if (entry.kind !== 'stat') {
      throw new MetricTypeMismatchError(name, entry.kind, 'stat');
    }
    return entry.metric;
  }

  /**
   * Report `read()` under `name` on every sample. Re-registering a gauge
   * replaces its reader.
   */
  registerGauge(name: string, read: () => number, description?: string): void {
    const existing = this.byName.get(name);
    if (existing !== undefined && existing.kind !== 'gauge') {
      throw new MetricTypeMismatchError(name, existing.kind, 'gauge');
    }
    if (existing !== undefined) {
      this.unregisterGauge(name);
    }

    this.getOrCreate(name, 'gauge', (exported) => ({
      kind: 'gauge',
      metric: new Gauge({
        name: exported,
        help: description ?? name,
        registers: [this.prometheus],
        collect() {
          this.set(read());
        },
      }),
    }));
  }

  unregisterGauge(name: string): void {
    const entry = this.byName.get(name);
    if (entry === undefined || entry.kind !== 'gauge') {
      return;
    }
    const exported = toExportedName(name);
    this.byName.delete(name);

    // A colliding display name may still report through the same metric
    const survivor = Array.from(this.byName).find(([, other]) => other === entry);
    if (survivor !== undefined) {
      this.byExportedName.set(exported, { name: survivor[0], entry });
      return;
    }
    this.byExportedName.delete(exported);
    this.prometheus.removeSingleMetric(exported);
  }

  /** Display names, in registration order. */
  names(): string[] {
    return Array.from(this.byName.keys());
  }

  /**
   * Display names that collided with an earlier name on export.
   */
  collisionIssues(): string[] {
    return Array.from(this.collisions);
  }

  /**
   * Flatten every metric to `{ name: value }`. Stats contribute `name.count`,
   * `name.sum` and one `name.pNN` per percentile.
   */
  async sample(): Promise<Record<string, number>> {
    const result: Record<string, number> = {};

    for (const [name, entry] of this.byName) {
      if (entry.kind !== 'stat') {
        const { values } = await entry.metric.get();
        result[name] = values[0]?.value ?? 0;
        continue;
      }

      const { values } = await entry.metric.get();
      for (const sample of values) {
        const value = Number.isFinite(sample.value) ? sample.value : 0;
        if (sample.metricName?.endsWith('_count')) {
          result[`${name}.count`] = value;
        } else if (sample.metricName?.endsWith('_sum')) {
          result[`${name}.sum`] = value;
        } else {
          const label = PERCENTILES.find(([quantile]) => quantile === sample.labels['quantile']);
          if (label) result[`${name}.${label[1]}`] = value;
        }
      }
    }

    return result;
  }

  /** Prometheus text exposition of every metric. */
  async prometheusText(): Promise<string> {
    return this.prometheus.metrics();
  }

  private getOrCreate(
    name: string,
    kind: MetricKind,
    create: (exportedName: string) => RegisteredMetric,
  ): RegisteredMetric {
    const existing = this.byName.get(name);
    if (existing !== undefined) {
      return existing;
    }

    const exported = toExportedName(name);
    const shared = this.byExportedName.get(exported);
    if (shared !== undefined) {
      this.collisions.add(`'${name}' and '${shared.name}' both export as '${exported}'`);
      if (shared.entry.kind !== kind) {
        throw new MetricTypeMismatchError(name, shared.entry.kind, kind);
      }
      this.byName.set(name, shared.entry);
      return shared.entry;
    }

    const entry = create(exported);
    this.byName.set(name, entry);
    this.byExportedName.set(exported, { name, entry });
    return entry;
  }
}
