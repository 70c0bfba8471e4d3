/**
 * @fileoverview MetricsStatsReceiver / MetricsRegistry Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { Verbosity } from '../../../src/domain/metrics/index.js';
import { makeNoopLogger } from '../../../src/infrastructure/logging/index.js';
import {
  InvalidScopeSeparatorError,
  MetricTypeMismatchError,
  MetricsRegistry,
  MetricsStatsReceiver,
  toExportedName,
} from '../../../src/infrastructure/metrics/index.js';

const newReceiver = (
  options: ConstructorParameters<typeof MetricsStatsReceiver>[1] = {},
): { registry: MetricsRegistry; stats: MetricsStatsReceiver } => {
  const registry = new MetricsRegistry();
  return { registry, stats: new MetricsStatsReceiver(registry, { logger: makeNoopLogger(), ...options }) };
};

describe('MetricsStatsReceiver', () => {
  // ============================================================================
  // Naming
  // ============================================================================

  describe('names', () => {
    it('should join segments and scopes with the separator', async () => {
      const { registry, stats } = newReceiver();

      stats.scope('clnt', 'users').counter('requests').incr(3);

      expect(registry.names()).toEqual(['clnt/users/requests']);
      expect(await registry.sample()).toEqual({ 'clnt/users/requests': 3 });
    });

    it('should honour a custom separator', () => {
      const { registry, stats } = newReceiver({ separator: '.' });

      stats.scope('srv').stat('latency');

      expect(registry.names()).toEqual(['srv.latency']);
    });

    it('should refuse a separator that is not one character', () => {
      expect(() => new MetricsStatsReceiver(new MetricsRegistry(), { separator: '::' })).toThrow(
        new InvalidScopeSeparatorError('::'),
      );
    });

    it('should share one metric between equal names', async () => {
      const { registry, stats } = newReceiver();

      stats.counter('a', 'b').incr();
      stats.scope('a').counter('b').incr();

      expect(await registry.sample()).toEqual({ 'a/b': 2 });
    });
  });

  // ============================================================================
  // Metric Kinds
  // ============================================================================

  describe('stat()', () => {
    it('should export count, sum and percentiles', async () => {
      const { registry, stats } = newReceiver();

      stats.stat('latency_ms').add(7);

      expect(await registry.sample()).toEqual({
        'latency_ms.count': 1,
        'latency_ms.sum': 7,
        'latency_ms.p50': 7,
        'latency_ms.p90': 7,
        'latency_ms.p99': 7,
        'latency_ms.p9990': 7,
      });
    });

    it('should log observed values of the configured stats at debug', () => {
      const logger = makeNoopLogger();
      const debug = vi.spyOn(logger, 'debug');
      const child = vi.spyOn(logger, 'child').mockReturnValue(logger);
      const stats = new MetricsStatsReceiver(new MetricsRegistry(), {
        logger,
        debugLoggedStatNames: new Set(['traced']),
      });

      stats.stat('traced').add(42);
      stats.stat('quiet').add(1);

      expect(child).toHaveBeenCalledWith({ component: 'MetricsStatsReceiver' });
      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith({ stat: 'traced', value: 42 }, 'stat observed');
    });
  });

  describe('addGauge()', () => {
    it('should read the gauge at sample time until removed', async () => {
      const { registry, stats } = newReceiver();
      let depth = 4;

      const gauge = stats.addGauge({ name: ['queue', 'depth'] }, () => depth);
      expect(await registry.sample()).toEqual({ 'queue/depth': 4 });

      depth = 9;
      expect(await registry.sample()).toEqual({ 'queue/depth': 9 });

      gauge.remove();
      expect(await registry.sample()).toEqual({});
    });
  });

  describe('verbosity', () => {
    it('should drop debug metrics by default', async () => {
      const { registry, stats } = newReceiver();

      stats.counter({ name: ['verbose'], verbosity: Verbosity.Debug }).incr();

      expect(registry.names()).toEqual([]);
      expect(await registry.sample()).toEqual({});
    });

    it('should record debug metrics the predicate accepts', () => {
      const { registry, stats } = newReceiver({ debugEnabled: (name) => name.startsWith('dbg/') });

      stats.scope('dbg').counter({ name: ['on'], verbosity: Verbosity.Debug });
      stats.counter({ name: ['off'], verbosity: Verbosity.Debug });

      expect(registry.names()).toEqual(['dbg/on']);
    });
  });

  // ============================================================================
  // Lint
  // ============================================================================

  describe('lintIssues()', () => {
    it('should report nothing for a well-behaved receiver', () => {
      const { stats } = newReceiver();
      stats.counter('requests');

      expect(stats.lintIssues()).toEqual([]);
    });

    it('should report names that collide on export', () => {
      const { stats } = newReceiver();

      stats.counter('a/b');
      stats.counter('a_b');

      expect(stats.lintIssues()).toEqual([
        "Metric name collision: 'a_b' and 'a/b' both export as 'a_b'",
      ]);
    });

    it('should report metrics created on every request', () => {
      const { stats } = newReceiver();
      const scoped = stats.scope('hot');

      for (let i = 0; i <= MetricsStatsReceiver.CREATE_REQUEST_LIMIT; i++) {
        scoped.counter('requests');
      }

      expect(stats.lintIssues()).toEqual(['StatsReceiver.counter() has been called 100001 times']);
    });
  });
});

describe('MetricsRegistry', () => {
  it('should map names onto the Prometheus alphabet', () => {
    expect(toExportedName('clnt/users/request_latency_ms')).toBe('clnt_users_request_latency_ms');
    expect(toExportedName('9lives')).toBe('_9lives');
  });

  it('should refuse to reuse a name for another kind', () => {
    const registry = new MetricsRegistry();
    registry.getOrCreateCounter('requests');

    expect(() => registry.getOrCreateStat('requests')).toThrow(MetricTypeMismatchError);
  });

  it('should render the Prometheus text exposition', async () => {
    const registry = new MetricsRegistry();
    registry.getOrCreateCounter('srv/requests', 'Requests received').inc(2);

    const text = await registry.prometheusText();

    expect(text).toContain('# HELP srv_requests Requests received');
    expect(text).toContain('srv_requests 2');
  });

  it('should keep a colliding gauge exported when the other name is removed', async () => {
    const registry = new MetricsRegistry();
    registry.registerGauge('queue/depth', () => 3);
    registry.registerGauge('queue.depth', () => 7);

    registry.unregisterGauge('queue/depth');

    expect(registry.names()).toEqual(['queue.depth']);
    expect(await registry.sample()).toEqual({ 'queue.depth': 3 });
    expect(await registry.prometheusText()).toContain('queue_depth 3');

    registry.unregisterGauge('queue.depth');

    expect(registry.names()).toEqual([]);
    expect(await registry.prometheusText()).not.toContain('queue_depth');
  });
});
