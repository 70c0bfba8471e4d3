/**
 * @fileoverview Infrastructure Metrics Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/metrics
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

export { MetricsRegistry, toExportedName } from './metrics-registry';

export {
  MetricsStatsReceiver,
  type IMetricsStatsReceiverOptions,
} from './metrics-stats-receiver';

export {
  MetricsExporter,
  type IMetricsExporterOptions,
  type IJsonOptions,
  type ICloseOptions,
} from './metrics-exporter';

export { InvalidScopeSeparatorError, MetricTypeMismatchError } from './metrics.errors';
