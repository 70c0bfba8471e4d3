/**
 * @fileoverview Domain Metrics Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/domain/metrics
 * @license Apache-2.0
 */

export {
  Verbosity,
  type IMetricSchema,
  type ICounter,
  type IStat,
  type IGauge,
  type IStatsReceiver,
  NullStatsReceiver,
  toSchema,
} from './stats-receiver.interface';
