/**
 * @fileoverview Metrics Errors
 *
 * @module @threadline/core/infrastructure/metrics
 * @license Apache-2.0
 */

import { ThreadlineError } from '../../domain/context';

export class InvalidScopeSeparatorError extends ThreadlineError {
  constructor(separator: string) {
    super(`Scope separator should be one symbol: '${separator}'`);
  }
}

/**
 * A metric name was requested as one kind after being registered as another.
 */
export class MetricTypeMismatchError extends ThreadlineError {
  public readonly metricName: string;

  constructor(metricName: string, registered: string, requested: string) {
    super(`Metric '${metricName}' is a ${registered}, cannot use it as a ${requested}`);
    this.metricName = metricName;
  }
}
