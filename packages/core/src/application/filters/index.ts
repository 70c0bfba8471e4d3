/**
 * @fileoverview Application Filters Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/application/filters
 * @license Apache-2.0
 */

export { RequeueFilter, RETRIES_ROLE, type IRequeueFilterOptions } from './requeue.filter';
export { StatsFilter, STATS_ROLE, type IStatsFilterOptions } from './stats.filter';
export {
  ContextBindingFilter,
  REQUEST_ID_KEY,
  type IContextBindingFilterOptions,
} from './context-binding.filter';
