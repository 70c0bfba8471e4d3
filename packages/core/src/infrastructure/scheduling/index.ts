/**
 * @fileoverview Infrastructure Scheduling Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/scheduling
 * @license Apache-2.0
 */

export { TaskPool, type ISubmitOptions } from './task-pool';
export { TaskCancelledError } from './scheduling.errors';
