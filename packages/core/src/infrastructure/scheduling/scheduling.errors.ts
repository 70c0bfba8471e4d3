/**
 * @fileoverview Scheduling Errors
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/scheduling
 * @license Apache-2.0
 */

import { ThreadlineError } from '../../domain/context';

/**
 * A queued task was aborted before it started.
 */
export class TaskCancelledError extends ThreadlineError {
  constructor(reason?: unknown) {
    super('Task was cancelled before it started', { cause: reason });
  }
}
