/**
 * @fileoverview RetriesContext - Scoped Access to the Retry Count
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

import { RETRIES_KEY, Retries } from '../../domain/retries';

import { BroadcastContext } from './broadcast-context';

export class RetriesContext {
  private constructor() {}

  /**
   * The retry count sent by the inbound client, or `undefined` when that
   * client had no retry module.
   */
  static current(): Retries | undefined {
    return BroadcastContext.get(RETRIES_KEY);
  }

  /**
   * Run `body` with the retry count set to `attempt`.
   */
  static let<R>(attempt: number, body: () => R): R {
    return BroadcastContext.let(RETRIES_KEY, new Retries(attempt), body);
  }

  /**
   * Run `body` with no retry count, so none is forwarded.
   */
  static clear<R>(body: () => R): R {
    return BroadcastContext.letClear(RETRIES_KEY, body);
  }
}
