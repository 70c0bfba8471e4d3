/**
 * @fileoverview DtabLocal - Request-Scoped Routing Override
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The local Dtab is an ordinary broadcast entry under `DTAB_LOCAL_KEY`, so it
 * follows the same scoping rules as every other entry and crosses hops with
 * the rest of the context.
 *
 * ```typescript
 * await DtabLocal.push(Dtab.read('/foo=>/bar'), () => client.call('query', 'ok'));
 * ```
 *
 * @version 1.0.0
 */

import { DTAB_LOCAL_KEY, Dtab } from '../../domain/routing';

import { BroadcastContext } from './broadcast-context';

export class DtabLocal {
  private constructor() {}

  /**
   * The override in effect on this call path, {@link Dtab.empty} by default.
   */
  static current(): Dtab {
    return BroadcastContext.get(DTAB_LOCAL_KEY) ?? Dtab.empty;
  }

  /**
   * Run `body` with `rules` layered over the current override: `rules` are
   * consulted first and the inherited rules remain as fallback.
   */
  static push<R>(rules: Dtab, body: () => R): R {
    return DtabLocal.let(rules.concat(DtabLocal.current()), body);
  }

  /**
   * Run `body` with `dtab` replacing the current override. An empty table
   * unbinds the entry so nothing is put on the wire.
   */
  static let<R>(dtab: Dtab, body: () => R): R {
    if (dtab.isEmpty) {
      return BroadcastContext.letClear(DTAB_LOCAL_KEY, body);
    }
    return BroadcastContext.let(DTAB_LOCAL_KEY, dtab, body);
  }

  static clear<R>(body: () => R): R {
    return BroadcastContext.letClear(DTAB_LOCAL_KEY, body);
  }
}
