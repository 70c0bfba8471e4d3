/**
 * @fileoverview BroadcastContext - AsyncLocalStorage-based Scoped Context
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Request-scoped entries that follow the logical call rather than the
 * physical stack. A binding made with `let` is visible to everything the
 * body runs, including promise continuations, timers, `nextTick` callbacks
 * and pool tasks submitted from inside the body, and to nothing else.
 *
 * ## Scoping Model
 *
 * ```
 * EMPTY
 *   └─ let(TENANT, 'blue')          { TENANT: blue }
 *        ├─ let(DEADLINE, 500)      { TENANT: blue, DEADLINE: 500 }
 *        └─ letClear(TENANT)        { }
 * ```
 *
 * Each arrow creates a new immutable snapshot; leaving the body reinstalls
 * the parent snapshot on every exit path, including throws and rejections.
 *
 * ## Performance Considerations
 *
 * `get()` is one `getStore()` plus one Map lookup. For hot loops, capture
 * `BroadcastContext.snapshot()` once and read from it.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import {
  ContextKey,
  type IContextBinding,
  ScopeLeakError,
} from '../../domain/context';

import { ContextSnapshot, createEntry } from './context-store';

/**
 * Singleton AsyncLocalStorage instance.
 *
 * @remarks
 * This MUST be a singleton: separate instances keep separate registries,
 * and bindings made through one would be invisible through the other.
 *
 * @internal
 */
const contextStorage = new AsyncLocalStorage<ContextSnapshot>();

/**
 * BroadcastContext - static access to the current scope.
 *
 * @example Binding a value for a call
 * ```typescript
 * const reply = await BroadcastContext.let(TEST_CONTEXT, 'hello', () =>
 *   client.call('query', 'ok'),
 * );
 * ```
 *
 * @example Reading in a handler
 * ```typescript
 * async function query(x: string): Promise<string> {
 *   return BroadcastContext.get(TEST_CONTEXT) ?? x + x;
 * }
 * ```
 */
export class BroadcastContext {
  private constructor() {}

  // ============================================================================
  // Reads
  // ============================================================================

  /**
   * The snapshot in effect, {@link ContextSnapshot.EMPTY} outside any scope.
   */
  static snapshot(): ContextSnapshot {
    return contextStorage.getStore() ?? ContextSnapshot.EMPTY;
  }

  /**
   * The value bound to `key` on this call path, else the key's default value.
   */
  static get<T>(key: ContextKey<T>): T | undefined {
    return BroadcastContext.snapshot().get(key);
  }

  static contains(key: ContextKey<unknown>): boolean {
    return BroadcastContext.snapshot().contains(key);
  }

  // ============================================================================
  // Scoped Bindings
  // ============================================================================

  /**
   * Run `body` with `key` bound to `value`.
   *
   * @returns Whatever `body` returns. A promise is returned as-is; its
   * continuations keep the binding because they were scheduled inside it.
   */
  static let<T, R>(key: ContextKey<T>, value: T, body: () => R): R {
    const next = BroadcastContext.snapshot().withEntries([createEntry(key, value)]);
    return BroadcastContext.runWith(next, body);
  }

  /**
   * Run `body` with every binding applied, later bindings winning.
   */
  static letAll<R>(bindings: ReadonlyArray<IContextBinding<unknown>>, body: () => R): R {
    const entries = bindings.map((b) => createEntry(b.key, b.value));
    return BroadcastContext.runWith(BroadcastContext.snapshot().withEntries(entries), body);
  }

  /**
   * Run `body` with `keys` unbound.
   */
  static letClear<R>(
    keys: ContextKey<unknown> | ReadonlyArray<ContextKey<unknown>>,
    body: () => R,
  ): R {
    const list = keys instanceof ContextKey ? [keys] : keys;
    return BroadcastContext.runWith(BroadcastContext.snapshot().without(list), body);
  }

  /**
   * Run `body` with nothing bound.
   */
  static letClearAll<R>(body: () => R): R {
    return BroadcastContext.runWith(ContextSnapshot.EMPTY, body);
  }

  /**
   * Install `snapshot` as the whole scope for `body`, replacing (not
   * merging with) the current one.
   *
   * @throws ScopeLeakError if `body` returns with another scope installed
   */
  static runWith<R>(snapshot: ContextSnapshot, body: () => R): R {
    return contextStorage.run(snapshot, () => {
      const result = body();
      const installed = contextStorage.getStore();
      if (installed !== snapshot) {
        throw new ScopeLeakError(
          `expected ${snapshot.toString()} on exit, found ${String(installed)}`,
        );
      }
      return result;
    });
  }

  // ============================================================================
  // Capture and Restore
  // ============================================================================

  /**
   * Capture the current scope now; the returned function runs `fn` in it
   * whenever and wherever it is later called.
   *
   * @remarks
   * Required wherever work is queued and later started from an unrelated
   * call path, e.g. a pool that starts the next task from the completion
   * of the previous one.
   */
  static bind<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
    const captured = BroadcastContext.snapshot();
    return (...args: A) => BroadcastContext.runWith(captured, () => fn(...args));
  }

  /**
   * The raw AsyncLocalStorage instance.
   *
   * @remarks
   * **Use with caution!** Exposed for integration with other ALS-based
   * libraries and for tests.
   *
   * @internal
   */
  static get storage(): AsyncLocalStorage<ContextSnapshot> {
    return contextStorage;
  }
}
