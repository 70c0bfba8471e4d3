/**
 * @fileoverview Context Interfaces - Snapshot and Binding Contracts
 *
 * @packageDocumentation
 * @module @threadline/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * These interfaces describe WHAT a scope looks like without specifying HOW
 * it is carried across async boundaries. The AsyncLocalStorage-backed
 * implementation lives in the Infrastructure layer.
 *
 * ## Dependency Rule Compliance
 *
 * ```
 * Domain Layer (this file)
 *     ↑ depends on nothing external
 *     |
 * Application Layer (filters)
 *     ↑ depends on Domain interfaces
 *     |
 * Infrastructure Layer (store, wire, rpc)
 *     ↑ implements Domain interfaces
 * ```
 *
 * @version 1.0.0
 */

import { type ContextKey } from './context-key';

/**
 * One bound entry of a scope.
 *
 * @remarks
 * `marshal` is present only for entries bound through a broadcast key. It is
 * captured at bind time, while the value's type is still known, so the wire
 * layer can encode entries without knowing their types.
 */
export interface IContextEntry {
  readonly key: ContextKey<unknown>;
  readonly value: unknown;
  readonly marshal?: () => Buffer;
}

/**
 * A key paired with a value of the key's type, for binding several entries
 * in one scope.
 *
 * @example
 * ```typescript
 * BroadcastContext.letAll([binding(TENANT, 'blue'), binding(DEADLINE, 500)], body);
 * ```
 */
export interface IContextBinding<T> {
  readonly key: ContextKey<T>;
  readonly value: T;
}

/**
 * Immutable view of every entry visible in a scope.
 *
 * @remarks
 * A snapshot never changes once created. Binding or clearing a key yields a
 * new snapshot, so a snapshot captured by one request cannot be altered by
 * another.
 */
export interface IContextSnapshot {
  get<T>(key: ContextKey<T>): T | undefined;

  contains(key: ContextKey<unknown>): boolean;

  /** Number of bound entries. */
  readonly size: number;

  /** Entries in binding order. */
  entries(): IterableIterator<IContextEntry>;

  /** Entries that travel on the wire. */
  broadcastEntries(): IContextEntry[];
}

/**
 * Build a typed binding.
 */
export function binding<T>(key: ContextKey<T>, value: T): IContextBinding<T> {
  return { key, value };
}
