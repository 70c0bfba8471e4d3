/**
 * @fileoverview Context Snapshot - Immutable Scope Storage
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The value installed in AsyncLocalStorage for each scope.
 *
 * **Why immutable?**
 *
 * A snapshot is captured whenever async work is scheduled (a promise
 * continuation, a timer, a pool task). If scopes were mutated in place, a
 * continuation could observe bindings added after it was scheduled, or
 * bindings of an unrelated request sharing the same store object. Building
 * a new snapshot per binding makes capture-at-schedule-time exact.
 *
 * **Why a Map?**
 *
 * - Preserves binding order, so wire order is deterministic
 * - O(1) lookup by key id
 * - No prototype pollution concerns
 *
 * @internal
 */

import {
  BroadcastKey,
  type ContextKey,
  type IContextEntry,
  type IContextSnapshot,
} from '../../domain/context';

/**
 * Build the entry for a binding, capturing the marshaller while `T` is known.
 *
 * @internal
 */
export function createEntry<T>(key: ContextKey<T>, value: T): IContextEntry {
  if (key instanceof BroadcastKey) {
    const broadcastKey = key;
    return {
      key,
      value,
      marshal: () => broadcastKey.marshal(value),
    };
  }
  return { key, value };
}

/**
 * ContextSnapshot - the immutable set of entries visible in one scope.
 */
export class ContextSnapshot implements IContextSnapshot {
  /** The root scope: nothing bound. */
  static readonly EMPTY = new ContextSnapshot(new Map());

  private readonly data: ReadonlyMap<string, IContextEntry>;

  private constructor(data: ReadonlyMap<string, IContextEntry>) {
    this.data = data;
    Object.freeze(this);
  }

  /**
   * Build a snapshot from entries. Later entries with the same key id win.
   */
  static of(entries: Iterable<IContextEntry>): ContextSnapshot {
    const data = new Map<string, IContextEntry>();
    for (const entry of entries) {
      data.set(entry.key.id, entry);
    }
    return data.size === 0 ? ContextSnapshot.EMPTY : new ContextSnapshot(data);
  }

  get size(): number {
    return this.data.size;
  }

  get<T>(key: ContextKey<T>): T | undefined;
  get(key: ContextKey<unknown>): unknown {
    const entry = this.data.get(key.id);
    return entry === undefined ? key.defaultValue : entry.value;
  }

  contains(key: ContextKey<unknown>): boolean {
    return this.data.has(key.id);
  }

  entries(): IterableIterator<IContextEntry> {
    return this.data.values();
  }

  broadcastEntries(): IContextEntry[] {
    return Array.from(this.data.values()).filter((entry) => entry.marshal !== undefined);
  }

  /**
   * A new snapshot with `entries` bound on top of this one.
   */
  withEntries(entries: readonly IContextEntry[]): ContextSnapshot {
    if (entries.length === 0) {
      return this;
    }
    const data = new Map(this.data);
    for (const entry of entries) {
      // Re-binding moves the key to the end so wire order follows binding order
      data.delete(entry.key.id);
      data.set(entry.key.id, entry);
    }
    return new ContextSnapshot(data);
  }

  /**
   * A new snapshot without the given keys. Returns `this` when none is bound.
   */
  without(keys: ReadonlyArray<ContextKey<unknown>>): ContextSnapshot {
    if (!keys.some((key) => this.data.has(key.id))) {
      return this;
    }
    const data = new Map(this.data);
    for (const key of keys) {
      data.delete(key.id);
    }
    return data.size === 0 ? ContextSnapshot.EMPTY : new ContextSnapshot(data);
  }

  /**
   * Plain-object view for logging.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [id, entry] of this.data) {
      result[id] = entry.value;
    }
    return result;
  }

  toString(): string {
    return `ContextSnapshot(keys=${Array.from(this.data.keys()).join(',')})`;
  }
}
