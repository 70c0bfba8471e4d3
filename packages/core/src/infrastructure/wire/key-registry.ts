/**
 * @fileoverview BroadcastKeyRegistry - Wire Id to Key Lookup
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/wire
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The receiving side only restores entries whose id is registered here.
 * Unregistered ids are skipped, which lets newer peers add keys without
 * breaking older ones.
 */

import { type BroadcastKey, DuplicateKeyError } from '../../domain/context';
import { RETRIES_KEY } from '../../domain/retries';
import { DTAB_LOCAL_KEY } from '../../domain/routing';

export class BroadcastKeyRegistry {
  private readonly keys = new Map<string, BroadcastKey<unknown>>();

  constructor(keys: ReadonlyArray<BroadcastKey<unknown>> = []) {
    this.register(...keys);
  }

  /**
   * A registry holding the well-known keys (retries, local Dtab) plus `keys`.
   */
  static withDefaults(keys: ReadonlyArray<BroadcastKey<unknown>> = []): BroadcastKeyRegistry {
    return new BroadcastKeyRegistry([RETRIES_KEY, DTAB_LOCAL_KEY, ...keys]);
  }

  /**
   * Register keys. Registering the same key twice is a no-op.
   *
   * @throws DuplicateKeyError if a different key already uses the id
   */
  register(...keys: ReadonlyArray<BroadcastKey<unknown>>): this {
    for (const key of keys) {
      const existing = this.keys.get(key.id);
      if (existing !== undefined && existing !== key) {
        throw new DuplicateKeyError(key.id);
      }
      this.keys.set(key.id, key);
    }
    return this;
  }

  lookup(id: string): BroadcastKey<unknown> | undefined {
    return this.keys.get(id);
  }

  has(id: string): boolean {
    return this.keys.has(id);
  }

  ids(): string[] {
    return Array.from(this.keys.keys());
  }
}
