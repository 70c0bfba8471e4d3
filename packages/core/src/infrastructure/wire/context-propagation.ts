/**
 * @fileoverview Context Propagation - Marshal and Restore Broadcast Entries
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/wire
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The two halves of a hop:
 *
 * ```
 *  client scope ──marshalContexts──▶ [(id, bytes), ...] ──restoreContexts──▶ server scope
 * ```
 *
 * Failures are isolated per entry. An entry that cannot be encoded or
 * decoded is dropped with a `warn` log; its neighbours are unaffected.
 * Unknown ids are skipped without logging.
 *
 * @version 1.0.0
 */

import { type IContextEntry, type IContextSnapshot } from '../../domain/context';
import { ContextSnapshot, createEntry } from '../context/context-store';
import { type Logger } from '../logging';

import { type IWireContext, MAX_U16 } from './envelope';
import { type BroadcastKeyRegistry } from './key-registry';

/**
 * Encode every broadcast entry of `snapshot`, in binding order.
 * Process-local entries are never included.
 */
export function marshalContexts(snapshot: IContextSnapshot, logger: Logger): IWireContext[] {
  const contexts: IWireContext[] = [];
  for (const entry of snapshot.broadcastEntries()) {
    if (entry.marshal === undefined) continue;
    if (contexts.length === MAX_U16) {
      logger.warn({ key: entry.key.id, limit: MAX_U16 }, 'dropping context entry beyond the entry limit');
      continue;
    }
    try {
      const key = Buffer.from(entry.key.id, 'utf8');
      const value = entry.marshal();
      if (key.length > MAX_U16 || value.length > MAX_U16) {
        throw new RangeError(
          `context entry is ${key.length}+${value.length} bytes, each part is limited to ${MAX_U16}`,
        );
      }
      contexts.push({ key, value });
    } catch (error) {
      logger.warn({ err: error, key: entry.key.id }, 'dropping context entry that failed to encode');
    }
  }
  return contexts;
}

/**
 * Decode wire entries into a fresh snapshot.
 *
 * @remarks
 * Entries are staged first and the snapshot is built once, so the handler
 * sees all restored entries or (for an empty list) none. When an id appears
 * more than once, the last occurrence wins.
 */
export function restoreContexts(
  contexts: readonly IWireContext[],
  registry: BroadcastKeyRegistry,
  logger: Logger,
): ContextSnapshot {
  const staged: IContextEntry[] = [];

  for (const { key, value } of contexts) {
    const id = key.toString('utf8');
    const broadcastKey = registry.lookup(id);
    if (broadcastKey === undefined) continue;

    const decoded = broadcastKey.tryUnmarshal(value);
    if (decoded.ok) {
      staged.push(createEntry(broadcastKey, decoded.value));
    } else {
      logger.warn({ err: decoded.error, key: id }, 'dropping context entry that failed to decode');
    }
  }

  return ContextSnapshot.of(staged);
}
