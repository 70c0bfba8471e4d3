/**
 * @fileoverview Marshal / Restore Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  BroadcastKey,
  ContextKey,
  DecodeError,
  DuplicateKeyError,
  type IContextCodec,
  utf8Codec,
} from '../../../src/domain/context/index.js';
import { RETRIES_KEY, RETRIES_KEY_ID, Retries } from '../../../src/domain/retries/index.js';
import { DTAB_KEY_ID, DTAB_LOCAL_KEY, Dtab } from '../../../src/domain/routing/index.js';
import { BroadcastContext, ContextSnapshot, createEntry } from '../../../src/infrastructure/context/index.js';
import { makeNoopLogger } from '../../../src/infrastructure/logging/index.js';
import {
  BroadcastKeyRegistry,
  marshalContexts,
  restoreContexts,
} from '../../../src/infrastructure/wire/index.js';

const TEST_CONTEXT = new BroadcastKey<string>('com.example.TestContext', utf8Codec);
const LOCAL_ONLY = new ContextKey<string>('local.only');

const failingCodec: IContextCodec<string> = {
  marshal: () => {
    throw new Error('cannot encode');
  },
  unmarshal: (buf) => buf.toString(),
};
const UNENCODABLE = new BroadcastKey<string>('com.example.Unencodable', failingCodec);
const OVERSIZED = new BroadcastKey<string>('com.example.Oversized', utf8Codec);

const wire = (id: string, value: Buffer): { key: Buffer; value: Buffer } => ({
  key: Buffer.from(id, 'utf8'),
  value,
});

describe('Context propagation', () => {
  // ============================================================================
  // Send Side
  // ============================================================================

  describe('marshalContexts()', () => {
    it('should encode broadcast entries and skip local ones', () => {
      const snapshot = ContextSnapshot.of([
        createEntry(TEST_CONTEXT, 'hello context world'),
        createEntry(LOCAL_ONLY, 'stays here'),
        createEntry(RETRIES_KEY, new Retries(0)),
      ]);

      const contexts = marshalContexts(snapshot, makeNoopLogger());

      expect(contexts.map((c) => c.key.toString())).toEqual([
        'com.example.TestContext',
        RETRIES_KEY_ID,
      ]);
      expect(contexts[0]?.value.toString()).toBe('hello context world');
      expect(contexts[1]?.value).toEqual(Buffer.from([0, 0, 0, 0]));
    });

    it('should drop an entry that fails to encode and log a warning', () => {
      const logger = makeNoopLogger();
      const warn = vi.spyOn(logger, 'warn');
      const snapshot = ContextSnapshot.of([
        createEntry(UNENCODABLE, 'x'),
        createEntry(TEST_CONTEXT, 'kept'),
      ]);

      const contexts = marshalContexts(snapshot, logger);

      expect(contexts.map((c) => c.key.toString())).toEqual(['com.example.TestContext']);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should drop an entry too long for its length prefix and keep the others', () => {
      const logger = makeNoopLogger();
      const warn = vi.spyOn(logger, 'warn');
      const snapshot = ContextSnapshot.of([
        createEntry(OVERSIZED, 'x'.repeat(70000)),
        createEntry(TEST_CONTEXT, 'kept'),
      ]);

      const contexts = marshalContexts(snapshot, logger);

      expect(contexts.map((c) => c.key.toString())).toEqual(['com.example.TestContext']);
      expect(contexts[0]?.value.toString()).toBe('kept');
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ key: 'com.example.Oversized', err: expect.any(RangeError) }),
        'dropping context entry that failed to encode',
      );
    });

    it('should encode nothing for the empty scope', () => {
      expect(marshalContexts(BroadcastContext.snapshot(), makeNoopLogger())).toEqual([]);
    });
  });

  // ============================================================================
  // Receive Side
  // ============================================================================

  describe('restoreContexts()', () => {
    const registry = BroadcastKeyRegistry.withDefaults([TEST_CONTEXT]);

    it('should restore registered keys', () => {
      const snapshot = restoreContexts(
        [
          wire('com.example.TestContext', Buffer.from('okok')),
          wire(DTAB_KEY_ID, Buffer.from('/foo=>/bar')),
          wire(RETRIES_KEY_ID, Buffer.from([0, 0, 0, 2])),
        ],
        registry,
        makeNoopLogger(),
      );

      expect(snapshot.get(TEST_CONTEXT)).toBe('okok');
      expect(snapshot.get(DTAB_LOCAL_KEY)?.show()).toBe('/foo=>/bar');
      expect(snapshot.get(RETRIES_KEY)).toEqual(new Retries(2));
    });

    it('should restore entries that can be forwarded again', () => {
      const snapshot = restoreContexts(
        [wire('com.example.TestContext', Buffer.from('again'))],
        registry,
        makeNoopLogger(),
      );

      const forwarded = marshalContexts(snapshot, makeNoopLogger());

      expect(forwarded.map((c) => c.value.toString())).toEqual(['again']);
    });

    it('should skip unknown ids without logging', () => {
      const logger = makeNoopLogger();
      const warn = vi.spyOn(logger, 'warn');

      const snapshot = restoreContexts(
        [wire('com.example.Unknown', Buffer.from('?')), wire('com.example.TestContext', Buffer.from('ok'))],
        registry,
        logger,
      );

      expect(snapshot.size).toBe(1);
      expect(snapshot.get(TEST_CONTEXT)).toBe('ok');
      expect(warn).not.toHaveBeenCalled();
    });

    it('should drop a malformed value, keep its neighbours and warn', () => {
      const logger = makeNoopLogger();
      const warn = vi.spyOn(logger, 'warn');

      const snapshot = restoreContexts(
        [
          wire(RETRIES_KEY_ID, Buffer.from([0, 1])),
          wire('com.example.TestContext', Buffer.from('survivor')),
        ],
        registry,
        logger,
      );

      expect(snapshot.contains(RETRIES_KEY)).toBe(false);
      expect(snapshot.get(TEST_CONTEXT)).toBe('survivor');
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ key: RETRIES_KEY_ID, err: expect.any(DecodeError) }),
        'dropping context entry that failed to decode',
      );
    });

    it('should reject a negative retry count as malformed', () => {
      const snapshot = restoreContexts(
        [wire(RETRIES_KEY_ID, Buffer.from([0xff, 0xff, 0xff, 0xff]))],
        registry,
        makeNoopLogger(),
      );

      expect(snapshot).toBe(ContextSnapshot.EMPTY);
    });

    it('should let the last occurrence of a repeated id win', () => {
      const snapshot = restoreContexts(
        [wire('com.example.TestContext', Buffer.from('one')), wire('com.example.TestContext', Buffer.from('two'))],
        registry,
        makeNoopLogger(),
      );

      expect(snapshot.get(TEST_CONTEXT)).toBe('two');
    });
  });

  // ============================================================================
  // Registry
  // ============================================================================

  describe('BroadcastKeyRegistry', () => {
    it('should include the well-known keys by default', () => {
      expect(BroadcastKeyRegistry.withDefaults().ids()).toEqual([RETRIES_KEY_ID, DTAB_KEY_ID]);
    });

    it('should accept the same key twice', () => {
      const registry = new BroadcastKeyRegistry([TEST_CONTEXT]).register(TEST_CONTEXT);

      expect(registry.ids()).toEqual(['com.example.TestContext']);
    });

    it('should refuse a different key under a taken id', () => {
      const impostor = new BroadcastKey<string>('com.example.TestContext', utf8Codec);

      expect(() => new BroadcastKeyRegistry([TEST_CONTEXT, impostor])).toThrow(DuplicateKeyError);
    });

    it('should look keys up by id', () => {
      const registry = BroadcastKeyRegistry.withDefaults();

      expect(registry.lookup(DTAB_KEY_ID)).toBe(DTAB_LOCAL_KEY);
      expect(registry.has('com.example.TestContext')).toBe(false);
      expect(registry.lookup('com.example.TestContext')).toBeUndefined();
    });
  });

  it('should restore a Dtab equal to the one sent', () => {
    const dtab = Dtab.read('/svc=>/zk/svc;/db/*=>/pg');
    const [sent] = marshalContexts(ContextSnapshot.of([createEntry(DTAB_LOCAL_KEY, dtab)]), makeNoopLogger());
    if (sent === undefined) throw new Error('nothing marshalled');

    const restored = restoreContexts([sent], BroadcastKeyRegistry.withDefaults(), makeNoopLogger());

    expect(restored.get(DTAB_LOCAL_KEY)?.equals(dtab)).toBe(true);
  });
});
