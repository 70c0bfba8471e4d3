/**
 * @fileoverview ContextKey / BroadcastKey Unit Tests
 *
 * Tests for typed keys and the stock value codecs.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import {
  BroadcastKey,
  ContextKey,
  DecodeError,
  bytesCodec,
  int32Codec,
  utf8Codec,
} from '../../../src/domain/context/index.js';
import { jsonCodec } from '../../../src/infrastructure/wire/index.js';

describe('ContextKey', () => {
  // ============================================================================
  // Construction Tests
  // ============================================================================

  describe('constructor', () => {
    it('should create a key with only id', () => {
      const key = new ContextKey<string>('testKey');

      expect(key.id).toBe('testKey');
      expect(key.description).toBeUndefined();
      expect(key.defaultValue).toBeUndefined();
    });

    it('should create a key with all options', () => {
      const key = new ContextKey<boolean>('enabled', {
        description: 'Feature flag',
        defaultValue: false,
      });

      expect(key.id).toBe('enabled');
      expect(key.description).toBe('Feature flag');
      expect(key.defaultValue).toBe(false);
    });

    it('should be frozen', () => {
      const key = new ContextKey<string>('frozen');

      expect(Object.isFrozen(key)).toBe(true);
    });
  });

  describe('isBroadcast', () => {
    it('should be false for process-local keys', () => {
      expect(new ContextKey<string>('local').isBroadcast).toBe(false);
    });

    it('should be true for broadcast keys', () => {
      expect(new BroadcastKey<string>('wire', utf8Codec).isBroadcast).toBe(true);
    });
  });

  describe('isContextKey()', () => {
    it('should accept both key kinds', () => {
      expect(ContextKey.isContextKey(new ContextKey('a'))).toBe(true);
      expect(ContextKey.isContextKey(new BroadcastKey('b', utf8Codec))).toBe(true);
    });

    it('should reject lookalikes', () => {
      expect(ContextKey.isContextKey({ id: 'a' })).toBe(false);
      expect(ContextKey.isContextKey('a')).toBe(false);
      expect(ContextKey.isContextKey(null)).toBe(false);
    });
  });

  describe('toString()', () => {
    it('should name the key kind and id', () => {
      expect(new ContextKey('local.id').toString()).toBe('ContextKey(local.id)');
      expect(new BroadcastKey('wire.id', utf8Codec).toString()).toBe('BroadcastKey(wire.id)');
    });
  });
});

describe('BroadcastKey', () => {
  const GREETING = new BroadcastKey<string>('com.example.Greeting', utf8Codec);

  it('should be frozen', () => {
    expect(Object.isFrozen(GREETING)).toBe(true);
  });

  it('should marshal through its codec', () => {
    expect(GREETING.marshal('hi')).toEqual(Buffer.from('hi', 'utf8'));
  });

  it('should return ok for a valid encoding', () => {
    const result = GREETING.tryUnmarshal(Buffer.from('hello context world', 'utf8'));

    expect(result).toEqual({ ok: true, value: 'hello context world' });
  });

  it('should return a DecodeError instead of throwing', () => {
    const result = GREETING.tryUnmarshal(Buffer.from([0xff, 0xfe]));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DecodeError);
    expect(result.error.keyId).toBe('com.example.Greeting');
    expect(result.error.cause).toBeInstanceOf(TypeError);
  });
});

describe('stock codecs', () => {
  describe('bytesCodec', () => {
    it('should copy on marshal and unmarshal', () => {
      const original = Buffer.from([1, 2, 3]);
      const encoded = bytesCodec.marshal(original);
      original[0] = 9;

      expect(encoded).toEqual(Buffer.from([1, 2, 3]));
      expect(bytesCodec.unmarshal(encoded)).not.toBe(encoded);
    });
  });

  describe('utf8Codec', () => {
    it('should round-trip non-ASCII text', () => {
      const text = 'zürich → 東京';

      expect(utf8Codec.unmarshal(utf8Codec.marshal(text))).toBe(text);
    });

    it('should reject invalid UTF-8', () => {
      expect(() => utf8Codec.unmarshal(Buffer.from([0xc3]))).toThrow(TypeError);
    });
  });

  describe('int32Codec', () => {
    it('should encode big-endian', () => {
      expect(int32Codec.marshal(1)).toEqual(Buffer.from([0, 0, 0, 1]));
      expect(int32Codec.marshal(-1)).toEqual(Buffer.from([0xff, 0xff, 0xff, 0xff]));
    });

    it('should round-trip the extremes', () => {
      expect(int32Codec.unmarshal(int32Codec.marshal(2147483647))).toBe(2147483647);
      expect(int32Codec.unmarshal(int32Codec.marshal(-2147483648))).toBe(-2147483648);
    });

    it('should reject values outside 32 bits', () => {
      expect(() => int32Codec.marshal(2147483648)).toThrow('Not a 32-bit integer: 2147483648');
      expect(() => int32Codec.marshal(1.5)).toThrow(RangeError);
    });

    it('should reject encodings that are not 4 bytes', () => {
      expect(() => int32Codec.unmarshal(Buffer.from([0, 1]))).toThrow('Expected 4 bytes, got 2');
    });
  });

  describe('jsonCodec', () => {
    const codec = jsonCodec(z.object({ tenant: z.string(), shard: z.number().int() }));

    it('should round-trip a valid value', () => {
      const value = { tenant: 'blue', shard: 3 };

      expect(codec.unmarshal(codec.marshal(value))).toEqual(value);
    });

    it('should reject a body that fails the schema', () => {
      expect(() => codec.unmarshal(Buffer.from('{"tenant":"blue"}', 'utf8'))).toThrow(z.ZodError);
    });

    it('should reject a body that is not JSON', () => {
      expect(() => codec.unmarshal(Buffer.from('not json', 'utf8'))).toThrow(SyntaxError);
    });
  });
});
