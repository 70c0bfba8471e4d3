/**
 * @fileoverview Stock Context Codecs
 *
 * @packageDocumentation
 * @module @threadline/core/domain/context
 * @license Apache-2.0
 *
 * Codecs for the value shapes most context entries use. Each `unmarshal`
 * throws on input it cannot read; the owning key converts that into a
 * `DecodeError`.
 */

import { type IContextCodec } from './context-key';

/** Raw bytes, copied on both sides so callers never share a buffer with the wire. */
export const bytesCodec: IContextCodec<Buffer> = {
  marshal: (value) => Buffer.from(value),
  unmarshal: (buf) => Buffer.from(buf),
};

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 text. Invalid sequences are rejected rather than replaced. */
export const utf8Codec: IContextCodec<string> = {
  marshal: (value) => Buffer.from(value, 'utf8'),
  unmarshal: (buf) => utf8Decoder.decode(buf),
};

/** 32-bit big-endian signed integer. */
export const int32Codec: IContextCodec<number> = {
  marshal(value) {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new RangeError(`Not a 32-bit integer: ${value}`);
    }
    const buf = Buffer.alloc(4);
    buf.writeInt32BE(value, 0);
    return buf;
  },
  unmarshal(buf) {
    if (buf.length !== 4) {
      throw new RangeError(`Expected 4 bytes, got ${buf.length}`);
    }
    return buf.readInt32BE(0);
  },
};
