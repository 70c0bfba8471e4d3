/**
 * @fileoverview Envelope - Context-Carrying Frame Format
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/wire
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every request and reply frame starts with the broadcast entries, followed
 * by the payload:
 *
 * ```
 * ┌───────────┬──────────────────────────────────────────┬─────────────┐
 * │ u16 count │ count × (u16 klen, key, u16 vlen, value) │   payload   │
 * └───────────┴──────────────────────────────────────────┴─────────────┘
 * ```
 *
 * All integers are big-endian. A count of zero means "no context"; peers
 * that know nothing about context always send that.
 *
 * @version 1.0.0
 */

import { EnvelopeFormatError } from '../../domain/context';

/** Largest count, key or value length a u16 length prefix can carry. */
export const MAX_U16 = 0xffff;

/**
 * One (key identifier, value) pair as it appears on the wire.
 */
export interface IWireContext {
  readonly key: Buffer;
  readonly value: Buffer;
}

export interface IEnvelope {
  readonly contexts: readonly IWireContext[];
  readonly payload: Buffer;
}

function checkU16(what: string, length: number): number {
  if (length > MAX_U16) {
    throw new RangeError(`${what} is ${length} bytes, the limit is ${MAX_U16}`);
  }
  return length;
}

/**
 * Frame contexts and payload into one buffer.
 *
 * @throws RangeError if there are more than 65535 entries or an entry part
 * is longer than 65535 bytes
 */
export function encodeEnvelope(envelope: IEnvelope): Buffer {
  const header = Buffer.alloc(2);
  header.writeUInt16BE(checkU16('context count', envelope.contexts.length), 0);

  const parts: Buffer[] = [header];
  for (const { key, value } of envelope.contexts) {
    const lengths = Buffer.alloc(2);
    lengths.writeUInt16BE(checkU16('context key', key.length), 0);
    parts.push(lengths, key);

    const valueLength = Buffer.alloc(2);
    valueLength.writeUInt16BE(checkU16('context value', value.length), 0);
    parts.push(valueLength, value);
  }
  parts.push(envelope.payload);

  return Buffer.concat(parts);
}

/**
 * Split a frame into contexts and payload.
 *
 * @throws EnvelopeFormatError when the frame ends inside the context section
 */
export function decodeEnvelope(frame: Buffer): IEnvelope {
  let offset = 0;

  const readU16 = (what: string): number => {
    if (offset + 2 > frame.length) {
      throw new EnvelopeFormatError(`truncated ${what}`, offset);
    }
    const value = frame.readUInt16BE(offset);
    offset += 2;
    return value;
  };

  const readBytes = (what: string, length: number): Buffer => {
    if (offset + length > frame.length) {
      throw new EnvelopeFormatError(
        `${what} needs ${length} bytes, ${frame.length - offset} left`,
        offset,
      );
    }
    const bytes = frame.subarray(offset, offset + length);
    offset += length;
    return bytes;
  };

  const count = readU16('context count');
  const contexts: IWireContext[] = [];
  for (let i = 0; i < count; i++) {
    const key = readBytes('context key', readU16('context key length'));
    const value = readBytes('context value', readU16('context value length'));
    contexts.push({ key, value });
  }

  return { contexts, payload: frame.subarray(offset) };
}
