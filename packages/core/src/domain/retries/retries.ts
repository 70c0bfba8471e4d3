/**
 * @fileoverview Retries - Wire-Propagated Retry Count
 *
 * @packageDocumentation
 * @module @threadline/core/domain/retries
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The number of times the current logical request has already been retried
 * by the client that sent it.
 *
 * Presence carries meaning:
 *
 * | On the wire    | Meaning                                            |
 * |----------------|----------------------------------------------------|
 * | absent         | the sending client has no retry module             |
 * | `Retries(0)`   | retry module present, this is the first attempt    |
 * | `Retries(n)`   | this is retry number `n`                           |
 *
 * @version 1.0.0
 */

import { BroadcastKey, type IContextCodec } from '../context/context-key';
import { int32Codec } from '../context/context-codec';

/**
 * Wire identifier of the retry count entry.
 */
export const RETRIES_KEY_ID = 'com.twitter.finagle.Retries';

export class Retries {
  readonly attempt: number;

  constructor(attempt: number) {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw new RangeError(`Retries must be a non-negative integer, got ${attempt}`);
    }
    this.attempt = attempt;
    Object.freeze(this);
  }

  equals(other: Retries | undefined): boolean {
    return other !== undefined && other.attempt === this.attempt;
  }

  toString(): string {
    return `Retries(${this.attempt})`;
  }
}

const retriesCodec: IContextCodec<Retries> = {
  marshal: (value) => int32Codec.marshal(value.attempt),
  unmarshal: (buf) => new Retries(int32Codec.unmarshal(buf)),
};

/**
 * Broadcast key for {@link Retries}. Encoded as a 4-byte big-endian integer.
 */
export const RETRIES_KEY = new BroadcastKey<Retries>(RETRIES_KEY_ID, retriesCodec, {
  description: 'Number of times this request has already been retried upstream',
});
