/**
 * @fileoverview Dtab broadcast key
 *
 * @packageDocumentation
 * @module @threadline/core/domain/routing
 * @license Apache-2.0
 */

import { BroadcastKey, type IContextCodec } from '../context/context-key';
import { utf8Codec } from '../context/context-codec';
import { Dtab } from './dtab';

/**
 * Wire identifier of the local Dtab override.
 */
export const DTAB_KEY_ID = 'com.twitter.finagle.Dtab';

const dtabCodec: IContextCodec<Dtab> = {
  marshal: (value) => utf8Codec.marshal(value.show()),
  unmarshal: (buf) => Dtab.read(utf8Codec.unmarshal(buf)),
};

/**
 * Broadcast key holding the request-scoped Dtab override, carried on the
 * wire as its UTF-8 `show()` form.
 */
export const DTAB_LOCAL_KEY = new BroadcastKey<Dtab>(DTAB_KEY_ID, dtabCodec, {
  description: 'Request-scoped delegation table override',
});
