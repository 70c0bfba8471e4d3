/**
 * @fileoverview Infrastructure Wire Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/wire
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Envelope framing, the key registry and the marshal/restore pair used at
 * each hop.
 */

export {
  type IEnvelope,
  type IWireContext,
  encodeEnvelope,
  decodeEnvelope,
} from './envelope';

export { BroadcastKeyRegistry } from './key-registry';

export { marshalContexts, restoreContexts } from './context-propagation';

export { jsonCodec } from './json-codec';
