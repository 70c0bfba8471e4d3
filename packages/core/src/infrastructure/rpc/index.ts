/**
 * @fileoverview Infrastructure RPC Module Exports
 *
 * @module @threadline/core/infrastructure/rpc
 * @license Apache-2.0
 */

export { LoopbackTransport } from './loopback-transport';

export {
  type ErrorBody,
  toErrorBody,
  encodeSuccess,
  encodeFailure,
  decodeReply,
} from './reply-codec';
