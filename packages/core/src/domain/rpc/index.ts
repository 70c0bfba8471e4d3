/**
 * @fileoverview Domain RPC Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/domain/rpc
 * @license Apache-2.0
 */

export {
  type Service,
  type IFilter,
  type IStackModule,
  Role,
  andThen,
  chain,
} from './service.interface';

export {
  RpcError,
  WriteError,
  RejectedError,
  TransportClosedError,
  RemoteError,
  RetryBudgetExhaustedError,
  isRetryable,
} from './rpc.errors';

export { type ITransport, type IFrameHandler } from './transport.interface';
