/**
 * @fileoverview Application RPC Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/application/rpc
 * @license Apache-2.0
 */

export { Stack } from './stack';
export { RpcClient, type IRpcClientOptions } from './rpc-client';
export { RpcServer, type IRpcServerOptions } from './rpc-server';
export {
  MethodClient,
  UnknownMethodError,
  serveIface,
  encodeCall,
  decodeCall,
  type MethodCall,
  type StringIface,
} from './method-codec';
