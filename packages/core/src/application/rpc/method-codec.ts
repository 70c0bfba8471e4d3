/**
 * @fileoverview Method Codec - Interface-Style Calls over Byte Services
 *
 * @packageDocumentation
 * @module @threadline/core/application/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Maps `iface.method(arg)` onto a byte payload `{"method":"...","arg":"..."}`
 * and the reply onto a UTF-8 string.
 *
 * @example
 * ```typescript
 * const server = new RpcServer(serveIface({
 *   async query(x) {
 *     return x + x;
 *   },
 * }));
 *
 * const client = new MethodClient(new RpcClient(new LoopbackTransport(server)));
 * await client.call('query', 'ok'); // 'okok'
 * ```
 */

import { z } from 'zod';

import { ThreadlineError } from '../../domain/context';
import { type Service } from '../../domain/rpc';

import { type RpcClient } from './rpc-client';

const MethodCallSchema = z.object({
  method: z.string().min(1),
  arg: z.string(),
});

export type MethodCall = z.infer<typeof MethodCallSchema>;

/**
 * Methods taking and returning a string, keyed by name.
 */
export type StringIface = Readonly<Record<string, (arg: string) => Promise<string> | string>>;

/**
 * The payload does not name a method of the served interface.
 */
export class UnknownMethodError extends ThreadlineError {
  public readonly method: string;

  constructor(method: string) {
    super(`Unknown method '${method}'`);
    this.method = method;
  }
}

export function encodeCall(call: MethodCall): Buffer {
  return Buffer.from(JSON.stringify(call), 'utf8');
}

export function decodeCall(payload: Buffer): MethodCall {
  return MethodCallSchema.parse(JSON.parse(payload.toString('utf8')));
}

/**
 * A byte service dispatching to the own methods of `impl`.
 */
export function serveIface(impl: StringIface): Service<Buffer, Buffer> {
  return async (payload) => {
    const { method, arg } = decodeCall(payload);
    const fn = Object.hasOwn(impl, method) ? impl[method] : undefined;
    if (fn === undefined) {
      throw new UnknownMethodError(method);
    }
    const result = await fn(arg);
    return Buffer.from(result, 'utf8');
  };
}

export class MethodClient {
  readonly client: RpcClient;

  constructor(client: RpcClient) {
    this.client = client;
  }

  async call(method: string, arg: string): Promise<string> {
    const reply = await this.client.call(encodeCall({ method, arg }));
    return reply.toString('utf8');
  }
}
