/**
 * @fileoverview LoopbackTransport - In-Process Frame Hand-off
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Connects a client to a server in the same process while keeping the hop
 * honest:
 *
 * - only the frame bytes cross (copied), never objects
 * - the server runs on a later macrotask
 * - the server starts from an empty scope, so nothing reaches it except
 *   what was put in the envelope
 *
 * @version 1.0.0
 */

import { type IFrameHandler, type ITransport, TransportClosedError } from '../../domain/rpc';
import { BroadcastContext } from '../context';

export class LoopbackTransport implements ITransport {
  private readonly handler: IFrameHandler;
  private closed = false;

  constructor(handler: IFrameHandler) {
    this.handler = handler;
  }

  dispatch(frame: Buffer): Promise<Buffer> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError());
    }

    const bytes = Buffer.from(frame);
    return new Promise<Buffer>((resolve, reject) => {
      BroadcastContext.letClearAll(() => {
        setImmediate(() => {
          this.handler.receive(bytes).then((reply) => resolve(Buffer.from(reply)), reject);
        });
      });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
