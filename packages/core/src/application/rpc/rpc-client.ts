/**
 * @fileoverview RpcClient - Context-Propagating Client
 *
 * @packageDocumentation
 * @module @threadline/core/application/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Request Path
 *
 * ```
 * call(payload)
 *   │  clear inherited Retries         (fixed, not part of the stack)
 *   ▼
 * ┌──────────────┐   ┌──────────────┐
 * │ StatsFilter  │ → │ RequeueFilter│   (stack, editable by role)
 * └──────────────┘   └──────┬───────┘
 *                           ▼
 *      marshal broadcast entries → envelope → transport → decode reply
 * ```
 *
 * The terminal service reads the scope at dispatch time, so anything bound
 * by a filter (such as the retry count) is on the wire for that attempt.
 *
 * @version 1.0.0
 */

import { type IStatsReceiver, NullStatsReceiver } from '../../domain/metrics';
import { type ITransport, type Service } from '../../domain/rpc';
import { BroadcastContext, RetriesContext } from '../../infrastructure/context';
import { defaultLogger, type Logger } from '../../infrastructure/logging';
import { decodeReply } from '../../infrastructure/rpc';
import { encodeEnvelope, marshalContexts } from '../../infrastructure/wire';
import {
  type IRequeueFilterOptions,
  RETRIES_ROLE,
  RequeueFilter,
  STATS_ROLE,
  StatsFilter,
} from '../filters';

import { Stack } from './stack';

export interface IRpcClientOptions {
  /** Appears in metric names (`clnt/<label>/...`) and logs. Default `client`. */
  label?: string;

  /** Root receiver. The client scopes it to `clnt/<label>`. */
  stats?: IStatsReceiver;

  logger?: Logger;

  /** Options of the default retry module. */
  retries?: Omit<IRequeueFilterOptions, 'stats' | 'logger'>;
}

export class RpcClient {
  readonly label: string;
  readonly stack: Stack<Buffer, Buffer>;

  private readonly transport: ITransport;
  private readonly options: IRpcClientOptions;
  private readonly logger: Logger;
  private readonly service: Service<Buffer, Buffer>;

  constructor(transport: ITransport, options: IRpcClientOptions = {}, stack?: Stack<Buffer, Buffer>) {
    this.transport = transport;
    this.options = options;
    this.label = options.label ?? 'client';
    this.logger = (options.logger ?? defaultLogger()).child({
      component: 'RpcClient',
      client: this.label,
    });
    this.stack = stack ?? RpcClient.defaultStack(this.label, options);
    this.service = this.stack.make((frame) => this.dispatch(frame));
  }

  /**
   * The standard modules: request stats, then retries.
   */
  static defaultStack(label: string, options: IRpcClientOptions = {}): Stack<Buffer, Buffer> {
    const stats = (options.stats ?? NullStatsReceiver).scope('clnt', label);
    return Stack.of<Buffer, Buffer>([
      { role: STATS_ROLE, filter: new StatsFilter(stats) },
      {
        role: RETRIES_ROLE,
        filter: new RequeueFilter({ ...options.retries, stats, logger: options.logger }),
      },
    ]);
  }

  /**
   * A client on the same transport with an edited stack.
   *
   * @example Dropping the retry module
   * ```typescript
   * const bare = client.withStack((stack) => stack.remove(RETRIES_ROLE));
   * ```
   */
  withStack(edit: (stack: Stack<Buffer, Buffer>) => Stack<Buffer, Buffer>): RpcClient {
    return new RpcClient(this.transport, this.options, edit(this.stack));
  }

  /**
   * Send `payload` with the broadcast entries of the current scope.
   */
  call(payload: Buffer): Promise<Buffer> {
    return RetriesContext.clear(() => this.service(payload));
  }

  close(): Promise<void> {
    return this.transport.close();
  }

  private async dispatch(payload: Buffer): Promise<Buffer> {
    const contexts = marshalContexts(BroadcastContext.snapshot(), this.logger);
    this.logger.trace({ contexts: contexts.length, bytes: payload.length }, 'dispatching request');
    const reply = await this.transport.dispatch(encodeEnvelope({ contexts, payload }));
    return decodeReply(reply);
  }
}
