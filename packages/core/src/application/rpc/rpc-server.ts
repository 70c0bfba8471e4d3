/**
 * @fileoverview RpcServer - Restores the Sender's Scope Around Each Handler
 *
 * @packageDocumentation
 * @module @threadline/core/application/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Receive Path
 *
 * ```
 * frame ─▶ decodeEnvelope ─▶ restoreContexts ─▶ runWith(restored scope) {
 *                                                  server filters ─▶ handler
 *                                               } ─▶ reply frame
 * ```
 *
 * The restored scope replaces whatever scope the server was in. It stays
 * installed for every continuation of the handler, so calls the handler
 * makes to other services carry the same broadcast entries onward.
 *
 * `receive` never rejects: every failure, including a malformed envelope,
 * becomes an error reply.
 *
 * @version 1.0.0
 */

import { type BroadcastKey } from '../../domain/context';
import { type IStatsReceiver, NullStatsReceiver } from '../../domain/metrics';
import {
  type IFilter,
  type IFrameHandler,
  RejectedError,
  type Service,
  chain,
} from '../../domain/rpc';
import { BroadcastContext } from '../../infrastructure/context';
import { defaultLogger, type Logger } from '../../infrastructure/logging';
import { encodeFailure, encodeSuccess } from '../../infrastructure/rpc';
import {
  BroadcastKeyRegistry,
  type IEnvelope,
  decodeEnvelope,
  restoreContexts,
} from '../../infrastructure/wire';
import { StatsFilter } from '../filters';

export interface IRpcServerOptions {
  /** Appears in metric names (`srv/<label>/...`) and logs. Default `server`. */
  label?: string;

  stats?: IStatsReceiver;

  logger?: Logger;

  /**
   * Application keys to restore, in addition to Retries and Dtab.
   * Ignored when `registry` is given.
   */
  keys?: ReadonlyArray<BroadcastKey<unknown>>;

  /** Complete set of keys to restore. */
  registry?: BroadcastKeyRegistry;

  /** Filters between the restored scope and the handler, outermost first. */
  filters?: ReadonlyArray<IFilter<Buffer, Buffer>>;
}

export class RpcServer implements IFrameHandler {
  readonly label: string;
  readonly registry: BroadcastKeyRegistry;

  private readonly logger: Logger;
  private readonly service: Service<Buffer, Buffer>;
  private readonly waitingForDrain: Array<() => void> = [];
  private inFlight = 0;
  private closed = false;

  constructor(handler: Service<Buffer, Buffer>, options: IRpcServerOptions = {}) {
    this.label = options.label ?? 'server';
    this.registry = options.registry ?? BroadcastKeyRegistry.withDefaults(options.keys);
    this.logger = (options.logger ?? defaultLogger()).child({
      component: 'RpcServer',
      server: this.label,
    });

    const stats = (options.stats ?? NullStatsReceiver).scope('srv', this.label);
    stats.addGauge({ name: ['pending'] }, () => this.inFlight);
    this.service = chain([new StatsFilter(stats), ...(options.filters ?? [])], handler);
  }

  /** Requests currently being handled. */
  get pending(): number {
    return this.inFlight;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async receive(frame: Buffer): Promise<Buffer> {
    if (this.closed) {
      return encodeFailure(new RejectedError(`server '${this.label}' is closed`));
    }

    let envelope: IEnvelope;
    try {
      envelope = decodeEnvelope(frame);
    } catch (error) {
      this.logger.warn({ err: error }, 'rejecting malformed request frame');
      return encodeFailure(error);
    }

    const restored = restoreContexts(envelope.contexts, this.registry, this.logger);
    this.inFlight++;
    try {
      const reply = await BroadcastContext.runWith(restored, () => this.service(envelope.payload));
      return encodeSuccess(reply);
    } catch (error) {
      this.logger.debug({ err: error }, 'handler failed');
      return encodeFailure(error);
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) this.notifyDrained();
    }
  }

  /**
   * Refuse new requests and wait for in-flight ones to finish.
   */
  close(): Promise<void> {
    this.closed = true;
    if (this.inFlight === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waitingForDrain.push(resolve));
  }

  private notifyDrained(): void {
    for (const resolve of this.waitingForDrain.splice(0)) {
      resolve();
    }
  }
}
