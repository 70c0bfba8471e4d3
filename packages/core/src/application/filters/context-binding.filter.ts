/**
 * @fileoverview ContextBindingFilter - Per-Request Local Bindings
 *
 * @packageDocumentation
 * @module @threadline/core/application/filters
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Binds process-local entries (never sent on the wire) around each request
 * a server handles, on top of whatever arrived in the envelope.
 *
 * ```
 * ┌────────────────┐   ┌───────────────────────┐   ┌──────────┐
 * │ restored scope │ → │ ContextBindingFilter  │ → │ Handler  │
 * │ (from wire)    │   │ + REQUEST_ID (local)  │   │          │
 * └────────────────┘   └───────────────────────┘   └──────────┘
 * ```
 *
 * With no options it binds a fresh {@link REQUEST_ID_KEY}, so server-side
 * log lines of one request can be correlated.
 *
 * @version 1.0.0
 */

import { randomUUID } from 'node:crypto';

import { ContextKey, type IContextBinding, binding } from '../../domain/context';
import { type IFilter, type Service } from '../../domain/rpc';
import { BroadcastContext } from '../../infrastructure/context';

/**
 * Process-local id of the request being handled.
 */
export const REQUEST_ID_KEY = new ContextKey<string>('threadline.requestId', {
  description: 'Id of the request being handled in this process',
});

export interface IContextBindingFilterOptions<TRequest> {
  /**
   * Entries to bind for a request.
   * Default: a {@link REQUEST_ID_KEY} from `generateRequestId`.
   */
  bindings?: (request: TRequest) => ReadonlyArray<IContextBinding<unknown>>;

  /** Default: `crypto.randomUUID` */
  generateRequestId?: () => string;
}

export class ContextBindingFilter<TRequest, TResponse> implements IFilter<TRequest, TResponse> {
  private readonly options: Required<IContextBindingFilterOptions<TRequest>>;

  constructor(options: IContextBindingFilterOptions<TRequest> = {}) {
    const generateRequestId = options.generateRequestId ?? randomUUID;
    this.options = {
      generateRequestId,
      bindings: options.bindings ?? (() => [binding(REQUEST_ID_KEY, generateRequestId())]),
    };
  }

  apply(request: TRequest, next: Service<TRequest, TResponse>): Promise<TResponse> {
    return BroadcastContext.letAll(this.options.bindings(request), () => next(request));
  }
}
