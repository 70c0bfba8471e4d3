/**
 * @fileoverview Service and Filter - RPC Dispatch Contracts
 *
 * @packageDocumentation
 * @module @threadline/core/domain/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A dispatch pipeline is a chain of filters in front of a service:
 *
 * ```
 * ┌──────────┐   ┌──────────┐   ┌──────────┐   ┌──────────┐
 * │ Request  │ → │  Filter  │ → │  Filter  │ → │ Service  │
 * └──────────┘   └──────────┘   └──────────┘   └──────────┘
 * ```
 *
 * Each filter sees the request, may bind context around the call to `next`,
 * and sees the response (or failure) on the way back.
 *
 * @version 1.0.0
 */

/**
 * An asynchronous function from request to response.
 *
 * @template TRequest - Request type
 * @template TResponse - Response type
 */
export type Service<TRequest, TResponse> = (request: TRequest) => Promise<TResponse>;

/**
 * A pipeline stage wrapping a service.
 *
 * @example
 * ```typescript
 * const logging: IFilter<Buffer, Buffer> = {
 *   async apply(request, next) {
 *     logger.info({ bytes: request.length }, 'dispatch');
 *     return next(request);
 *   },
 * };
 * ```
 */
export interface IFilter<TRequest, TResponse> {
  apply(request: TRequest, next: Service<TRequest, TResponse>): Promise<TResponse>;
}

/**
 * Name under which a module sits in a client stack.
 *
 * @remarks
 * Roles compare by identity, so two roles with the same name are distinct.
 */
export class Role {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
    Object.freeze(this);
  }

  toString(): string {
    return `Role(${this.name})`;
  }
}

/**
 * A filter registered under a role.
 */
export interface IStackModule<TRequest, TResponse> {
  readonly role: Role;
  readonly filter: IFilter<TRequest, TResponse>;
}

/**
 * Bind a filter in front of a service.
 */
export function andThen<TRequest, TResponse>(
  filter: IFilter<TRequest, TResponse>,
  service: Service<TRequest, TResponse>,
): Service<TRequest, TResponse> {
  return (request) => filter.apply(request, service);
}

/**
 * Bind filters in front of a service, the first filter outermost.
 */
export function chain<TRequest, TResponse>(
  filters: ReadonlyArray<IFilter<TRequest, TResponse>>,
  service: Service<TRequest, TResponse>,
): Service<TRequest, TResponse> {
  return filters.reduceRight<Service<TRequest, TResponse>>(
    (next, filter) => andThen(filter, next),
    service,
  );
}
