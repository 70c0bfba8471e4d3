/**
 * @fileoverview Stack - Ordered, Editable Filter Modules
 *
 * @packageDocumentation
 * @module @threadline/core/application/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A client's filters, outermost first, each under a {@link Role}. Stacks are
 * immutable; every edit returns a new stack.
 *
 * ```typescript
 * const stack = Stack.of([
 *   { role: STATS_ROLE, filter: new StatsFilter(stats) },
 *   { role: RETRIES_ROLE, filter: new RequeueFilter() },
 * ]);
 *
 * stack.remove(RETRIES_ROLE).roles; // [STATS_ROLE]
 * ```
 *
 * @version 1.0.0
 */

import {
  type IFilter,
  type IStackModule,
  type Role,
  type Service,
  chain,
} from '../../domain/rpc';

export class Stack<TRequest, TResponse> {
  readonly modules: ReadonlyArray<IStackModule<TRequest, TResponse>>;

  private constructor(modules: ReadonlyArray<IStackModule<TRequest, TResponse>>) {
    this.modules = Object.freeze([...modules]);
  }

  static of<TRequest, TResponse>(
    modules: ReadonlyArray<IStackModule<TRequest, TResponse>> = [],
  ): Stack<TRequest, TResponse> {
    return new Stack(modules);
  }

  get roles(): Role[] {
    return this.modules.map((module) => module.role);
  }

  contains(role: Role): boolean {
    return this.modules.some((module) => module.role === role);
  }

  /** Without the module under `role`. Unchanged if there is none. */
  remove(role: Role): Stack<TRequest, TResponse> {
    return new Stack(this.modules.filter((module) => module.role !== role));
  }

  /** With the filter under `role` swapped. Unchanged if there is none. */
  replace(role: Role, filter: IFilter<TRequest, TResponse>): Stack<TRequest, TResponse> {
    return new Stack(
      this.modules.map((module) => (module.role === role ? { role, filter } : module)),
    );
  }

  /** With `module` outermost. */
  prepend(module: IStackModule<TRequest, TResponse>): Stack<TRequest, TResponse> {
    return new Stack([module, ...this.modules]);
  }

  /** With `module` innermost. */
  append(module: IStackModule<TRequest, TResponse>): Stack<TRequest, TResponse> {
    return new Stack([...this.modules, module]);
  }

  /** Compose the filters in front of `service`. */
  make(service: Service<TRequest, TResponse>): Service<TRequest, TResponse> {
    return chain(
      this.modules.map((module) => module.filter),
      service,
    );
  }

  toString(): string {
    return `Stack(${this.modules.map((module) => module.role.name).join(' -> ')})`;
  }
}
