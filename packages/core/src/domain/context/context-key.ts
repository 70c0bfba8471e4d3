/**
 * @fileoverview ContextKey<T> / BroadcastKey<T> - Type-Safe Context Keys
 *
 * @packageDocumentation
 * @module @threadline/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Keys identify entries in the broadcast context. A key carries the value
 * type at compile time so lookups never need a cast.
 *
 * Two flavours exist:
 *
 * - **ContextKey<T>**: process-local. Visible to everything running in the
 *   scope that set it, never written to the wire.
 * - **BroadcastKey<T>**: wire-visible. Owns exactly one codec pair and is
 *   marshalled into every outbound request made inside the scope.
 *
 * ```typescript
 * const TENANT = new BroadcastKey<string>('acme.Tenant', utf8Codec);
 *
 * BroadcastContext.let(TENANT, 'blue', () => client.call('query', 'ok'));
 * // the server handler sees BroadcastContext.get(TENANT) === 'blue'
 * ```
 *
 * @version 1.0.0
 */

import { DecodeError } from './context.errors';

/**
 * Symbol used as internal brand for type discrimination.
 * @internal
 */
const CONTEXT_KEY_BRAND = Symbol('ContextKey');

/**
 * Result of decoding a wire value.
 *
 * @template T - Decoded value type
 */
export type Try<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

/**
 * Marshal/unmarshal pair for one kind of context value.
 *
 * @remarks
 * `unmarshal` throws on malformed input; {@link BroadcastKey.tryUnmarshal}
 * turns the throw into a {@link DecodeError} scoped to the key.
 */
export interface IContextCodec<T> {
  marshal(value: T): Buffer;
  unmarshal(buf: Buffer): T;
}

/**
 * ContextKey<T> - A type-safe, process-local key.
 *
 * @template T - The type of value this key stores
 *
 * @example
 * ```typescript
 * const DEADLINE = new ContextKey<number>('deadline', { defaultValue: 0 });
 *
 * BroadcastContext.let(DEADLINE, Date.now() + 500, () => {
 *   BroadcastContext.get(DEADLINE); // number
 * });
 * ```
 */
export class ContextKey<T> {
  /**
   * Internal brand for type discrimination.
   * @internal
   */
  readonly [CONTEXT_KEY_BRAND]: true = true;

  /**
   * Stable identifier. Used for registration and dedup, and as the wire id
   * of broadcast keys.
   */
  readonly id: string;

  /** Human-readable description of what this key stores. */
  readonly description?: string;

  /** Value returned by lookups when the key is not bound in the current scope. */
  readonly defaultValue?: T;

  /**
   * Phantom type field to carry type information.
   * @internal
   */
  declare readonly _type: T;

  constructor(
    id: string,
    options?: {
      description?: string;
      defaultValue?: T;
    },
  ) {
    this.id = id;
    if (options?.description !== undefined) this.description = options.description;
    if (options?.defaultValue !== undefined) this.defaultValue = options.defaultValue;
    if (new.target === ContextKey) Object.freeze(this);
  }

  /** Whether values bound to this key travel with outbound requests. */
  get isBroadcast(): boolean {
    return false;
  }

  toString(): string {
    return `ContextKey(${this.id})`;
  }

  /**
   * Check if a value is a ContextKey instance.
   */
  static isContextKey(value: unknown): value is ContextKey<unknown> {
    return value instanceof ContextKey && value[CONTEXT_KEY_BRAND] === true;
  }
}

/**
 * BroadcastKey<T> - A wire-visible key with its codec.
 *
 * @template T - The type of value this key stores
 *
 * @remarks
 * The codec is fixed at construction. Decode failures are reported through
 * {@link Try} and never thrown, so one bad entry cannot abort decoding of
 * its neighbours in the same envelope.
 *
 * @example
 * ```typescript
 * const TEST_CONTEXT = new BroadcastKey<Buffer>('com.example.TestContext', bytesCodec);
 * ```
 */
export class BroadcastKey<T> extends ContextKey<T> {
  private readonly codec: IContextCodec<T>;

  constructor(
    id: string,
    codec: IContextCodec<T>,
    options?: {
      description?: string;
      defaultValue?: T;
    },
  ) {
    super(id, options);
    this.codec = codec;
    Object.freeze(this);
  }

  override get isBroadcast(): boolean {
    return true;
  }

  marshal(value: T): Buffer {
    return this.codec.marshal(value);
  }

  tryUnmarshal(buf: Buffer): Try<T> {
    try {
      return { ok: true, value: this.codec.unmarshal(buf) };
    } catch (error) {
      return { ok: false, error: new DecodeError(this.id, error) };
    }
  }

  override toString(): string {
    return `BroadcastKey(${this.id})`;
  }

  static isBroadcastKey(value: unknown): value is BroadcastKey<unknown> {
    return value instanceof BroadcastKey;
  }
}

/**
 * Type helper to extract the value type from a ContextKey.
 *
 * @example
 * ```typescript
 * type Tenant = ContextKeyValue<typeof TENANT>; // string
 * ```
 */
export type ContextKeyValue<K> = K extends ContextKey<infer V> ? V : never;
