/**
 * @fileoverview Context Errors - Propagation Error Classes
 *
 * @packageDocumentation
 * @module @threadline/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Error taxonomy for context propagation:
 *
 * | Error                 | Scope        | Outcome                              |
 * |-----------------------|--------------|--------------------------------------|
 * | `DecodeError`         | one entry    | entry dropped and logged             |
 * | `EnvelopeFormatError` | whole frame  | request fails before the handler     |
 * | `ScopeLeakError`      | internal     | assertion, indicates a bug           |
 * | `DuplicateKeyError`   | registration | thrown at registry setup             |
 *
 * @version 1.0.0
 */

/**
 * Base error class for all errors raised by this package.
 *
 * @example
 * ```typescript
 * try {
 *   await client.call('query', 'ok');
 * } catch (error) {
 *   if (error instanceof ThreadlineError) {
 *     logger.warn({ err: error }, error.name);
 *   }
 * }
 * ```
 */
export abstract class ThreadlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A single context entry could not be decoded.
 *
 * @remarks
 * Recoverable. The propagation layer drops the entry, logs it and carries on
 * with the remaining entries. Never surfaced to the application.
 */
export class DecodeError extends ThreadlineError {
  /** Wire identifier of the entry that failed. */
  public readonly keyId: string;

  constructor(keyId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to decode context entry '${keyId}': ${reason}`, { cause });
    this.keyId = keyId;
  }
}

/**
 * The envelope framing itself is malformed.
 *
 * @remarks
 * Fatal for the request: the frame cannot be split into context entries and
 * payload, so the handler is never invoked.
 */
export class EnvelopeFormatError extends ThreadlineError {
  /** Byte offset at which decoding gave up. */
  public readonly offset: number;

  constructor(reason: string, offset: number) {
    super(`Malformed envelope at byte ${offset}: ${reason}`);
    this.offset = offset;
  }
}

/**
 * A scope exited while a different scope was installed.
 *
 * @remarks
 * Only reachable when code mutates the ambient store outside of the scoped
 * API (for example `AsyncLocalStorage.enterWith`) and does not undo it.
 */
export class ScopeLeakError extends ThreadlineError {
  constructor(detail: string) {
    super(`Context scope leaked: ${detail}`);
  }
}

/**
 * Two different broadcast keys were registered under the same id.
 */
export class DuplicateKeyError extends ThreadlineError {
  public readonly keyId: string;

  constructor(keyId: string) {
    super(`A different broadcast key is already registered as '${keyId}'`);
    this.keyId = keyId;
  }
}
