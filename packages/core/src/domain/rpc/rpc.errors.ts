/**
 * @fileoverview RPC Errors - Dispatch Failure Classes
 *
 * @packageDocumentation
 * @module @threadline/core/domain/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Failures are split by whether the request could have reached a handler.
 * Only failures that provably did not are `retryable`: re-sending them can
 * never execute a handler twice.
 *
 * @version 1.0.0
 */

import { ThreadlineError } from '../context/context.errors';

/**
 * Base class for dispatch failures.
 */
export abstract class RpcError extends ThreadlineError {
  /** True when the request never reached a handler. */
  abstract readonly retryable: boolean;
}

/**
 * The request could not be written to the transport.
 */
export class WriteError extends RpcError {
  readonly retryable = true;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Request not sent: ${reason}`, options);
  }
}

/**
 * The server refused the request before dispatching it (closed or draining).
 */
export class RejectedError extends RpcError {
  readonly retryable = true;

  public readonly reason: string;

  constructor(reason: string) {
    super(`Request rejected: ${reason}`);
    this.reason = reason;
  }
}

/**
 * The transport was closed by its owner. Not retried.
 */
export class TransportClosedError extends RpcError {
  readonly retryable = false;

  constructor() {
    super('Transport is closed');
  }
}

/**
 * The remote handler failed. Carries the remote error's name and message.
 */
export class RemoteError extends RpcError {
  readonly retryable = false;

  /** `name` of the error raised on the server. */
  public readonly remoteName: string;

  constructor(remoteName: string, remoteMessage: string) {
    super(`${remoteName}: ${remoteMessage}`);
    this.remoteName = remoteName;
  }
}

/**
 * A retryable failure could not be retried because the retry budget or the
 * retry limit ran out. `cause` is the last failure.
 */
export class RetryBudgetExhaustedError extends RpcError {
  readonly retryable = false;

  /** Attempts made, including the first. */
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause });
    this.attempts = attempts;
  }
}

/**
 * Type guard for failures that may be re-sent.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof RpcError && error.retryable;
}
