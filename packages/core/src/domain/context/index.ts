/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Context keys, codecs and snapshot contracts. Technology-agnostic: the
 * AsyncLocalStorage implementation lives in the Infrastructure layer.
 *
 * ## What's Exported
 *
 * - **ContextKey<T> / BroadcastKey<T>**: typed keys, local or wire-visible
 * - **Codecs**: bytes, UTF-8, int32
 * - **IContextSnapshot**: immutable scope view
 * - **Errors**: DecodeError, EnvelopeFormatError, ScopeLeakError, ...
 */

// ============================================================================
// Keys
// ============================================================================

export {
  ContextKey,
  BroadcastKey,
  type IContextCodec,
  type Try,
  type ContextKeyValue,
} from './context-key';

export { bytesCodec, utf8Codec, int32Codec } from './context-codec';

// ============================================================================
// Snapshot Contracts
// ============================================================================

export {
  type IContextEntry,
  type IContextBinding,
  type IContextSnapshot,
  binding,
} from './context.interface';

// ============================================================================
// Errors
// ============================================================================

export {
  ThreadlineError,
  DecodeError,
  EnvelopeFormatError,
  ScopeLeakError,
  DuplicateKeyError,
} from './context.errors';
