/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The AsyncLocalStorage-based implementation of the broadcast context:
 *
 * - **BroadcastContext**: scoped get/let/letClear, capture and restore
 * - **ContextSnapshot**: immutable scope value
 * - **DtabLocal / RetriesContext**: accessors for the well-known entries
 *
 * ## Usage
 *
 * ```typescript
 * import { BroadcastContext, DtabLocal } from '@threadline/core/infrastructure/context';
 *
 * BroadcastContext.let(TENANT, 'blue', async () => {
 *   await DtabLocal.push(Dtab.read('/svc=>/canary'), () => client.call('query', 'x'));
 * });
 * ```
 */

// ============================================================================
// BroadcastContext - AsyncLocalStorage Implementation
// ============================================================================

export { BroadcastContext } from './broadcast-context';

// ============================================================================
// Well-Known Entries
// ============================================================================

export { DtabLocal } from './dtab-local';
export { RetriesContext } from './retries-context';

// ============================================================================
// Internal (for the wire layer and tests)
// ============================================================================

export { ContextSnapshot, createEntry } from './context-store';
