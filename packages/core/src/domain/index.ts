/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains the technology-agnostic model: keys, codecs,
 * routing tables, retry counts and dispatch contracts. NO infrastructure
 * dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @threadline/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Context - Typed keys, codecs and snapshot contracts
// ============================================================================
export * from './context';

// ============================================================================
// Routing - Dtab overrides
// ============================================================================
export * from './routing';

// ============================================================================
// Retries - Wire-propagated retry count
// ============================================================================
export * from './retries';

// ============================================================================
// RPC - Service / Filter contracts and dispatch errors
// ============================================================================
export * from './rpc';

// ============================================================================
// Metrics - Stats receiver contracts
// ============================================================================
export * from './metrics';
