/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer assembles the RPC pipeline: client stack, server,
 * filters and the retry policy.
 *
 * @module @threadline/core/application
 * @license Apache-2.0
 */

// ============================================================================
// Filters - stats, retries, local bindings
// ============================================================================
export * from './filters';

// ============================================================================
// Retries - budget and policy
// ============================================================================
export * from './retries';

// ============================================================================
// RPC - client, server, stack, method codec
// ============================================================================
export * from './rpc';
