/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the AsyncLocalStorage scope, wire
 * framing, transports, metrics, logging and configuration.
 *
 * @module @threadline/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Context - AsyncLocalStorage implementation
// ============================================================================
export * from './context';

// ============================================================================
// Wire - envelope framing and context marshalling
// ============================================================================
export * from './wire';

// ============================================================================
// RPC - reply framing and loopback transport
// ============================================================================
export * from './rpc';

// ============================================================================
// Scheduling - scope-preserving worker pool
// ============================================================================
export * from './scheduling';

// ============================================================================
// Metrics - prom-client backed stats receiver
// ============================================================================
export * from './metrics';

// ============================================================================
// Logging and Configuration
// ============================================================================
export * from './logging';
export * from './config';
