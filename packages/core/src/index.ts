/**
 * @fileoverview @threadline/core - Main Entry Point
 *
 * Request-scoped broadcast context for RPC: typed keys whose values follow a
 * logical request across async boundaries and across client/server hops.
 *
 * @packageDocumentation
 * @module @threadline/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   BroadcastContext,
 *   BroadcastKey,
 *   LoopbackTransport,
 *   MethodClient,
 *   RpcClient,
 *   RpcServer,
 *   serveIface,
 *   utf8Codec,
 * } from '@threadline/core';
 *
 * const TENANT = new BroadcastKey<string>('com.example.Tenant', utf8Codec);
 *
 * const server = new RpcServer(
 *   serveIface({ whoami: async () => BroadcastContext.get(TENANT) ?? 'nobody' }),
 *   { keys: [TENANT] },
 * );
 * const client = new MethodClient(new RpcClient(new LoopbackTransport(server)));
 *
 * await BroadcastContext.let(TENANT, 'blue', () => client.call('whoami', '')); // 'blue'
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Keys, codecs, Dtab, Retries, RPC and metrics contracts
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Client, server, stack and filters
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Scope storage, wire, transports, metrics, logging, config
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
