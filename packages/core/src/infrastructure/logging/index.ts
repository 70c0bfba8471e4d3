/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @module @threadline/core/infrastructure/logging
 * @license Apache-2.0
 */

export { makeLogger, makeNoopLogger, defaultLogger, type Logger } from './logger';
