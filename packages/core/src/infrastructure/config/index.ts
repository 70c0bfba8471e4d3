/**
 * @fileoverview Infrastructure Config Module Exports
 *
 * @module @threadline/core/infrastructure/config
 * @license Apache-2.0
 */

export {
  ConfigError,
  parseConfig,
  RuntimeConfigSchema,
  type RuntimeConfig,
  loadRuntimeConfig,
  LoggingConfigSchema,
  type LoggingConfig,
  loadLoggingConfig,
} from './runtime-config';
