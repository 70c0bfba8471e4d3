/**
 * @fileoverview Logger Factory - pino
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * JSON logs to stdout. Components take an optional `logger` and derive a
 * child with a `component` binding; when none is given they fall back to
 * {@link defaultLogger}.
 *
 * Level and `service` come from the validated `LOG_LEVEL` and
 * `SERVICE_NAME` variables (see {@link loadLoggingConfig}), or from an
 * explicit config. Output is disabled under
 * Vitest and when `NODE_ENV=test`. Format with an external pipe such as
 * pino-pretty.
 */

import pino, { type Logger } from 'pino';

import { type LoggingConfig, loadLoggingConfig } from '../config';

export type { Logger } from 'pino';

/**
 * @throws ConfigError if `config` is omitted and the environment holds an
 * invalid `LOG_LEVEL` or `SERVICE_NAME`
 */
export function makeLogger(
  bindings?: Record<string, unknown>,
  config: LoggingConfig = loadLoggingConfig(),
): Logger {
  const isVitest = process.env['VITEST'] === 'true';
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';

  return pino({
    level: config.LOG_LEVEL,
    enabled: !(isVitest || nodeEnv === 'test'),
    // Bindings first, reserved keys last so they cannot be overwritten
    base: { ...bindings, service: config.SERVICE_NAME },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * For tests: keeps the Logger type, emits nothing.
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

let rootLogger: Logger | undefined;

/**
 * Process-wide logger, created on first use.
 */
export function defaultLogger(): Logger {
  rootLogger ??= makeLogger();
  return rootLogger;
}
