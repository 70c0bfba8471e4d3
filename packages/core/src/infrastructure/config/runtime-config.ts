/**
 * @fileoverview Runtime Configuration - Environment Parsing
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Process-level settings read once from the environment and validated with
 * zod. Component-level settings are passed as option objects instead.
 *
 * | Variable                   | Default | Meaning                                  |
 * |----------------------------|---------|------------------------------------------|
 * | `LOG_LEVEL`                | `info`  | pino level                               |
 * | `SERVICE_NAME`             | `threadline` | `service` field on every log line   |
 * | `STATS_SCOPE_SEPARATOR`    | `/`     | joins metric name segments (one char)    |
 * | `STATS_DEBUG_LOGGED_NAMES` | empty   | comma-separated stats whose values are logged |
 * | `METRICS_LOG_ON_SHUTDOWN`  | `false` | dump the metrics sample when the exporter closes |
 */

import { z } from 'zod';

import { ThreadlineError } from '../../domain/context';

/**
 * Configuration failed validation. `issues` lists every problem found.
 */
export class ConfigError extends ThreadlineError {
  public readonly issues: readonly string[];

  constructor(what: string, issues: readonly string[]) {
    super(`Invalid ${what}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Parse `input` with `schema`, throwing {@link ConfigError} on failure.
 */
export function parseConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  what: string,
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      what,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const RuntimeConfigSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SERVICE_NAME: z.string().min(1).default('threadline'),
  STATS_SCOPE_SEPARATOR: z.string().length(1, 'Scope separator should be one symbol').default('/'),
  STATS_DEBUG_LOGGED_NAMES: z
    .string()
    .default('')
    .transform(
      (value) =>
        new Set(
          value
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0),
        ),
    ),
  METRICS_LOG_ON_SHUTDOWN: booleanString.default('false'),
});

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;

/**
 * Read the runtime configuration from `env` (defaults to `process.env`).
 *
 * @throws ConfigError if any variable is invalid
 */
export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  return parseConfig(RuntimeConfigSchema, env, 'runtime configuration');
}

/** The subset of the runtime configuration the logger factory reads. */
export const LoggingConfigSchema = RuntimeConfigSchema.pick({ LOG_LEVEL: true, SERVICE_NAME: true });

export type LoggingConfig = z.output<typeof LoggingConfigSchema>;

/**
 * Read only the logging variables, so loggers can be built before (or
 * without) the rest of the configuration.
 *
 * @throws ConfigError if `LOG_LEVEL` or `SERVICE_NAME` is invalid
 */
export function loadLoggingConfig(env: Record<string, string | undefined> = process.env): LoggingConfig {
  return parseConfig(LoggingConfigSchema, env, 'logging configuration');
}
