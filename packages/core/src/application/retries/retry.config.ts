/**
 * @fileoverview Retry Policy Configuration
 *
 * @packageDocumentation
 * @module @threadline/core/application/retries
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 */

import { z } from 'zod';

import { parseConfig } from '../../infrastructure/config';

export const RetryPolicySchema = z.object({
  /** Re-attempts after the first. */
  maxRetries: z.number().int().min(0).default(5),

  /**
   * Delay before each re-attempt. The last entry repeats; empty means none.
   */
  backoffMs: z.array(z.number().int().min(0)).default([]),

  budget: z
    .object({
      ttlMs: z.number().int().min(1000).max(60_000).default(10_000),
      minRetriesPerSec: z.number().min(0).default(10),
      percentCanRetry: z.number().min(0).max(1000).default(0.2),
    })
    .default({}),
});

export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;
export type RetryPolicy = z.output<typeof RetryPolicySchema>;

/**
 * Validate a retry policy and fill in its defaults.
 *
 * @throws ConfigError if the policy is invalid
 */
export function parseRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  return parseConfig(RetryPolicySchema, input, 'retry policy');
}

/**
 * Delay before re-attempt number `retry` (1-based).
 */
export function backoffFor(policy: RetryPolicy, retry: number): number {
  const { backoffMs } = policy;
  if (backoffMs.length === 0) return 0;
  return backoffMs[Math.min(retry, backoffMs.length) - 1] ?? 0;
}
