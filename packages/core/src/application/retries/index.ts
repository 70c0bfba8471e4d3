/**
 * @fileoverview Application Retries Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/application/retries
 * @license Apache-2.0
 */

export {
  type IRetryBudget,
  type ITokenRetryBudgetOptions,
  TokenRetryBudget,
  EMPTY_RETRY_BUDGET,
} from './retry-budget';

export {
  RetryPolicySchema,
  type RetryPolicy,
  type RetryPolicyInput,
  parseRetryPolicy,
  backoffFor,
} from './retry.config';
