/**
 * @fileoverview RequeueFilter - Client Retries that Write the Retry Count
 *
 * @packageDocumentation
 * @module @threadline/core/application/filters
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Re-sends requests that failed before reaching a handler, and tells the
 * server which attempt it is looking at:
 *
 * ```
 * attempt 0 ──▶ Retries(0) ──▶ WriteError
 * attempt 1 ──▶ Retries(1) ──▶ RejectedError
 * attempt 2 ──▶ Retries(2) ──▶ reply
 * ```
 *
 * The filter sits in the client stack under {@link RETRIES_ROLE}. A client
 * whose stack has no module under that role sends no retry count at all,
 * which servers can tell apart from `Retries(0)`.
 *
 * Re-attempts stop at `maxRetries` or when the retry budget is empty; the
 * caller then gets a {@link RetryBudgetExhaustedError} whose `cause` is the
 * last failure.
 *
 * @version 1.0.0
 */

import { setTimeout as sleep } from 'node:timers/promises';

import {
  type ICounter,
  type IStat,
  type IStatsReceiver,
  NullStatsReceiver,
} from '../../domain/metrics';
import {
  type IFilter,
  RetryBudgetExhaustedError,
  Role,
  type Service,
  isRetryable,
} from '../../domain/rpc';
import { RetriesContext } from '../../infrastructure/context';
import { defaultLogger, type Logger } from '../../infrastructure/logging';
import {
  type IRetryBudget,
  type RetryPolicy,
  type RetryPolicyInput,
  TokenRetryBudget,
  backoffFor,
  parseRetryPolicy,
} from '../retries';

/**
 * Stack role of the retry module.
 */
export const RETRIES_ROLE = new Role('Retries');

export interface IRequeueFilterOptions {
  policy?: RetryPolicyInput;

  /** Shared budget. Default: a {@link TokenRetryBudget} built from `policy.budget`. */
  budget?: IRetryBudget;

  /** Receiver the `retries/*` metrics are created on. */
  stats?: IStatsReceiver;

  logger?: Logger;

  /** Waits out a backoff delay. Default: `timers/promises` setTimeout. */
  sleep?: (ms: number) => Promise<void>;
}

export class RequeueFilter<TRequest, TResponse> implements IFilter<TRequest, TResponse> {
  readonly policy: RetryPolicy;
  readonly budget: IRetryBudget;

  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly requeues: ICounter;
  private readonly budgetExhausted: ICounter;
  private readonly retries: IStat;

  constructor(options: IRequeueFilterOptions = {}) {
    this.policy = parseRetryPolicy(options.policy);
    this.budget = options.budget ?? new TokenRetryBudget(this.policy.budget);
    this.logger = (options.logger ?? defaultLogger()).child({ component: 'RequeueFilter' });
    this.sleep = options.sleep ?? ((ms) => sleep(ms));

    const stats = options.stats ?? NullStatsReceiver;
    this.requeues = stats.counter('retries', 'requeues');
    this.budgetExhausted = stats.counter('retries', 'budget_exhausted');
    this.retries = stats.stat('retries');
    stats.addGauge({ name: ['retries', 'budget'] }, () => this.budget.balance());
  }

  async apply(request: TRequest, next: Service<TRequest, TResponse>): Promise<TResponse> {
    this.budget.deposit();

    for (let attempt = 0; ; attempt++) {
      try {
        const reply = await RetriesContext.let(attempt, () => next(request));
        this.retries.add(attempt);
        return reply;
      } catch (error) {
        if (!isRetryable(error)) {
          this.retries.add(attempt);
          throw error;
        }

        if (attempt >= this.policy.maxRetries) {
          this.retries.add(attempt);
          throw new RetryBudgetExhaustedError(attempt + 1, error);
        }
        if (!this.budget.tryWithdraw()) {
          this.budgetExhausted.incr();
          this.retries.add(attempt);
          this.logger.debug({ attempt }, 'retry budget exhausted');
          throw new RetryBudgetExhaustedError(attempt + 1, error);
        }

        this.requeues.incr();
        const delayMs = backoffFor(this.policy, attempt + 1);
        this.logger.debug({ attempt: attempt + 1, delayMs, err: error }, 'requeueing request');
        if (delayMs > 0) {
          await this.sleep(delayMs);
        }
      }
    }
  }
}
