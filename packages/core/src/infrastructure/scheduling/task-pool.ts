/**
 * @fileoverview TaskPool - Bounded Worker Pool that Keeps Each Task's Scope
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/scheduling
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * At most `concurrency` tasks run at once; the rest wait in FIFO order.
 *
 * A queued task is started from the completion of whichever task freed its
 * slot, which usually belongs to another request. Each task is therefore
 * bound to the scope it was submitted from at `submit()` time:
 *
 * ```
 * request A: submit(taskA)  ──┐
 * request B: submit(taskB)  ──┤ queue
 *                             │
 * taskA completes ──▶ start taskB   (runs with B's scope, not A's)
 * ```
 *
 * @version 1.0.0
 */

import { BroadcastContext } from '../context';

import { TaskCancelledError } from './scheduling.errors';

export interface ISubmitOptions {
  /** Aborting while the task is still queued discards it. */
  signal?: AbortSignal;
}

interface IQueuedTask {
  readonly start: () => void;
  readonly cancel: (reason: unknown) => void;
}

export class TaskPool {
  readonly concurrency: number;

  private readonly queue: IQueuedTask[] = [];
  private running = 0;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /** Tasks currently running. */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a slot. */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Run `task` when a slot is free, in the scope of the caller.
   *
   * @throws TaskCancelledError (as a rejection) if `signal` aborts first
   */
  submit<T>(task: () => Promise<T> | T, options: ISubmitOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new TaskCancelledError(signal.reason));
    }

    const bound = BroadcastContext.bind(task);

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(queued);
        if (index !== -1) {
          this.queue.splice(index, 1);
          queued.cancel(signal?.reason);
        }
      };

      const queued: IQueuedTask = {
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          this.running++;
          void new Promise<T>((run) => run(bound()))
            .then(resolve, reject)
            .finally(() => this.release());
        },
        cancel: (reason) => reject(new TaskCancelledError(reason)),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(queued);
      this.drain();
    });
  }

  private release(): void {
    this.running--;
    this.drain();
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      next.start();
    }
  }
}
