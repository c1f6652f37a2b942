/**
 * Evaluation budget - cooperative step and time limits for one (file, rule) evaluation
 */

import { EvaluationCancelledError, EvaluationTimeoutError } from '../errors.js';

export const DEFAULT_MAX_STEPS = 2_000_000;

/** Steps between clock and signal checks */
export const CHECKPOINT_INTERVAL = 256;

export interface EvaluationBudget {
  /** Node visits and match attempts allowed */
  maxSteps: number;
  /** Epoch milliseconds after which the evaluation times out */
  deadline?: number;
  /** Epoch milliseconds after which the whole run is out of budget */
  runDeadline?: number;
  signal?: AbortSignal;
  /**
   * Cancellation word shared with the thread that owns the run; any
   * non-zero value cancels the evaluation
   */
  cancelFlag?: Int32Array;
}

/**
 * Whether the signal or the shared cancellation word asks to stop
 */
export function isAbortRequested(budget: Pick<EvaluationBudget, 'signal' | 'cancelFlag'>): boolean {
  if (budget.signal?.aborted) {
    return true;
  }
  return budget.cancelFlag !== undefined && Atomics.load(budget.cancelFlag, 0) !== 0;
}

export type Clock = () => number;

/**
 * Counts steps against an EvaluationBudget.
 *
 * Throws EvaluationTimeoutError when the step count or the per-evaluation
 * deadline is exceeded, and EvaluationCancelledError when the signal is
 * aborted or the run deadline has passed.
 */
export class BudgetTracker {
  private count = 0;
  private readonly startedAt: number;

  constructor(
    private readonly budget: EvaluationBudget,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
  }

  get steps(): number {
    return this.count;
  }

  get elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  step(): void {
    this.count++;
    if (this.count > this.budget.maxSteps) {
      throw new EvaluationTimeoutError(
        `Step budget of ${this.budget.maxSteps} exceeded`,
        this.count,
        this.elapsedMs
      );
    }
    if (this.count % CHECKPOINT_INTERVAL === 0) {
      this.checkpoint();
    }
  }

  checkpoint(): void {
    if (isAbortRequested(this.budget)) {
      throw new EvaluationCancelledError('aborted');
    }
    const now = this.clock();
    if (this.budget.runDeadline !== undefined && now > this.budget.runDeadline) {
      throw new EvaluationCancelledError('budget-exceeded');
    }
    if (this.budget.deadline !== undefined && now > this.budget.deadline) {
      throw new EvaluationTimeoutError(
        `Evaluation exceeded its time limit after ${now - this.startedAt}ms`,
        this.count,
        now - this.startedAt
      );
    }
  }
}
