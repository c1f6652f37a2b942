/**
 * Worker Pool - bounded concurrent processing of analysis units
 *
 * An in-process task queue: at most `maxWorkers` tasks run at once and
 * interleave on the event loop at their await points (file reads, the
 * yields between rules). Tasks never block each other, and a failing task
 * is recorded without affecting the rest of the batch.
 */

import { EventEmitter } from 'node:events';
import * as os from 'node:os';

import { errorMessage } from '../errors.js';

/**
 * Options for configuring the worker pool
 */
export interface WorkerPoolOptions {
  /**
   * Maximum number of concurrent tasks
   * @default Number of CPU cores
   */
  maxWorkers?: number;
}

/**
 * Status of a task in the worker pool
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Represents a task to be processed by the worker pool
 */
export interface Task<TInput, TOutput> {
  id: string;
  input: TInput;
  status: TaskStatus;
  /** Position in submission order, used to restore input order */
  sequence: number;
  startedAt?: number;
  completedAt?: number;
  result?: TOutput;
  error?: string;
}

/**
 * Result of a task execution
 */
export interface TaskResult<TOutput> {
  taskId: string;
  sequence: number;
  success: boolean;
  result?: TOutput;
  error?: string;
  /** Execution duration in milliseconds */
  duration: number;
  cancelled: boolean;
}

/**
 * Type for the task processor function
 */
export type TaskProcessor<TInput, TOutput> = (input: TInput) => Promise<TOutput>;

const DEFAULT_CPU_COUNT = 4;

export function defaultWorkerCount(): number {
  return os.cpus().length || DEFAULT_CPU_COUNT;
}

/**
 * WorkerPool class for bounded concurrent task processing
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool<SourceFile, FileOutcome>({ maxWorkers: 4 });
 * pool.setProcessor((file) => analyzeFile(file));
 * const results = await pool.processBatch(files);
 * await pool.shutdown();
 * ```
 */
export class WorkerPool<TInput, TOutput> extends EventEmitter {
  private readonly maxWorkers: number;
  private taskQueue: Task<TInput, TOutput>[] = [];
  private activeTasks: Map<string, Task<TInput, TOutput>> = new Map();
  private processor: TaskProcessor<TInput, TOutput> | null = null;
  private taskIdCounter = 0;
  private isShuttingDown = false;
  private isPaused = false;

  constructor(options: WorkerPoolOptions = {}) {
    super();
    this.maxWorkers = Math.max(1, Math.floor(options.maxWorkers ?? defaultWorkerCount()));
  }

  setProcessor(processor: TaskProcessor<TInput, TOutput>): void {
    this.processor = processor;
  }

  /**
   * Queue one input; it starts as soon as a slot is free
   */
  addTask(input: TInput): Task<TInput, TOutput> {
    if (this.isShuttingDown) {
      throw new Error('Cannot add tasks while shutting down');
    }

    const sequence = this.taskIdCounter++;
    const task: Task<TInput, TOutput> = { id: `task-${sequence}`, input, status: 'pending', sequence };
    this.taskQueue.push(task);
    this.processQueue();
    return task;
  }

  /**
   * Process a batch of inputs and wait until every task has settled.
   *
   * Results come back in completion order; `sequence` gives the input order.
   * Tasks cancelled before they started are reported with `cancelled: true`.
   */
  async processBatch(inputs: readonly TInput[]): Promise<TaskResult<TOutput>[]> {
    if (!this.processor) {
      throw new Error('No processor set. Call setProcessor() first.');
    }

    // Pause while queuing so every listener is attached before the first task settles
    const wasPaused = this.isPaused;
    this.isPaused = true;
    const tasks = inputs.map((input) => this.addTask(input));
    const taskIds = new Set(tasks.map((t) => t.id));

    const settled = new Promise<TaskResult<TOutput>[]>((resolve) => {
      const results: TaskResult<TOutput>[] = [];
      const reported = new Set<string>();

      const onSettled = (task: Task<TInput, TOutput>): void => {
        if (!taskIds.has(task.id) || reported.has(task.id)) {
          return;
        }
        reported.add(task.id);
        results.push(this.taskToResult(task));
        if (results.length === tasks.length) {
          this.off('taskCompleted', onSettled);
          this.off('taskFailed', onSettled);
          this.off('taskCancelled', onSettled);
          resolve(results);
        }
      };

      this.on('taskCompleted', onSettled);
      this.on('taskFailed', onSettled);
      this.on('taskCancelled', onSettled);

      if (tasks.length === 0) {
        this.off('taskCompleted', onSettled);
        this.off('taskFailed', onSettled);
        this.off('taskCancelled', onSettled);
        resolve(results);
      }
    });

    if (!wasPaused) {
      this.resume();
    }
    return settled;
  }

  /**
   * Cancel all pending tasks
   *
   * @returns Number of tasks cancelled
   */
  cancelAllPending(): number {
    const pending = this.taskQueue;
    this.taskQueue = [];
    for (const task of pending) {
      this.markCancelled(task);
    }
    return pending.length;
  }

  private resume(): void {
    this.isPaused = false;
    this.processQueue();
  }

  /**
   * Wait for all current tasks to complete
   */
  async drain(): Promise<void> {
    if (this.taskQueue.length === 0 && this.activeTasks.size === 0) {
      return;
    }

    return new Promise((resolve) => {
      const checkDrained = (): void => {
        if (this.taskQueue.length === 0 && this.activeTasks.size === 0) {
          this.off('taskCompleted', checkDrained);
          this.off('taskFailed', checkDrained);
          this.off('taskCancelled', checkDrained);
          resolve();
        }
      };

      this.on('taskCompleted', checkDrained);
      this.on('taskFailed', checkDrained);
      this.on('taskCancelled', checkDrained);
      checkDrained();
    });
  }

  /**
   * Cancel pending tasks and wait for the running ones to settle
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;
    this.cancelAllPending();
    await this.drain();
  }

  private processQueue(): void {
    if (this.isPaused || !this.processor) {
      return;
    }

    while (this.taskQueue.length > 0 && this.activeTasks.size < this.maxWorkers) {
      const task = this.taskQueue.shift();
      if (task) {
        void this.processTask(task);
      }
    }
  }

  private async processTask(task: Task<TInput, TOutput>): Promise<void> {
    const processor = this.processor;
    if (!processor) {
      return;
    }

    task.status = 'running';
    task.startedAt = Date.now();
    this.activeTasks.set(task.id, task);

    try {
      const result = await processor(task.input);
      this.completeTask(task, result);
    } catch (error) {
      this.failTask(task, error);
    }
  }

  private completeTask(task: Task<TInput, TOutput>, result: TOutput): void {
    task.status = 'completed';
    task.completedAt = Date.now();
    task.result = result;
    this.activeTasks.delete(task.id);

    this.emit('taskCompleted', task, result);
    this.processQueue();
  }

  private failTask(task: Task<TInput, TOutput>, error: unknown): void {
    task.status = 'failed';
    task.completedAt = Date.now();
    task.error = errorMessage(error);
    this.activeTasks.delete(task.id);

    this.emit('taskFailed', task, error);
    this.processQueue();
  }

  private markCancelled(task: Task<TInput, TOutput>): void {
    task.status = 'cancelled';
    task.completedAt = Date.now();
    this.emit('taskCancelled', task);
  }

  private taskToResult(task: Task<TInput, TOutput>): TaskResult<TOutput> {
    const duration = task.completedAt !== undefined && task.startedAt !== undefined ? task.completedAt - task.startedAt : 0;

    return {
      taskId: task.id,
      sequence: task.sequence,
      success: task.status === 'completed',
      duration,
      cancelled: task.status === 'cancelled',
      ...(task.result !== undefined ? { result: task.result } : {}),
      ...(task.error !== undefined ? { error: task.error } : {}),
    };
  }
}
