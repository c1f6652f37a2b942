/**
 * Threaded Worker Pool - multi-threaded unit processing using Piscina
 *
 * Runs CPU-bound tasks (parsing and rule evaluation) on Node.js worker
 * threads. Aborting a task's signal while it runs terminates its thread,
 * which is the only way to stop code that never reaches a checkpoint.
 */

import * as os from 'node:os';

import type { Piscina } from 'piscina';
import type { MessagePort } from 'node:worker_threads';

/**
 * Options for configuring the threaded worker pool
 */
export interface ThreadedWorkerPoolOptions {
  /**
   * Worker module; its default export handles one task
   */
  workerPath: string;

  /**
   * Minimum number of worker threads to maintain
   * @default 1
   */
  minThreads?: number;

  /**
   * Maximum number of worker threads
   * @default Number of CPU cores minus one
   */
  maxThreads?: number;

  /**
   * Idle timeout for worker threads in milliseconds
   * @default 30000
   */
  idleTimeout?: number;

  /**
   * Node.js options of the worker threads, such as a module loader
   */
  execArgv?: string[];
}

export interface RunTaskOptions {
  /** Ports moved to the worker along with the task */
  transferList?: MessagePort[];
  /** Aborting removes a queued task and terminates the thread of a running one */
  signal?: AbortSignal;
}

const DEFAULT_IDLE_TIMEOUT_MS = 30000;

/**
 * ThreadedWorkerPool - runs tasks on worker threads
 *
 * @example
 * ```typescript
 * const pool = new ThreadedWorkerPool<UnitTask, FileUnitResult>({
 *   workerPath: fileURLToPath(new URL('./unit-worker.js', import.meta.url)),
 *   maxThreads: 4,
 * });
 * await pool.initialize();
 * const result = await pool.run(task, { transferList: [task.port] });
 * await pool.destroy();
 * ```
 */
export class ThreadedWorkerPool<TInput, TOutput> {
  private pool: Piscina | null = null;
  private isDestroyed = false;

  constructor(private readonly options: ThreadedWorkerPoolOptions) {}

  /**
   * Initialize the worker pool
   * Must be called before running tasks
   */
  async initialize(): Promise<void> {
    if (this.pool) {
      return;
    }
    if (this.isDestroyed) {
      throw new Error('Cannot initialize a destroyed pool');
    }

    let PiscinaClass: typeof Piscina;
    try {
      ({ Piscina: PiscinaClass } = await import('piscina'));
    } catch (error) {
      throw new Error(`Failed to load piscina: ${error instanceof Error ? error.message : 'unknown error'}`);
    }

    this.pool = new PiscinaClass({
      filename: this.options.workerPath,
      minThreads: this.options.minThreads ?? 1,
      maxThreads: this.options.maxThreads ?? Math.max(1, os.cpus().length - 1),
      idleTimeout: this.options.idleTimeout ?? DEFAULT_IDLE_TIMEOUT_MS,
      ...(this.options.execArgv ? { execArgv: this.options.execArgv } : {}),
    });
  }

  /**
   * Run a single task in a worker thread
   *
   * @returns Promise resolving to the value the worker returned
   */
  async run(task: TInput, options: RunTaskOptions = {}): Promise<TOutput> {
    if (this.isDestroyed) {
      throw new Error('Pool has been destroyed');
    }
    if (!this.pool) {
      throw new Error('Pool not initialized. Call initialize() first.');
    }

    const result: TOutput = await this.pool.run(task, {
      ...(options.transferList ? { transferList: options.transferList } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return result;
  }

  /**
   * Terminate every thread; queued tasks are rejected
   */
  async destroy(): Promise<void> {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;

    if (this.pool) {
      await this.pool.destroy();
      this.pool = null;
    }
  }
}
