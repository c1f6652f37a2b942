/**
 * Tests for WorkerPool
 */

import { describe, it, expect } from 'vitest';

import { WorkerPool } from './worker-pool.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('should require a processor', async () => {
    const pool = new WorkerPool<number, number>();
    await expect(pool.processBatch([1])).rejects.toThrow('No processor set');
  });

  it('should process a batch and keep input positions', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 2 });
    pool.setProcessor(async (value) => value * 2);

    const results = await pool.processBatch([1, 2, 3]);
    const ordered = [...results].sort((a, b) => a.sequence - b.sequence);

    expect(ordered.map((r) => r.result)).toEqual([2, 4, 6]);
    expect(ordered.every((r) => r.success && !r.cancelled)).toBe(true);
    await pool.shutdown();
  });

  it('should return an empty result for an empty batch', async () => {
    const pool = new WorkerPool<number, number>();
    pool.setProcessor(async (value) => value);
    expect(await pool.processBatch([])).toEqual([]);
  });

  it('should never run more than maxWorkers tasks at once', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 2 });
    let running = 0;
    let peak = 0;
    pool.setProcessor(async (value) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return value;
    });

    const results = await pool.processBatch([1, 2, 3, 4, 5]);

    expect(peak).toBe(2);
    expect(results.filter((r) => r.success)).toHaveLength(5);
  });

  it('should record a failing task without failing the batch', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 1 });
    pool.setProcessor(async (value) => {
      if (value === 2) throw new Error('boom');
      return value;
    });

    const results = await pool.processBatch([1, 2, 3]);
    const failed = results.find((r) => r.sequence === 1);

    expect(failed?.success).toBe(false);
    expect(failed?.error).toBe('boom');
    expect(results.filter((r) => r.success)).toHaveLength(2);
  });

  it('should cancel pending tasks but let running ones finish', async () => {
    const pool = new WorkerPool<number, number>({ maxWorkers: 1 });
    const gate = deferred();
    pool.setProcessor(async (value) => {
      await gate.promise;
      return value;
    });

    const batch = pool.processBatch([1, 2, 3]);
    expect(pool.cancelAllPending()).toBe(2);
    gate.resolve();

    const results = await batch;
    expect(results.filter((r) => r.cancelled).map((r) => r.sequence).sort()).toEqual([1, 2]);
    expect(results.find((r) => r.sequence === 0)?.result).toBe(1);
  });

  it('should refuse new tasks after shutdown', async () => {
    const pool = new WorkerPool<number, number>();
    pool.setProcessor(async (value) => value);
    await pool.shutdown();
    expect(() => pool.addTask(1)).toThrow('Cannot add tasks while shutting down');
  });
});
