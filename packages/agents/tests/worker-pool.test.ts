// Tests for the bounded worker pool

import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../orchestrator/worker-pool.js';
import { PoolClosedError, ShutdownFailure } from '../orchestrator/errors.js';
import { silentLogger } from '../utils/logger.js';
import { sleep } from './helpers.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => { resolve = r; });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('rejects a non-positive concurrency', () => {
    expect(() => new WorkerPool({ concurrency: 0, logger: silentLogger })).toThrow(RangeError);
  });

  it('never runs more than `concurrency` tasks at once', async () => {
    const pool = new WorkerPool({ concurrency: 2, logger: silentLogger });
    let running = 0;
    let peak = 0;

    const tasks = Array.from({ length: 6 }, (_, i) => pool.submit(async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(10);
      running--;
      return i;
    }));

    expect(pool.active).toBe(2);
    expect(pool.queued).toBe(4);
    expect(await Promise.all(tasks)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
    expect(pool.active).toBe(0);
  });

  it('starts queued tasks in submission order', async () => {
    const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
    const order: string[] = [];
    await Promise.all(['a', 'b', 'c'].map(id => pool.submit(async () => { order.push(id); })));
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('propagates a task failure to its submitter only', async () => {
    const pool = new WorkerPool({ concurrency: 2, logger: silentLogger });
    const failing = pool.submit(async () => { throw new Error('boom'); });
    const passing = pool.submit(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(passing).resolves.toBe('ok');
  });

  it('rejects an aborted task at once but holds its slot until the task settles', async () => {
    const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
    const gate = deferred<string>();
    const caller = new AbortController();
    let nextStarted = false;
    const stuck = pool.submit(() => gate.promise, caller.signal);
    const next = pool.submit(async () => {
      nextStarted = true;
      return 'next';
    });

    caller.abort(new Error('cancelled'));
    await expect(stuck).rejects.toThrow('cancelled');
    expect(pool.active).toBe(1);
    expect(pool.queued).toBe(1);
    expect(nextStarted).toBe(false);

    gate.resolve('ignored');
    await expect(next).resolves.toBe('next');
    expect(pool.active).toBe(0);
  });

  it('never exceeds `concurrency` when aborted tasks ignore the signal', async () => {
    const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await sleep(30);
      running--;
    };

    const settled: Array<Promise<unknown>> = [];
    for (let i = 0; i < 3; i++) {
      const caller = new AbortController();
      settled.push(pool.submit(task, caller.signal).catch(() => undefined));
      await sleep(5);
      caller.abort(new Error('deadline'));
    }
    await Promise.all(settled);
    await sleep(50);

    expect(peak).toBe(1);
  });

  it('passes the abort on to the running task', async () => {
    const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
    const caller = new AbortController();
    let seen: AbortSignal | undefined;
    const task = pool.submit(async (signal) => {
      seen = signal;
      await sleep(50);
    }, caller.signal);

    caller.abort(new Error('stop'));
    await expect(task).rejects.toThrow('stop');
    expect(seen?.aborted).toBe(true);
  });

  it('removes an aborted task from the queue without running it', async () => {
    const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
    const gate = deferred<void>();
    const caller = new AbortController();
    let ran = false;

    const first = pool.submit(() => gate.promise);
    const queued = pool.submit(async () => { ran = true; }, caller.signal);
    caller.abort(new Error('dropped'));

    await expect(queued).rejects.toThrow('dropped');
    expect(pool.queued).toBe(0);
    gate.resolve();
    await first;
    expect(ran).toBe(false);
  });

  it('rejects submissions with an already aborted signal', async () => {
    const pool = new WorkerPool({ logger: silentLogger });
    const caller = new AbortController();
    caller.abort(new Error('too late'));
    await expect(pool.submit(async () => 1, caller.signal)).rejects.toThrow('too late');
  });

  describe('shutdown', () => {
    it('drains in-flight work within the grace period', async () => {
      const pool = new WorkerPool({ concurrency: 2, logger: silentLogger });
      const task = pool.submit(async () => {
        await sleep(20);
        return 'done';
      });

      const summary = await pool.shutdown(1000);

      expect(summary.drained).toBe(true);
      expect(summary.abandonedTasks).toBe(0);
      await expect(task).resolves.toBe('done');
    });

    it('refuses new work once shut down', async () => {
      const pool = new WorkerPool({ logger: silentLogger });
      await pool.shutdown(100);
      expect(pool.isAccepting).toBe(false);
      await expect(pool.submit(async () => 1)).rejects.toBeInstanceOf(PoolClosedError);
    });

    it('force-terminates work that outlives the grace period', async () => {
      const pool = new WorkerPool({ concurrency: 1, logger: silentLogger });
      const running = expect(pool.submit(() => new Promise<void>(() => {}))).rejects.toBeInstanceOf(ShutdownFailure);
      const queued = expect(pool.submit(async () => 'never')).rejects.toBeInstanceOf(ShutdownFailure);

      const summary = await pool.shutdown(20);

      expect(summary.drained).toBe(false);
      expect(summary.abandonedTasks).toBe(2);
      expect(pool.isAccepting).toBe(false);
      await running;
      await queued;
      expect(pool.active).toBe(0);
      expect(pool.queued).toBe(0);
    });

    it('is idempotent', async () => {
      const pool = new WorkerPool({ logger: silentLogger });
      const first = pool.shutdown(50);
      const second = pool.shutdown(50);
      expect(second).toBe(first);
      await first;
    });
  });
});
