// Bounded worker pool: at most `concurrency` tasks in flight, the rest queue FIFO
// Every task receives an AbortSignal. Aborting rejects the submitter at once, but a
// started task keeps its slot until its own promise settles; that value is ignored.

import { PoolClosedError, ShutdownFailure } from './errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

export interface WorkerPoolConfig {
  /** Max tasks running at once (default: 5) */
  concurrency?: number;
  /** Drain grace period used by shutdown() when none is given (default: 5000ms) */
  shutdownGraceMs?: number;
  logger?: Logger;
}

export interface ShutdownSummary {
  drained: boolean;
  abandonedTasks: number;
  durationMs: number;
}

interface PoolEntry {
  start(): void;
  abort(reason: unknown): void;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Task aborted');
}

export class WorkerPool {
  readonly concurrency: number;
  private readonly shutdownGraceMs: number;
  private readonly log: Logger;
  private queue: PoolEntry[] = [];
  private running = new Set<PoolEntry>();
  private idleWaiters: Array<() => void> = [];
  private accepting = true;
  private shutdownPromise: Promise<ShutdownSummary> | null = null;

  constructor(config: WorkerPoolConfig = {}) {
    const concurrency = config.concurrency ?? 5;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.shutdownGraceMs = config.shutdownGraceMs ?? 5000;
    this.log = config.logger ?? createLogger('WorkerPool');
  }

  /**
   * Queue a task. The returned promise settles with the task's own outcome,
   * or rejects with the abort reason if `signal` fires first.
   */
  submit<T>(task: PoolTask<T>, signal?: AbortSignal): Promise<T> {
    if (!this.accepting) return Promise.reject(new PoolClosedError());
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<T>((resolve, reject) => {
      const controller = new AbortController();
      let started = false;
      let settled = false;

      const onCallerAbort = (): void => {
        entry.abort(signal ? abortReason(signal) : new Error('Task aborted'));
      };

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        signal?.removeEventListener('abort', onCallerAbort);
        return true;
      };

      const entry: PoolEntry = {
        start: () => {
          if (signal?.aborted) {
            entry.abort(abortReason(signal));
            return;
          }
          started = true;
          this.running.add(entry);

          let pending: Promise<T>;
          try {
            pending = task(controller.signal);
          } catch (err) {
            pending = Promise.reject(err);
          }

          pending.then(
            (value) => {
              this.release(entry);
              if (settle()) resolve(value);
            },
            (err: unknown) => {
              this.release(entry);
              if (settle()) reject(err);
            },
          );
        },
        abort: (reason) => {
          if (!settle()) return;
          controller.abort(reason);
          // A started task may ignore the signal, so its slot is held until it settles
          if (!started) this.dequeue(entry);
          reject(reason);
        },
      };

      signal?.addEventListener('abort', onCallerAbort, { once: true });
      this.queue.push(entry);
      this.pump();
    });
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  get active(): number {
    return this.running.size;
  }

  get queued(): number {
    return this.queue.length;
  }

  /**
   * Stop accepting work, wait up to `graceMs` for in-flight and queued tasks
   * to finish, then abort whatever is left. Safe to call repeatedly.
   */
  shutdown(graceMs: number = this.shutdownGraceMs): Promise<ShutdownSummary> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.drain(graceMs);
    }
    return this.shutdownPromise;
  }

  private async drain(graceMs: number): Promise<ShutdownSummary> {
    this.accepting = false;
    const start = Date.now();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      this.whenIdle().then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), graceMs);
      }),
    ]);
    clearTimeout(timer);

    let abandonedTasks = 0;
    if (!drained) {
      // Queued entries go first so releasing a running slot cannot start them
      const remaining = [...this.queue, ...this.running];
      abandonedTasks = remaining.length;
      const failure = new ShutdownFailure(
        `Worker pool did not drain within ${graceMs}ms; force-terminated ${abandonedTasks} task(s)`,
        abandonedTasks,
      );
      this.log.warn(failure.message, { abandonedTasks });
      for (const entry of remaining) {
        entry.abort(failure);
      }
      // Closed to new work, so slots still held by stubborn tasks can be dropped
      this.running.clear();
      this.notifyIfIdle();
    }

    return { drained, abandonedTasks, durationMs: Date.now() - start };
  }

  private whenIdle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      next.start();
    }
  }

  private release(entry: PoolEntry): void {
    if (!this.running.delete(entry)) return;
    this.pump();
    this.notifyIfIdle();
  }

  private dequeue(entry: PoolEntry): void {
    this.queue = this.queue.filter(e => e !== entry);
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (this.running.size > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
