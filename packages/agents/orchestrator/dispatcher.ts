// Dispatcher — fans one request out to every snapshotted worker through the pool
// One deadline covers the whole batch; stragglers are aborted and their results discarded

import { randomUUID } from 'node:crypto';
import type { AnalysisRequest } from '../types/analysis.js';
import type { AnalysisWorker, RegisteredWorker, WorkerOutcome } from '../types/agents.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { validateResult } from '../schemas/analysis-result.js';
import { PartialResultSet, type ReadonlyPartialResultSet } from './partial-result-set.js';
import { TimeoutFailure, WorkerFailure } from './errors.js';
import type { WorkerPool } from './worker-pool.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';

export interface DispatcherConfig {
  pool: WorkerPool;
  /** Batch-wide deadline in ms (default: 30000) */
  timeoutMs?: number;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface DispatchReport {
  /** Frozen by the time the report is returned */
  readonly results: ReadonlyPartialResultSet;
  /** One outcome per snapshotted worker, in snapshot order */
  readonly outcomes: readonly WorkerOutcome[];
  readonly registered: number;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

export class Dispatcher {
  private readonly pool: WorkerPool;
  readonly timeoutMs: number;
  private readonly eventBus?: EventBus;
  private readonly log: Logger;

  constructor(config: DispatcherConfig) {
    this.pool = config.pool;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.eventBus = config.eventBus;
    this.log = config.logger ?? createLogger('Dispatcher');
  }

  async dispatch(
    request: AnalysisRequest,
    workers: readonly RegisteredWorker[],
    runId: string = randomUUID(),
  ): Promise<DispatchReport> {
    const started = Date.now();
    const results = new PartialResultSet(workers.map(w => w.id));
    const outcomes = new Map<string, WorkerOutcome>();
    const deadline = new AbortController();

    const tasks = workers.map(({ id, worker }) =>
      this.runWorker(runId, id, worker, request, results, outcomes, deadline.signal),
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const timedOut = await Promise.race([
        Promise.all(tasks).then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), this.timeoutMs);
        }),
      ]);

      if (timedOut) {
        const reason = new TimeoutFailure(this.timeoutMs);
        const stragglers = workers.filter(w => !outcomes.has(w.id)).map(w => w.id);
        // Outcomes are recorded before aborting so the rejections read as timeouts
        for (const workerId of stragglers) {
          outcomes.set(workerId, {
            workerId,
            status: 'timed_out',
            durationMs: Date.now() - started,
            error: reason.message,
          });
          this.emit('WorkerTimedOut', { runId, workerId, timeoutMs: this.timeoutMs });
        }
        this.log.warn('Dispatch deadline elapsed; cancelling outstanding workers', {
          runId,
          timeoutMs: this.timeoutMs,
          stragglers,
        });
        deadline.abort(reason);
      }

      return {
        results,
        outcomes: workers.flatMap(w => {
          const outcome = outcomes.get(w.id);
          return outcome ? [outcome] : [];
        }),
        registered: workers.length,
        timedOut,
        durationMs: Date.now() - started,
      };
    } finally {
      // Runs before the report reaches the caller, and also when the batch rejects
      clearTimeout(timer);
      if (!deadline.signal.aborted) deadline.abort(new Error('Dispatch ended'));
      results.freeze();
    }
  }

  // Worker failures are absorbed into an outcome; only a throwing listener escapes
  private async runWorker(
    runId: string,
    workerId: string,
    worker: AnalysisWorker,
    request: AnalysisRequest,
    results: PartialResultSet,
    outcomes: Map<string, WorkerOutcome>,
    deadline: AbortSignal,
  ): Promise<void> {
    const started = Date.now();

    try {
      const raw = await this.pool.submit(async (signal) => {
        // Emitted once the pool starts the task, not while it waits in the queue
        this.emit('WorkerDispatched', { runId, workerId, subjectId: request.subjectId });
        this.log.debug(`Dispatching ${workerId}`, { runId, subjectId: request.subjectId });
        const value = await worker.perform(request.subjectId, request.parameters, signal);
        if (signal.aborted) {
          this.log.warn(`Discarding late result from ${workerId}`, { runId });
          this.emit('LateResultDiscarded', { runId, workerId });
        }
        return value;
      }, deadline);

      if (outcomes.has(workerId)) {
        this.log.warn(`Discarding late result from ${workerId}`, { runId });
        this.emit('LateResultDiscarded', { runId, workerId });
        return;
      }

      const validation = validateResult(raw);
      if (!validation.ok) {
        outcomes.set(workerId, {
          workerId,
          status: 'invalid',
          durationMs: Date.now() - started,
          error: validation.reason,
        });
        this.log.warn(`Worker ${workerId} returned an invalid result`, { runId, reason: validation.reason });
        this.emit('WorkerResultRejected', { runId, workerId, reason: validation.reason });
        return;
      }

      if (!results.record(workerId, validation.result)) {
        this.log.warn(`Discarding late result from ${workerId}`, { runId });
        this.emit('LateResultDiscarded', { runId, workerId });
        return;
      }

      outcomes.set(workerId, { workerId, status: 'succeeded', durationMs: Date.now() - started });
      this.log.info(`Worker ${workerId} completed`, {
        runId,
        confidence: validation.result.confidence,
        recommendation: validation.result.recommendation,
      });
      this.emit('WorkerSucceeded', {
        runId,
        workerId,
        confidence: validation.result.confidence,
        durationMs: Date.now() - started,
      });
    } catch (err) {
      // Already recorded as timed out; this is the abort rejection
      if (outcomes.has(workerId)) return;

      const failure = new WorkerFailure(`Worker ${workerId} failed: ${errorMessage(err)}`, workerId, err);
      outcomes.set(workerId, {
        workerId,
        status: 'failed',
        durationMs: Date.now() - started,
        error: errorMessage(err),
      });
      this.log.error(failure.message, { runId });
      this.emit('WorkerFailed', { runId, workerId, error: errorMessage(err) });
    }
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'AnalysisWorkers',
      payload,
    });
  }
}
