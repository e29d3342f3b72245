// Coordinator — fans one analysis request out to every registered worker and
// consolidates whatever comes back before the deadline into a single decision

import { randomUUID } from 'node:crypto';
import type { AnalysisRequest, ConsolidatedResult, ParameterValue } from '../types/analysis.js';
import type { AnalysisWorker } from '../types/agents.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus } from '../types/events.js';
import { WorkerRegistry } from './registry.js';
import { WeightTable } from './weight-table.js';
import { WorkerPool, type ShutdownSummary } from './worker-pool.js';
import { Dispatcher, type DispatchReport } from './dispatcher.js';
import { aggregate } from './aggregator.js';
import { AnalysisRun } from './run.js';
import { CoordinatorError, InputError, PoolClosedError } from './errors.js';
import { composeReport } from '../utils/report-composer.js';
import { extractParameters, extractSubjectId } from '../utils/request-parser.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';

export interface CoordinatorConfig {
  /** Pool size (default: 5) */
  maxConcurrency?: number;
  /** Batch-wide deadline per run (default: 30000ms) */
  timeoutMs?: number;
  /** Drain period granted by shutdown() (default: 5000ms) */
  shutdownGraceMs?: number;
  /** Initial static weights, validated like setWeight() */
  weights?: Record<string, number>;
  logger?: Logger;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
  /** Clock used to stamp consolidated results */
  now?: () => Date;
}

export type RunErrorKind = 'input' | 'aggregation' | 'unavailable' | 'internal';

export interface RunError {
  kind: RunErrorKind;
  message: string;
}

export type RunOutcome =
  | {
      status: 'finished';
      runId: string;
      request: AnalysisRequest;
      report: string;
      consolidated: ConsolidatedResult;
      dispatch: DispatchReport;
    }
  | {
      status: 'error';
      runId: string;
      error: RunError;
    };

export interface WorkerSummary {
  id: string;
  weight: number;
  configured: boolean;
}

export interface CoordinatorHealth {
  accepting: boolean;
  activeTasks: number;
  queuedTasks: number;
  workers: WorkerSummary[];
  runsInFlight: number;
}

/** Map any thrown value onto the small set of run failure kinds callers see. */
export function classifyError(err: unknown): RunError {
  if (err instanceof CoordinatorError) {
    const { kind } = err;
    switch (kind) {
      case 'input':
      case 'aggregation':
      case 'unavailable':
        return { kind, message: err.message };
      default:
        break;
    }
  }
  return { kind: 'internal', message: errorMessage(err) };
}

export class Coordinator {
  private readonly registry = new WorkerRegistry();
  private readonly weights: WeightTable;
  private readonly pool: WorkerPool;
  private readonly dispatcher: Dispatcher;
  private readonly eventBus: EventBus;
  private readonly log: Logger;
  private readonly aggregatorLog: Logger;
  private readonly shutdownGraceMs: number;
  private readonly now: () => Date;
  private inFlight = 0;
  private shutdownPromise: Promise<ShutdownSummary> | null = null;

  constructor(config: CoordinatorConfig = {}) {
    this.log = config.logger ?? createLogger('Coordinator');
    this.aggregatorLog = config.logger ?? createLogger('Aggregator');
    this.eventBus = new SimpleEventBus();
    this.shutdownGraceMs = config.shutdownGraceMs ?? 5000;
    this.now = config.now ?? (() => new Date());
    this.weights = new WeightTable();
    for (const [id, weight] of Object.entries(config.weights ?? {})) {
      if (!this.weights.setWeight(id, weight)) {
        this.log.warn(`Ignoring invalid weight for ${id}`, { weight });
      }
    }

    this.pool = new WorkerPool({
      concurrency: config.maxConcurrency ?? 5,
      shutdownGraceMs: this.shutdownGraceMs,
      logger: config.logger,
    });
    this.dispatcher = new Dispatcher({
      pool: this.pool,
      timeoutMs: config.timeoutMs ?? 30_000,
      eventBus: this.eventBus,
      logger: config.logger,
    });

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => {
          // A failing listener must not fail the run that emitted the event
          try {
            handler({ type: e.type, payload: e.payload });
          } catch (err) {
            this.log.warn(`Event listener failed on ${e.type}`, { error: errorMessage(err) });
          }
        });
      }
    }
  }

  /** Insert or replace a worker. Takes effect from the next run. */
  registerWorker(id: string, worker: AnalysisWorker | null | undefined): boolean {
    const accepted = this.registry.register(id, worker);
    if (accepted) {
      this.log.info(`Registered worker ${id.trim()}`, { weight: this.weights.weightOf(id.trim()) });
    } else {
      this.log.warn('Rejected worker registration', { id });
    }
    return accepted;
  }

  unregisterWorker(id: string): boolean {
    return this.registry.unregister(id);
  }

  /** Set a static weight in [0, 1]. Takes effect from the next run. */
  setWeight(id: string, weight: number): boolean {
    const accepted = this.weights.setWeight(id, weight);
    if (!accepted) {
      this.log.warn(`Rejected weight for ${id}`, { weight });
    }
    return accepted;
  }

  listWorkers(): WorkerSummary[] {
    return this.registry.ids().map(id => ({
      id,
      weight: this.weights.weightOf(id),
      configured: this.weights.isConfigured(id),
    }));
  }

  async run(input: AnalysisRequest | string): Promise<RunOutcome> {
    const run = new AnalysisRun();
    const { runId } = run;
    this.emit('RunRequested', {
      runId,
      input: typeof input === 'string' ? input : input.subjectId,
    });

    let request: AnalysisRequest;
    try {
      if (!this.pool.isAccepting) throw new PoolClosedError();
      request = this.normalize(input);
    } catch (err) {
      const error = classifyError(err);
      run.fail();
      this.log.warn(`Run rejected: ${error.message}`, { runId, kind: error.kind });
      this.emit('RunRejected', { runId, ...error });
      return { status: 'error', runId, error };
    }

    run.start();
    this.inFlight++;
    const started = Date.now();
    this.log.info(`Analyzing ${request.subjectId}`, { runId, parameters: request.parameters });

    try {
      // Later registrations and weight changes never reach this run
      const workers = this.registry.snapshot();
      const weights = this.weights.snapshot();

      const dispatch = await this.dispatcher.dispatch(request, workers, runId);
      const consolidated = aggregate(request.subjectId, dispatch.results, weights, {
        logger: this.aggregatorLog,
        analyzedAt: this.now(),
      });
      this.emit('ResultConsolidated', {
        runId,
        subjectId: consolidated.subjectId,
        recommendation: consolidated.recommendation,
        confidence: consolidated.confidence,
        contributorCount: consolidated.contributorCount,
      });

      const report = composeReport(consolidated, dispatch.results, { dispatch });
      run.finish();

      const durationMs = Date.now() - started;
      this.log.info(`Run finished for ${request.subjectId}`, {
        runId,
        recommendation: consolidated.recommendation,
        contributors: consolidated.contributorCount,
        registered: dispatch.registered,
        durationMs,
      });
      this.emit('RunFinished', { runId, subjectId: request.subjectId, durationMs });

      return { status: 'finished', runId, request, report, consolidated, dispatch };
    } catch (err) {
      const error = classifyError(err);
      run.fail();
      this.log.error(`Run failed for ${request.subjectId}: ${error.message}`, { runId, kind: error.kind });
      this.emit('RunFailed', { runId, subjectId: request.subjectId, ...error });
      return { status: 'error', runId, error };
    } finally {
      this.inFlight--;
    }
  }

  /**
   * Stop accepting runs and release the pool, waiting up to the configured
   * grace period before force-terminating. Later calls share the first result.
   */
  shutdown(): Promise<ShutdownSummary> {
    if (!this.shutdownPromise) {
      this.log.info('Shutting down worker pool', { graceMs: this.shutdownGraceMs });
      this.shutdownPromise = this.pool.shutdown(this.shutdownGraceMs).then((summary) => {
        this.emit('PoolShutdown', { ...summary });
        return summary;
      });
    }
    return this.shutdownPromise;
  }

  health(): CoordinatorHealth {
    return {
      accepting: this.pool.isAccepting,
      activeTasks: this.pool.active,
      queuedTasks: this.pool.queued,
      workers: this.listWorkers(),
      runsInFlight: this.inFlight,
    };
  }

  private normalize(input: AnalysisRequest | string): AnalysisRequest {
    if (typeof input === 'string') {
      const subjectId = extractSubjectId(input);
      if (!subjectId) {
        throw new InputError(`No subject identifier found in "${input}"`);
      }
      return { subjectId, parameters: extractParameters(input), query: input };
    }

    const subjectId = input.subjectId.trim();
    if (!subjectId) {
      throw new InputError('Analysis request has an empty subject identifier');
    }
    const parameters: Record<string, ParameterValue> = { ...input.parameters };
    return { ...input, subjectId, parameters };
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'AnalysisOrchestration',
      payload,
    });
  }
}
