// BC2: Analysis Workers - pluggable analysts invoked through a fixed contract

import type { ParameterValue } from './analysis.js';

/**
 * The Analysis capability. Implementations may be slow, remote or loosely typed:
 * whatever they resolve with is validated by the dispatcher before it counts.
 * The signal is advisory; a worker that ignores it simply forfeits its result.
 */
export interface AnalysisWorker {
  perform(
    subjectId: string,
    parameters: Readonly<Record<string, ParameterValue>>,
    signal: AbortSignal,
  ): Promise<unknown>;
}

export interface WorkerDescriptor {
  readonly id: string;
  readonly weight: number;
  readonly worker: AnalysisWorker;
}

export interface RegisteredWorker {
  readonly id: string;
  readonly worker: AnalysisWorker;
}

export type WorkerStatus = 'succeeded' | 'failed' | 'invalid' | 'timed_out';

export interface WorkerOutcome {
  readonly workerId: string;
  readonly status: WorkerStatus;
  readonly durationMs: number;
  readonly error?: string;
}
