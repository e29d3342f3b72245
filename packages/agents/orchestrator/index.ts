export { Coordinator, classifyError } from './coordinator.js';
export type {
  CoordinatorConfig, CoordinatorHealth, RunErrorKind, RunError, RunOutcome, WorkerSummary,
} from './coordinator.js';
export { AnalysisRun, IllegalTransitionError } from './run.js';
export type { RunState } from './run.js';
export { WorkerRegistry } from './registry.js';
export { WeightTable, DEFAULT_WEIGHT } from './weight-table.js';
export type { WeightLookup } from './weight-table.js';
export { WorkerPool } from './worker-pool.js';
export type { PoolTask, ShutdownSummary, WorkerPoolConfig } from './worker-pool.js';
export { Dispatcher } from './dispatcher.js';
export type { DispatcherConfig, DispatchReport } from './dispatcher.js';
export { PartialResultSet } from './partial-result-set.js';
export type { ReadonlyPartialResultSet } from './partial-result-set.js';
export {
  aggregate, weightedConfidence, voteRecommendation, escalateRisk, weightedTargetPrice, TIE_EPSILON,
} from './aggregator.js';
export type { Contribution, RecommendationVote, AggregateOptions } from './aggregator.js';
export {
  CoordinatorError, InputError, WorkerFailure, TimeoutFailure, AggregationFailure,
  ShutdownFailure, PoolClosedError,
} from './errors.js';
export type { FailureKind } from './errors.js';
