// Failure taxonomy for a coordinated run
// Only input and aggregation failures end a run; the rest are absorbed and logged

export type FailureKind =
  | 'input'
  | 'worker'
  | 'timeout'
  | 'aggregation'
  | 'shutdown'
  | 'unavailable';

export class CoordinatorError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CoordinatorError';
  }
}

/** The request carries no usable subject identifier. */
export class InputError extends CoordinatorError {
  constructor(message: string) {
    super(message, 'input');
    this.name = 'InputError';
  }
}

/** A single worker threw or produced an invalid result. */
export class WorkerFailure extends CoordinatorError {
  constructor(
    message: string,
    public readonly workerId: string,
    cause?: unknown,
  ) {
    super(message, 'worker', cause);
    this.name = 'WorkerFailure';
  }
}

/** The batch-wide deadline elapsed; used as the abort reason for stragglers. */
export class TimeoutFailure extends CoordinatorError {
  constructor(public readonly timeoutMs: number) {
    super(`Dispatch deadline of ${timeoutMs}ms elapsed`, 'timeout');
    this.name = 'TimeoutFailure';
  }
}

/** No worker produced a valid result in time. */
export class AggregationFailure extends CoordinatorError {
  constructor(message: string) {
    super(message, 'aggregation');
    this.name = 'AggregationFailure';
  }
}

/** The pool did not drain within its grace period and was force-terminated. */
export class ShutdownFailure extends CoordinatorError {
  constructor(
    message: string,
    public readonly abandonedTasks: number,
  ) {
    super(message, 'shutdown');
    this.name = 'ShutdownFailure';
  }
}

/** Work was submitted after the pool stopped accepting it. */
export class PoolClosedError extends CoordinatorError {
  constructor() {
    super('Worker pool is shut down and no longer accepts work', 'unavailable');
    this.name = 'PoolClosedError';
  }
}
