// Per-run lifecycle: IDLE -> RUNNING -> FINISHED | ERROR
// A run object is used once; terminal states never move again

import { randomUUID } from 'node:crypto';

export type RunState = 'IDLE' | 'RUNNING' | 'FINISHED' | 'ERROR';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  IDLE: ['RUNNING', 'ERROR'],
  RUNNING: ['FINISHED', 'ERROR'],
  FINISHED: [],
  ERROR: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: RunState,
    public readonly to: RunState,
  ) {
    super(`Illegal run transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class AnalysisRun {
  readonly runId: string;
  readonly createdAt = new Date();
  private current: RunState = 'IDLE';
  private history: RunState[] = ['IDLE'];

  constructor(runId: string = randomUUID()) {
    this.runId = runId;
  }

  get state(): RunState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /** States visited so far, oldest first. */
  get transitions(): readonly RunState[] {
    return [...this.history];
  }

  start(): void {
    this.transition('RUNNING');
  }

  finish(): void {
    this.transition('FINISHED');
  }

  fail(): void {
    this.transition('ERROR');
  }

  private transition(to: RunState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
  }
}
