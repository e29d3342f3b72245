// Per-run result set: one slot per snapshotted worker, written at most once
// Each dispatch task owns exactly one key, so writes never contend

import type { AnalysisResult } from '../types/analysis.js';

export interface ReadonlyPartialResultSet {
  readonly size: number;
  readonly frozen: boolean;
  has(workerId: string): boolean;
  get(workerId: string): AnalysisResult | undefined;
  /** Contributing worker ids, in snapshot order. */
  ids(): string[];
  /** Contributions in snapshot order. */
  entries(): Array<[string, AnalysisResult]>;
}

export class PartialResultSet implements ReadonlyPartialResultSet {
  private results = new Map<string, AnalysisResult>();
  private isFrozen = false;
  private readonly order: readonly string[];

  constructor(workerIds: readonly string[]) {
    this.order = [...workerIds];
  }

  /** Build an already-frozen set from plain results, in key order. */
  static of(results: Record<string, AnalysisResult>): PartialResultSet {
    const set = new PartialResultSet(Object.keys(results));
    for (const [id, result] of Object.entries(results)) {
      set.record(id, result);
    }
    return set.freeze();
  }

  /**
   * Store a worker's result. Returns false once frozen, for a worker outside
   * the snapshot, or for a second write to the same key.
   */
  record(workerId: string, result: AnalysisResult): boolean {
    if (this.isFrozen) return false;
    if (!this.order.includes(workerId)) return false;
    if (this.results.has(workerId)) return false;
    this.results.set(workerId, Object.freeze({ ...result }));
    return true;
  }

  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  get size(): number {
    return this.results.size;
  }

  has(workerId: string): boolean {
    return this.results.has(workerId);
  }

  get(workerId: string): AnalysisResult | undefined {
    return this.results.get(workerId);
  }

  ids(): string[] {
    return this.order.filter(id => this.results.has(id));
  }

  entries(): Array<[string, AnalysisResult]> {
    const out: Array<[string, AnalysisResult]> = [];
    for (const id of this.order) {
      const result = this.results.get(id);
      if (result) out.push([id, result]);
    }
    return out;
  }
}
