// Worker registry: worker id -> Analysis capability handle
// Runs read a frozen snapshot, so registrations mid-run never reach an in-flight dispatch

import type { AnalysisWorker, RegisteredWorker } from '../types/agents.js';

export class WorkerRegistry {
  private workers = new Map<string, AnalysisWorker>();

  /**
   * Insert or replace a worker. Returns false, leaving the registry untouched,
   * when the id is blank or the handle is missing.
   */
  register(id: string, worker: AnalysisWorker | null | undefined): boolean {
    if (!worker || typeof worker.perform !== 'function') return false;
    const key = id.trim();
    if (!key) return false;
    this.workers.set(key, worker);
    return true;
  }

  unregister(id: string): boolean {
    return this.workers.delete(id);
  }

  has(id: string): boolean {
    return this.workers.has(id);
  }

  get(id: string): AnalysisWorker | undefined {
    return this.workers.get(id);
  }

  /** Worker ids in registration order. */
  ids(): string[] {
    return [...this.workers.keys()];
  }

  get size(): number {
    return this.workers.size;
  }

  snapshot(): readonly RegisteredWorker[] {
    return Object.freeze(
      [...this.workers.entries()].map(([id, worker]) => Object.freeze({ id, worker })),
    );
  }
}
