// Static per-worker weights in [0, 1]

export const DEFAULT_WEIGHT = 1.0;

/** Read-only view handed to the aggregator for one run. */
export interface WeightLookup {
  weightOf(id: string): number;
  /** True when the id has an explicitly configured weight. */
  isConfigured(id: string): boolean;
}

export class WeightTable implements WeightLookup {
  private weights = new Map<string, number>();

  constructor(initial?: Record<string, number>) {
    if (initial) {
      for (const [id, weight] of Object.entries(initial)) {
        this.setWeight(id, weight);
      }
    }
  }

  /**
   * Accepts only finite weights within [0, 1]. Anything else is rejected
   * with no state change and reported through the return value.
   */
  setWeight(id: string, weight: number): boolean {
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) return false;
    const key = id.trim();
    if (!key) return false;
    this.weights.set(key, weight);
    return true;
  }

  clearWeight(id: string): boolean {
    return this.weights.delete(id);
  }

  /** Configured weight, or DEFAULT_WEIGHT when the worker was never weighted. */
  weightOf(id: string): number {
    return this.weights.get(id) ?? DEFAULT_WEIGHT;
  }

  isConfigured(id: string): boolean {
    return this.weights.has(id);
  }

  entries(): Array<[string, number]> {
    return [...this.weights.entries()];
  }

  snapshot(): WeightLookup {
    const frozen = new Map(this.weights);
    return Object.freeze({
      weightOf: (id: string) => frozen.get(id) ?? DEFAULT_WEIGHT,
      isConfigured: (id: string) => frozen.has(id),
    });
  }
}
