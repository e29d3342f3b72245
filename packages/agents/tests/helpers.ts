// In-process fake workers for coordinator tests

import type { AnalysisResult } from '../types/analysis.js';
import type { AnalysisWorker } from '../types/agents.js';

export function result(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    recommendation: 'HOLD',
    confidence: 0.5,
    keyPoints: [],
    warnings: [],
    rawData: {},
    ...overrides,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Resolves with `value` after `delayMs`, ignoring the abort signal. */
export function fixedWorker(value: unknown, delayMs = 0): AnalysisWorker {
  return {
    perform: async () => {
      if (delayMs > 0) await sleep(delayMs);
      return value;
    },
  };
}

export function failingWorker(message: string): AnalysisWorker {
  return {
    perform: async () => {
      throw new Error(message);
    },
  };
}

/** Never settles on its own; rejects once its signal aborts. */
export function hangingWorker(): AnalysisWorker {
  return {
    perform: (_subjectId, _parameters, signal) => new Promise<unknown>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }),
  };
}

/** Takes `delayMs` whatever happens to its signal, counting calls in flight. */
export function stubbornWorker(delayMs: number, value: unknown = result()): AnalysisWorker & { peak: number } {
  let running = 0;
  const worker = {
    peak: 0,
    perform: async () => {
      running++;
      worker.peak = Math.max(worker.peak, running);
      await sleep(delayMs);
      running--;
      return value;
    },
  };
  return worker;
}
