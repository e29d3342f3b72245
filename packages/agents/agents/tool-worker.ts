// Tool-backed analysis worker
// Calls one upstream analysis tool per request and hands back its raw payload

import type { ParameterValue } from '../types/analysis.js';
import type { AnalysisWorker } from '../types/agents.js';
import { WORKER_TOOLS } from '../config/worker-mappings.js';

export type ToolCaller = (toolName: string, params: Record<string, unknown>) => Promise<unknown>;

export interface ToolWorkerDefinition {
  id: string;
  toolName: string;
}

function abortError(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}

export class ToolWorker implements AnalysisWorker {
  constructor(
    readonly toolName: string,
    private readonly callTool: ToolCaller,
  ) {}

  /**
   * Resolves with whatever the tool returns; the dispatcher validates it.
   * Rejects with the abort reason as soon as the signal fires, even if the
   * tool call itself cannot be cancelled.
   */
  perform(
    subjectId: string,
    parameters: Readonly<Record<string, ParameterValue>>,
    signal: AbortSignal,
  ): Promise<unknown> {
    if (signal.aborted) return Promise.reject(abortError(signal));

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => reject(abortError(signal));
      signal.addEventListener('abort', onAbort, { once: true });

      this.callTool(this.toolName, { subject: subjectId, ...parameters }).then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }
}

/** Default workers, one per entry in WORKER_TOOLS unless overridden. */
export function createToolWorkers(
  callTool: ToolCaller,
  definitions: ToolWorkerDefinition[] = Object.entries(WORKER_TOOLS).map(([id, toolName]) => ({ id, toolName })),
): Array<{ id: string; worker: ToolWorker }> {
  return definitions.map(({ id, toolName }) => ({ id, worker: new ToolWorker(toolName, callTool) }));
}
