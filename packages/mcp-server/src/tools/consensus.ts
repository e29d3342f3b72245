import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalysisRequest, Coordinator, ParameterValue } from "@consensus-desk/agents";
import { extractParameters, extractSubjectId } from "@consensus-desk/agents";
import {
  ConsensusAnalysisSchema,
  ConsensusAnalysisRequestSchema,
  SetWorkerWeightSchema,
  CoordinatorHealthSchema,
} from "../schemas/consensus.js";
import { wrapResponse, errorResponse, coerceNumbers, type ToolResponse } from "../formatters/response.js";

function isParameterValue(value: unknown): value is ParameterValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toParameters(raw: unknown): Record<string, ParameterValue> {
  const params: Record<string, ParameterValue> = {};
  if (raw !== null && typeof raw === "object" && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (isParameterValue(value)) params[key] = value;
    }
  }
  return params;
}

export async function runConsensusAnalysis(coordinator: Coordinator, params: unknown): Promise<ToolResponse> {
  const parsed = ConsensusAnalysisRequestSchema.safeParse(params);
  if (!parsed.success) {
    return errorResponse({
      kind: "input",
      error: parsed.error.issues.map((i) => i.message).join("; "),
    });
  }

  const { query, subject, parameters } = parsed.data;
  // An explicit subject wins; explicit parameters override those read from the query
  const subjectId = subject?.trim() ? subject : query ? extractSubjectId(query) : null;
  let input: AnalysisRequest | string;
  if (subjectId && (subject?.trim() || parameters)) {
    input = {
      subjectId,
      parameters: { ...(query ? extractParameters(query) : {}), ...toParameters(coerceNumbers(parameters)) },
      query,
    };
  } else {
    input = query ?? "";
  }

  const outcome = await coordinator.run(input);
  if (outcome.status === "error") {
    return errorResponse({ runId: outcome.runId, kind: outcome.error.kind, error: outcome.error.message });
  }

  return wrapResponse({
    runId: outcome.runId,
    consolidated: outcome.consolidated,
    outcomes: outcome.dispatch.outcomes,
    timedOut: outcome.dispatch.timedOut,
    report: outcome.report,
  });
}

export function setWorkerWeight(coordinator: Coordinator, params: unknown): ToolResponse {
  const parsed = SetWorkerWeightSchema.safeParse(params);
  if (!parsed.success) {
    return errorResponse({ error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") });
  }
  const { worker_id, weight } = parsed.data;
  if (!coordinator.setWeight(worker_id, weight)) {
    return errorResponse({ error: `Weight for ${worker_id} was rejected` });
  }
  return wrapResponse({ worker_id, weight, registered: coordinator.listWorkers().some((w) => w.id === worker_id) });
}

export function coordinatorHealth(coordinator: Coordinator): ToolResponse {
  return wrapResponse(coordinator.health());
}

export function registerConsensusTools(server: McpServer, coordinator: Coordinator) {
  server.tool(
    "consensus_analysis",
    "Run every registered analysis worker (technical, fundamental, sentiment) against one subject and consolidate the results. Confidence is the weight-averaged confidence of the workers that answered before the deadline; the recommendation is a weighted vote (HOLD on a tie); risk takes the most severe level; the target price is weighted by weight x confidence. Returns the consolidated decision, per-worker outcomes and a text report.",
    ConsensusAnalysisSchema.shape,
    async (params) => runConsensusAnalysis(coordinator, params),
  );

  server.tool(
    "set_worker_weight",
    "Set the static weight (0 to 1) of an analysis worker. Applies from the next consensus_analysis call; runs already in flight keep their weights.",
    SetWorkerWeightSchema.shape,
    async (params) => setWorkerWeight(coordinator, params),
  );

  server.tool(
    "coordinator_health",
    "Report whether the coordinator accepts work, pool usage (active and queued tasks), registered workers with their weights, and runs in flight.",
    CoordinatorHealthSchema.shape,
    async () => coordinatorHealth(coordinator),
  );
}
