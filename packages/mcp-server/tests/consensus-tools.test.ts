import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Coordinator, silentLogger, type AnalysisWorker } from "@consensus-desk/agents";
import { runConsensusAnalysis, setWorkerWeight, coordinatorHealth } from "../src/tools/consensus.js";
import { ConsensusAnalysisRequestSchema, SetWorkerWeightSchema } from "../src/schemas/consensus.js";
import { coerceNumbers, wrapResponse, type ToolResponse } from "../src/formatters/response.js";

function body(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

function worker(value: unknown): AnalysisWorker {
  return { perform: async () => value };
}

describe("consensus tools", () => {
  let coordinator: Coordinator;

  beforeEach(() => {
    coordinator = new Coordinator({
      weights: { technical: 0.4, fundamental: 0.5 },
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await coordinator.shutdown();
  });

  describe("consensus_analysis", () => {
    it("returns the consolidated decision as JSON", async () => {
      coordinator.registerWorker("technical", worker({ recommendation: "BUY", confidence: 0.9 }));
      coordinator.registerWorker("fundamental", worker({ recommendation: "SELL", confidence: 0.5 }));

      const response = await runConsensusAnalysis(coordinator, { query: "weekly outlook for 600000.SH" });

      expect(response.isError).toBeUndefined();
      expect(body(response)).toMatchObject({
        consolidated: {
          subjectId: "600000.SH",
          recommendation: "BUY",
          contributorCount: 2,
        },
        outcomes: [
          { workerId: "technical", status: "succeeded" },
          { workerId: "fundamental", status: "succeeded" },
        ],
        timedOut: false,
      });
    });

    it("uses an explicit subject and parameters", async () => {
      const seen: unknown[] = [];
      coordinator.registerWorker("technical", {
        perform: async (subjectId, parameters) => {
          seen.push({ subjectId, parameters });
          return { recommendation: "HOLD", confidence: 0.5 };
        },
      });

      await runConsensusAnalysis(coordinator, {
        subject: "AAPL",
        query: "monthly",
        parameters: { lookback: "20", depth: "summary" },
      });

      expect(seen).toEqual([
        { subjectId: "AAPL", parameters: { timeframe: "1M", depth: "summary", lookback: 20 } },
      ]);
    });

    it("reports run failures with their kind", async () => {
      const response = await runConsensusAnalysis(coordinator, { query: "nothing to see here" });

      expect(response.isError).toBe(true);
      expect(body(response)).toMatchObject({ kind: "input" });
    });

    it("requires a query or a subject", async () => {
      const response = await runConsensusAnalysis(coordinator, {});

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({ kind: "input", error: "Provide either query or subject" });
    });
  });

  describe("set_worker_weight", () => {
    it("updates the weight used by later runs", () => {
      coordinator.registerWorker("technical", worker({ recommendation: "BUY", confidence: 1 }));

      const response = setWorkerWeight(coordinator, { worker_id: "technical", weight: "0.25" });

      expect(body(response)).toEqual({ worker_id: "technical", weight: 0.25, registered: true });
      expect(coordinator.listWorkers()[0].weight).toBe(0.25);
    });

    it("rejects weights outside [0, 1]", () => {
      const response = setWorkerWeight(coordinator, { worker_id: "technical", weight: 3 });
      expect(response.isError).toBe(true);
    });
  });

  describe("coordinator_health", () => {
    it("describes the pool and workers", () => {
      coordinator.registerWorker("fundamental", worker({ recommendation: "BUY", confidence: 1 }));

      expect(body(coordinatorHealth(coordinator))).toEqual({
        accepting: true,
        activeTasks: 0,
        queuedTasks: 0,
        workers: [{ id: "fundamental", weight: 0.5, configured: true }],
        runsInFlight: 0,
      });
    });
  });
});

describe("schemas", () => {
  it("accepts either a query or a subject", () => {
    expect(ConsensusAnalysisRequestSchema.safeParse({ query: "AAPL" }).success).toBe(true);
    expect(ConsensusAnalysisRequestSchema.safeParse({ subject: "AAPL" }).success).toBe(true);
    expect(ConsensusAnalysisRequestSchema.safeParse({ query: "  " }).success).toBe(false);
  });

  it("coerces numeric weights", () => {
    expect(SetWorkerWeightSchema.parse({ worker_id: "x", weight: "0.5" }).weight).toBe(0.5);
  });
});

describe("response formatting", () => {
  it("coerces numeric strings recursively", () => {
    expect(coerceNumbers({ a: "1.5", b: ["2", "x"], c: "true", d: "" })).toEqual({
      a: 1.5,
      b: [2, "x"],
      c: "true",
      d: "",
    });
  });

  it("wraps errors as error responses", () => {
    expect(wrapResponse(new Error("nope"))).toEqual({
      content: [{ type: "text", text: JSON.stringify({ error: "nope" }) }],
      isError: true,
    });
  });

  it("passes strings through unchanged", () => {
    expect(wrapResponse("plain").content[0].text).toBe("plain");
  });
});
