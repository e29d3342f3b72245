#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  Coordinator,
  createLogger,
  createToolCaller,
  createToolWorkers,
  errorMessage,
  loadConfig,
  setLogLevel,
  type McpBridge,
} from "@consensus-desk/agents";
import { registerConsensusTools } from "./tools/consensus.js";

const log = createLogger("McpServer");
const config = loadConfig();
setLogLevel(config.logLevel);

const coordinator = new Coordinator({
  maxConcurrency: config.maxConcurrency,
  timeoutMs: config.timeoutMs,
  shutdownGraceMs: config.shutdownGraceMs,
  weights: config.weights,
});

let bridge: McpBridge | null = null;
if (config.analysisServer) {
  const caller = await createToolCaller({ serverPath: config.analysisServer });
  bridge = caller.bridge;
  for (const { id, worker } of createToolWorkers(caller.callTool)) {
    coordinator.registerWorker(id, worker);
  }
} else {
  log.warn("CONSENSUS_ANALYSIS_SERVER is not set; no analysis workers registered");
}

const server = new McpServer({
  name: "consensus-desk-mcp",
  version: "0.1.0",
});

registerConsensusTools(server, coordinator);

let closing: Promise<void> | null = null;
function close(): Promise<void> {
  if (!closing) {
    closing = (async () => {
      await coordinator.shutdown();
      if (bridge) await bridge.disconnect();
      await server.close();
    })();
  }
  return closing;
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      },
    );
  });
}

// Client hung up
server.server.onclose = () => {
  close().catch((err: unknown) => log.error("Shutdown failed", { error: errorMessage(err) }));
};

const transport = new StdioServerTransport();
await server.connect(transport);
