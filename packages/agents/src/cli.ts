#!/usr/bin/env node
// consensus — multi-analyst consensus CLI
//
// Usage:
//   consensus analyze "Weekly outlook for 600000.SH"      # run all workers, print report
//   consensus analyze --subject AAPL --json "deep dive"   # explicit subject, JSON output
//   consensus workers                                     # list default workers and weights
//   consensus help                                        # usage

import 'dotenv/config';
import { Coordinator, type RunOutcome } from '../orchestrator/index.js';
import { createToolCaller, type McpBridge } from '../bridge/mcp-client.js';
import { createToolWorkers } from '../agents/tool-worker.js';
import { loadConfig, type ConsensusConfig } from '../config/index.js';
import { WORKER_DESCRIPTIONS, WORKER_TOOLS } from '../config/worker-mappings.js';
import { extractParameters } from '../utils/request-parser.js';
import { formatPercent } from '../utils/report-composer.js';
import { createLogger, errorMessage, setLogLevel } from '../utils/logger.js';
import type { AnalysisRequest } from '../types/analysis.js';
import { parseAnalyzeArgs, signalExitCode, UsageError, type AnalyzeOptions } from './args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const log = createLogger('CLI');

// ── CLI class ───────────────────────────────────────────────────────

class ConsensusCli {
  private coordinator: Coordinator | null = null;
  private bridge: McpBridge | null = null;
  private closing: Promise<void> | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);
    const config = loadConfig();
    setLogLevel(config.logLevel);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'analyze':
        await this.handleAnalyze(rest, config);
        break;
      case 'workers':
        this.listWorkers(config);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exitCode = 1;
    }
  }

  /** Release the pool and the upstream connection; safe to call from any exit path. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = (async () => {
        if (this.coordinator) {
          const summary = await this.coordinator.shutdown();
          if (!summary.drained) {
            log.warn('Shutdown abandoned running tasks', { abandonedTasks: summary.abandonedTasks });
          }
        }
        if (this.bridge) {
          await this.bridge.disconnect();
        }
      })();
    }
    return this.closing;
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: string[], config: ConsensusConfig): Promise<void> {
    const options = parseAnalyzeArgs(args);
    if (options.help) {
      this.printAnalyzeHelp();
      return;
    }
    if (!options.query && !options.subject) {
      throw new UsageError('No query provided. Use "consensus analyze --help" for usage.');
    }

    const serverPath = options.server ?? config.analysisServer;
    if (!serverPath) {
      throw new UsageError('No analysis server configured. Pass --server or set CONSENSUS_ANALYSIS_SERVER.');
    }

    const { callTool, bridge } = await createToolCaller({ serverPath });
    this.bridge = bridge;

    const coordinator = new Coordinator({
      maxConcurrency: options.concurrency ?? config.maxConcurrency,
      timeoutMs: options.timeoutMs ?? config.timeoutMs,
      shutdownGraceMs: config.shutdownGraceMs,
      weights: { ...config.weights, ...options.weights },
      onEvent: (event) => {
        if (!options.json) {
          process.stderr.write(`  ${c('magenta', `[${event.type}]`)} ${c('dim', JSON.stringify(event.payload))}\n`);
        }
      },
    });
    this.coordinator = coordinator;

    for (const { id, worker } of createToolWorkers(callTool)) {
      coordinator.registerWorker(id, worker);
    }

    const startTime = Date.now();
    const outcome = await coordinator.run(toRunInput(options));
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);

    this.printOutcome(outcome, options.json, duration);
    if (outcome.status === 'error') {
      process.exitCode = 1;
    }
  }

  private printOutcome(outcome: RunOutcome, json: boolean, duration: string): void {
    if (outcome.status === 'error') {
      if (json) {
        console.log(JSON.stringify({ status: 'error', runId: outcome.runId, error: outcome.error }, null, 2));
      } else {
        console.error(`  ${c('red', 'Error:')} [${outcome.error.kind}] ${outcome.error.message}\n`);
      }
      return;
    }

    if (json) {
      console.log(JSON.stringify({
        status: 'finished',
        runId: outcome.runId,
        consolidated: outcome.consolidated,
        outcomes: outcome.dispatch.outcomes,
      }, null, 2));
      return;
    }

    console.log(outcome.report);
    console.log(`\n  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${duration}s`)}`);
    console.log(`  ${c('dim', `Analysts: ${outcome.dispatch.results.size}/${outcome.dispatch.registered} | Consensus: ${formatPercent(outcome.consolidated.consensusLevel)}`)}\n`);
  }

  // ── Subcommand: workers ─────────────────────────────────────────

  private listWorkers(config: ConsensusConfig): void {
    console.log(`\n  ${c('bold', 'Analysis workers')}\n`);
    for (const [id, tool] of Object.entries(WORKER_TOOLS)) {
      const weight = config.weights[id];
      console.log(`  ${c('cyan', id.padEnd(12))} ${c('dim', `tool=${tool} weight=${weight ?? 'default'}`)}`);
      console.log(`  ${' '.repeat(12)} ${WORKER_DESCRIPTIONS[id] ?? ''}`);
    }
    console.log();
  }

  // ── Help ────────────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'consensus')} — multi-analyst consensus engine

  ${c('bold', 'Usage:')}
    consensus analyze "<query>"     Run every worker and consolidate the results
    consensus workers               List the default workers and their weights
    consensus help                  Show this help

  ${c('bold', 'Examples:')}
    consensus analyze "Weekly outlook for 600000.SH"
    consensus analyze --subject AAPL --json "detailed view"
    consensus analyze --weight sentiment=0.3 --timeout 10000 "TSLA"
`);
  }

  private printAnalyzeHelp(): void {
    console.log(`
  ${c('bold', 'consensus analyze')} — Run a consensus analysis

  ${c('bold', 'Usage:')}
    consensus analyze [options] "<query>"

  ${c('bold', 'Options:')}
    --subject <id>        Subject identifier (skips extraction from the query)
    --timeout <ms>        Batch-wide deadline (default: CONSENSUS_TIMEOUT_MS or 30000)
    --concurrency <n>     Pool size (default: CONSENSUS_MAX_CONCURRENCY or 5)
    --weight <id=w>       Override a worker weight; repeatable
    --server <path>       Upstream analysis MCP server entry point
    --json                Print the consolidated result as JSON
    -h, --help            Show this help

  ${c('bold', 'Environment:')}
    CONSENSUS_ANALYSIS_SERVER, CONSENSUS_WEIGHTS, CONSENSUS_LOG_LEVEL,
    CONSENSUS_SHUTDOWN_GRACE_MS (see .env)
`);
  }
}

function toRunInput(options: AnalyzeOptions): AnalysisRequest | string {
  if (options.subject) {
    return { subjectId: options.subject, parameters: extractParameters(options.query), query: options.query };
  }
  return options.query;
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new ConsensusCli();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    log.warn(`Received ${signal}; shutting down`);
    cli.close().then(
      () => process.exit(signalExitCode(signal)),
      (err: unknown) => {
        log.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      },
    );
  });
}

cli.start()
  .catch((err: unknown) => {
    const label = err instanceof UsageError ? 'Error:' : 'Fatal:';
    console.error(`${c('red', label)} ${errorMessage(err)}`);
    process.exitCode = 1;
  })
  .then(() => cli.close())
  .catch((err: unknown) => {
    log.error('Shutdown failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
