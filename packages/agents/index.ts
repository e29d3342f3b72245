// consensus-desk — multi-analyst coordination and weighted consensus
// Fans one request out to pluggable analysis workers and consolidates what returns in time

export * from './orchestrator/index.js';
export * from './types/index.js';

export { ToolWorker, createToolWorkers } from './agents/tool-worker.js';
export type { ToolCaller, ToolWorkerDefinition } from './agents/tool-worker.js';

export { AnalysisResultSchema, RecommendationSchema, RiskLevelSchema, validateResult } from './schemas/analysis-result.js';
export type { ResultValidation } from './schemas/analysis-result.js';

export { composeReport, formatPercent, formatPrice, DISCLAIMER } from './utils/report-composer.js';
export type { ReportOptions } from './utils/report-composer.js';
export { extractSubjectId, extractParameters } from './utils/request-parser.js';
export { createLogger, setLogLevel, silentLogger, errorMessage } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

export { loadConfig, parseWeights, ConfigError } from './config/index.js';
export type { ConsensusConfig } from './config/index.js';
export { WORKER_TOOLS, WORKER_DESCRIPTIONS, DEFAULT_WORKER_WEIGHTS, workerDisplayName } from './config/worker-mappings.js';

// Bridge — connects tool workers to an upstream analysis server over MCP stdio
export { McpBridge, createToolCaller } from './bridge/index.js';
export type { McpBridgeConfig } from './bridge/index.js';
