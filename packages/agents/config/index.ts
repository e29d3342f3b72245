// Environment configuration for the coordinator, CLI and MCP server

import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';
import { DEFAULT_WORKER_WEIGHTS } from './worker-mappings.js';

export { WORKER_TOOLS, WORKER_DESCRIPTIONS, DEFAULT_WORKER_WEIGHTS, workerDisplayName } from './worker-mappings.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse "id=weight,id=weight" into a record. Whitespace around entries is
 * ignored; a malformed entry or a weight outside [0, 1] throws ConfigError.
 */
export function parseWeights(raw: string): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const entry of raw.split(',').map(e => e.trim()).filter(Boolean)) {
    const eq = entry.indexOf('=');
    const id = eq > 0 ? entry.slice(0, eq).trim() : '';
    const value = eq > 0 ? entry.slice(eq + 1).trim() : '';
    const weight = Number(value);
    if (!id || value === '' || !Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new ConfigError(`Invalid weight entry "${entry}" (expected id=weight with weight in [0, 1])`);
    }
    weights[id] = weight;
  }
  return weights;
}

const DEFAULT_WEIGHTS_VALUE = Object.entries(DEFAULT_WORKER_WEIGHTS)
  .map(([id, weight]) => `${id}=${weight}`)
  .join(',');

const EnvSchema = z.object({
  CONSENSUS_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(5),
  CONSENSUS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CONSENSUS_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5000),
  CONSENSUS_WEIGHTS: z.string().default(DEFAULT_WEIGHTS_VALUE),
  CONSENSUS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CONSENSUS_ANALYSIS_SERVER: z.string().min(1).optional(),
});

export interface ConsensusConfig {
  maxConcurrency: number;
  timeoutMs: number;
  shutdownGraceMs: number;
  weights: Record<string, number>;
  logLevel: LogLevel;
  analysisServer?: string;
}

/** Build the runtime configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConsensusConfig {
  // Blank values fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('CONSENSUS_') && value !== undefined && value.trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    maxConcurrency: vars.CONSENSUS_MAX_CONCURRENCY,
    timeoutMs: vars.CONSENSUS_TIMEOUT_MS,
    shutdownGraceMs: vars.CONSENSUS_SHUTDOWN_GRACE_MS,
    weights: parseWeights(vars.CONSENSUS_WEIGHTS),
    logLevel: vars.CONSENSUS_LOG_LEVEL,
    analysisServer: vars.CONSENSUS_ANALYSIS_SERVER,
  };
}
