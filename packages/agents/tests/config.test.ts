// Tests for environment configuration

import { describe, it, expect } from 'vitest';
import { loadConfig, parseWeights, ConfigError } from '../config/index.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      maxConcurrency: 5,
      timeoutMs: 30_000,
      shutdownGraceMs: 5000,
      weights: { technical: 0.4, fundamental: 0.5, sentiment: 0.1 },
      logLevel: 'info',
      analysisServer: undefined,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      CONSENSUS_MAX_CONCURRENCY: '8',
      CONSENSUS_TIMEOUT_MS: '1500',
      CONSENSUS_SHUTDOWN_GRACE_MS: '0',
      CONSENSUS_WEIGHTS: 'technical=1, sentiment=0.25',
      CONSENSUS_LOG_LEVEL: 'debug',
      CONSENSUS_ANALYSIS_SERVER: '/opt/analysis/server.js',
    });

    expect(config).toEqual({
      maxConcurrency: 8,
      timeoutMs: 1500,
      shutdownGraceMs: 0,
      weights: { technical: 1, sentiment: 0.25 },
      logLevel: 'debug',
      analysisServer: '/opt/analysis/server.js',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ CONSENSUS_TIMEOUT_MS: '  ' }).timeoutMs).toBe(30_000);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ CONSENSUS_MAX_CONCURRENCY: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ CONSENSUS_MAX_CONCURRENCY: '65' })).toThrow(/CONSENSUS_MAX_CONCURRENCY/);
    expect(() => loadConfig({ CONSENSUS_LOG_LEVEL: 'loud' })).toThrow(/CONSENSUS_LOG_LEVEL/);
  });
});

describe('parseWeights', () => {
  it('parses id=weight pairs', () => {
    expect(parseWeights('a=0.2,b=1')).toEqual({ a: 0.2, b: 1 });
    expect(parseWeights('')).toEqual({});
  });

  it('rejects malformed entries', () => {
    expect(() => parseWeights('a')).toThrow(ConfigError);
    expect(() => parseWeights('=0.3')).toThrow(ConfigError);
    expect(() => parseWeights('a=')).toThrow(ConfigError);
    expect(() => parseWeights('a=1.5')).toThrow('Invalid weight entry "a=1.5"');
  });
});
