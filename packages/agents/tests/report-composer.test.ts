// Tests for the text report

import { describe, it, expect } from 'vitest';
import { composeReport, DISCLAIMER, formatPercent } from '../utils/report-composer.js';
import { aggregate } from '../orchestrator/aggregator.js';
import { PartialResultSet } from '../orchestrator/partial-result-set.js';
import { WeightTable } from '../orchestrator/weight-table.js';
import type { DispatchReport } from '../orchestrator/dispatcher.js';
import { silentLogger } from '../utils/logger.js';
import { result } from './helpers.js';

const analyzedAt = new Date('2026-01-05T09:30:00.000Z');

function fixture() {
  const results = PartialResultSet.of({
    technical: result({
      recommendation: 'BUY', confidence: 0.8, riskLevel: 'LOW', targetPrice: 100,
      keyPoints: ['Uptrend intact'], warnings: ['Overbought on RSI'], conclusion: 'Momentum positive',
    }),
    fundamental: result({ recommendation: 'HOLD', confidence: 0.6 }),
  });
  const weights = new WeightTable({ technical: 0.4, fundamental: 0.5 });
  const consolidated = aggregate('AAPL', results, weights.snapshot(), { logger: silentLogger, analyzedAt });
  return { results, consolidated };
}

describe('composeReport', () => {
  it('renders the verdict, each analyst, warnings and the disclaimer', () => {
    const { results, consolidated } = fixture();

    expect(composeReport(consolidated, results)).toBe([
      '=== Multi-Analyst Consensus Report ===',
      'Subject: AAPL',
      'Analyzed at: 2026-01-05T09:30:00.000Z',
      'Contributing analysts: 2',
      '',
      '=== Consolidated Verdict ===',
      'Recommendation: BUY',
      'Risk level: LOW',
      'Confidence: 68.9%',
      'Target price: 100.00',
      'Consensus: 51.6%',
      '',
      '=== Analyst Detail ===',
      '',
      '[Technical Analyst]',
      'Recommendation: BUY',
      'Confidence: 80.0%',
      'Risk level: LOW',
      'Target price: 100.00',
      'Conclusion: Momentum positive',
      'Key points:',
      '- Uptrend intact',
      '',
      '[Fundamental Analyst]',
      'Recommendation: HOLD',
      'Confidence: 60.0%',
      '',
      '=== Risk Warnings ===',
      '! [TECHNICAL] Overbought on RSI',
      '',
      '=== Disclaimer ===',
      DISCLAIMER,
    ].join('\n'));
  });

  it('lists analysts that did not contribute', () => {
    const { results, consolidated } = fixture();
    const dispatch: DispatchReport = {
      results,
      outcomes: [
        { workerId: 'technical', status: 'succeeded', durationMs: 4 },
        { workerId: 'fundamental', status: 'succeeded', durationMs: 6 },
        { workerId: 'sentiment', status: 'timed_out', durationMs: 30_000, error: 'Dispatch deadline of 30000ms elapsed' },
      ],
      registered: 3,
      timedOut: true,
      durationMs: 30_000,
    };

    const lines = composeReport(consolidated, results, { dispatch }).split('\n');

    expect(lines).toContain('Responded: 2/3 (deadline reached)');
    const missing = lines.indexOf('=== Missing Analysts ===');
    expect(missing).toBeGreaterThan(0);
    expect(lines[missing + 1]).toBe('- sentiment: timed out (Dispatch deadline of 30000ms elapsed)');
  });

  it('marks a unanimous verdict', () => {
    const results = PartialResultSet.of({ technical: result({ recommendation: 'SELL', confidence: 0.5 }) });
    const consolidated = aggregate('TSLA', results, new WeightTable({ technical: 1 }).snapshot(), {
      logger: silentLogger,
      analyzedAt,
    });

    expect(composeReport(consolidated, results).split('\n')).toContain('Consensus: 100.0% (unanimous)');
  });
});

describe('formatPercent', () => {
  it('renders one decimal place', () => {
    expect(formatPercent(0.12345)).toBe('12.3%');
    expect(formatPercent(1)).toBe('100.0%');
  });
});
