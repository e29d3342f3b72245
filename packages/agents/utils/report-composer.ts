// Report composer — renders a consolidated decision and each worker's view as text
// Pure formatting over already-computed values

import type { ConsolidatedResult } from '../types/analysis.js';
import type { ReadonlyPartialResultSet } from '../orchestrator/partial-result-set.js';
import type { DispatchReport } from '../orchestrator/dispatcher.js';
import { workerDisplayName } from '../config/worker-mappings.js';

export const DISCLAIMER =
  'This report is for reference only and does not constitute investment advice. Investing involves risk.';

export interface ReportOptions {
  /** Adds a "responded/registered" line and lists workers that did not contribute */
  dispatch?: DispatchReport;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatPrice(value: number): string {
  return value.toFixed(2);
}

export function composeReport(
  consolidated: ConsolidatedResult,
  results: ReadonlyPartialResultSet,
  options: ReportOptions = {},
): string {
  const lines: string[] = [];

  lines.push('=== Multi-Analyst Consensus Report ===');
  lines.push(`Subject: ${consolidated.subjectId}`);
  lines.push(`Analyzed at: ${consolidated.analyzedAt.toISOString()}`);
  lines.push(`Contributing analysts: ${consolidated.contributorCount}`);
  if (options.dispatch) {
    const { dispatch } = options;
    lines.push(`Responded: ${dispatch.results.size}/${dispatch.registered}${dispatch.timedOut ? ' (deadline reached)' : ''}`);
  }
  lines.push('');

  lines.push('=== Consolidated Verdict ===');
  lines.push(`Recommendation: ${consolidated.recommendation}`);
  lines.push(`Risk level: ${consolidated.riskLevel}`);
  lines.push(`Confidence: ${formatPercent(consolidated.confidence)}`);
  if (consolidated.targetPrice !== null) {
    lines.push(`Target price: ${formatPrice(consolidated.targetPrice)}`);
  }
  lines.push(`Consensus: ${formatPercent(consolidated.consensusLevel)}${consolidated.unanimous ? ' (unanimous)' : ''}`);
  lines.push('');

  lines.push('=== Analyst Detail ===');
  for (const [workerId, result] of results.entries()) {
    lines.push('');
    lines.push(`[${workerDisplayName(workerId)}]`);
    lines.push(`Recommendation: ${result.recommendation}`);
    lines.push(`Confidence: ${formatPercent(result.confidence)}`);
    if (result.riskLevel) lines.push(`Risk level: ${result.riskLevel}`);
    if (result.targetPrice !== null && result.targetPrice !== undefined && result.targetPrice > 0) {
      lines.push(`Target price: ${formatPrice(result.targetPrice)}`);
    }
    if (result.conclusion) lines.push(`Conclusion: ${result.conclusion}`);
    if (result.keyPoints.length > 0) {
      lines.push('Key points:');
      for (const point of result.keyPoints) {
        lines.push(`- ${point}`);
      }
    }
  }

  const missing = options.dispatch?.outcomes.filter(o => o.status !== 'succeeded') ?? [];
  if (missing.length > 0) {
    lines.push('');
    lines.push('=== Missing Analysts ===');
    for (const outcome of missing) {
      lines.push(`- ${outcome.workerId}: ${outcome.status.replace('_', ' ')}${outcome.error ? ` (${outcome.error})` : ''}`);
    }
  }

  if (consolidated.warnings.length > 0) {
    lines.push('');
    lines.push('=== Risk Warnings ===');
    for (const warning of consolidated.warnings) {
      lines.push(`! [${warning.source.toUpperCase()}] ${warning.text}`);
    }
  }

  lines.push('');
  lines.push('=== Disclaimer ===');
  lines.push(DISCLAIMER);

  return lines.join('\n');
}
