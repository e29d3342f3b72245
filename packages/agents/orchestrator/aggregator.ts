// Weighted consensus over a frozen partial result set
// Every step is a sum or a maximum, so completion order never changes the outcome

import type {
  AnalysisResult, ConsolidatedResult, Recommendation, RiskLevel,
  TaggedEntry, WorkerBreakdown,
} from '../types/analysis.js';
import { NEUTRAL_RECOMMENDATION, RISK_LEVELS } from '../types/analysis.js';
import type { ReadonlyPartialResultSet } from './partial-result-set.js';
import { DEFAULT_WEIGHT, type WeightLookup } from './weight-table.js';
import { AggregationFailure } from './errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Tallies closer than this are treated as a tie. */
export const TIE_EPSILON = 1e-9;

export interface Contribution {
  readonly workerId: string;
  readonly weight: number;
  readonly result: AnalysisResult;
}

export interface RecommendationVote {
  recommendation: Recommendation;
  tallies: Partial<Record<Recommendation, number>>;
  consensusLevel: number;
  tied: boolean;
}

export interface AggregateOptions {
  logger?: Logger;
  analyzedAt?: Date;
}

/** Σ(wᵢ·cᵢ) / Σwᵢ, or 0 when every weight is zero. */
export function weightedConfidence(contributions: readonly Contribution[]): number {
  if (contributions.length === 1) return contributions[0].result.confidence;

  let weighted = 0;
  let totalWeight = 0;
  for (const { weight, result } of contributions) {
    weighted += weight * result.confidence;
    totalWeight += weight;
  }
  return totalWeight > 0 ? weighted / totalWeight : 0;
}

/**
 * Each result votes weight × confidence for its recommendation. A shared
 * maximum, or no votes at all, falls back to the neutral recommendation.
 */
export function voteRecommendation(contributions: readonly Contribution[]): RecommendationVote {
  const tallies = new Map<Recommendation, number>();
  for (const { weight, result } of contributions) {
    tallies.set(result.recommendation, (tallies.get(result.recommendation) ?? 0) + weight * result.confidence);
  }

  if (tallies.size === 0) {
    return { recommendation: NEUTRAL_RECOMMENDATION, tallies: {}, consensusLevel: 0, tied: false };
  }

  const max = Math.max(...tallies.values());
  const leaders = [...tallies.entries()].filter(([, tally]) => max - tally <= TIE_EPSILON);
  const total = [...tallies.values()].reduce((sum, t) => sum + t, 0);
  const tied = leaders.length > 1;

  let consensusLevel = total > 0 ? max / total : 0;
  if (contributions.length === 1) consensusLevel = 1;

  return {
    recommendation: tied ? NEUTRAL_RECOMMENDATION : leaders[0][0],
    tallies: Object.fromEntries(tallies),
    consensusLevel,
    tied,
  };
}

/** Most severe level reported; LOW when nobody reports one. */
export function escalateRisk(contributions: readonly Contribution[]): RiskLevel {
  let rank = 0;
  for (const { result } of contributions) {
    if (result.riskLevel) rank = Math.max(rank, RISK_LEVELS.indexOf(result.riskLevel));
  }
  return RISK_LEVELS[rank];
}

/**
 * Weighted mean of strictly positive target prices, weighting each by
 * weight × confidence. Null when no price qualifies or the weights sum to zero.
 */
export function weightedTargetPrice(contributions: readonly Contribution[]): number | null {
  let weightedPrice = 0;
  let totalWeight = 0;

  for (const { weight, result } of contributions) {
    const price = result.targetPrice;
    if (price === null || price === undefined || !Number.isFinite(price) || price <= 0) continue;
    const adjusted = weight * result.confidence;
    weightedPrice += adjusted * price;
    totalWeight += adjusted;
  }

  return totalWeight > 0 ? weightedPrice / totalWeight : null;
}

function tagEntries(
  contributions: readonly Contribution[],
  pick: (result: AnalysisResult) => readonly string[],
): TaggedEntry[] {
  return contributions.flatMap(({ workerId, result }) =>
    pick(result).map(text => Object.freeze({ source: workerId, text })),
  );
}

function buildBreakdown(contributions: readonly Contribution[]): Record<string, WorkerBreakdown> {
  const breakdown: Record<string, WorkerBreakdown> = {};
  for (const { workerId, result } of contributions) {
    breakdown[workerId] = Object.freeze({
      recommendation: result.recommendation,
      confidence: result.confidence,
      riskLevel: result.riskLevel ?? null,
      targetPrice: result.targetPrice ?? null,
      conclusion: result.conclusion ?? null,
      rawData: Object.freeze({ ...result.rawData }),
    });
  }
  return breakdown;
}

function buildConclusion(
  subjectId: string,
  recommendation: Recommendation,
  contributions: readonly Contribution[],
): string {
  const count = contributions.length;
  const lines = [
    `${count} analyst${count === 1 ? '' : 's'} assessed ${subjectId}; consolidated recommendation: ${recommendation}.`,
  ];
  for (const { workerId, result } of contributions) {
    lines.push(`- ${workerId}: ${result.recommendation} (confidence ${(result.confidence * 100).toFixed(1)}%)`);
  }
  return lines.join('\n');
}

/**
 * Combine a frozen set of worker results into one decision.
 * @throws AggregationFailure when no worker contributed
 */
export function aggregate(
  subjectId: string,
  results: ReadonlyPartialResultSet,
  weights: WeightLookup,
  options: AggregateOptions = {},
): ConsolidatedResult {
  const log = options.logger ?? createLogger('Aggregator');
  const contributions: Contribution[] = results.entries().map(([workerId, result]) => ({
    workerId,
    weight: weights.weightOf(workerId),
    result,
  }));

  if (contributions.length === 0) {
    throw new AggregationFailure(`No analyst produced a valid result for ${subjectId}`);
  }

  const vote = voteRecommendation(contributions);
  const warnings = tagEntries(contributions, r => r.warnings);

  const unweighted = contributions.filter(c => !weights.isConfigured(c.workerId)).map(c => c.workerId);
  if (unweighted.length * 2 > contributions.length) {
    const text = `Default weight ${DEFAULT_WEIGHT.toFixed(1)} applied to ${unweighted.length} of ${contributions.length} contributors (${unweighted.join(', ')})`;
    log.warn(text, { subjectId });
    warnings.push(Object.freeze({ source: 'coordinator', text }));
  }

  const firstRecommendation = contributions[0].result.recommendation;

  return Object.freeze({
    subjectId,
    recommendation: vote.recommendation,
    confidence: weightedConfidence(contributions),
    riskLevel: escalateRisk(contributions),
    targetPrice: weightedTargetPrice(contributions),
    keyPoints: Object.freeze(tagEntries(contributions, r => r.keyPoints)),
    warnings: Object.freeze(warnings),
    conclusion: buildConclusion(subjectId, vote.recommendation, contributions),
    contributorCount: contributions.length,
    contributors: Object.freeze(contributions.map(c => c.workerId)),
    breakdown: Object.freeze(buildBreakdown(contributions)),
    consensusLevel: vote.consensusLevel,
    unanimous: contributions.every(c => c.result.recommendation === firstRecommendation),
    analyzedAt: options.analyzedAt ?? new Date(),
  });
}
