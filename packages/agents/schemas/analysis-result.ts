import { z } from 'zod';
import { RECOMMENDATIONS, RISK_LEVELS, type AnalysisResult } from '../types/analysis.js';

// Workers may be remote; accept enum values in any case and surrounding whitespace
const upperCased = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

export const RecommendationSchema = z.preprocess(
  upperCased,
  z.enum(RECOMMENDATIONS),
);

export const RiskLevelSchema = z.preprocess(
  upperCased,
  z.enum(RISK_LEVELS),
);

export const AnalysisResultSchema = z.object({
  recommendation: RecommendationSchema.describe('Worker verdict: BUY, HOLD or SELL'),
  confidence: z.number().min(0).max(1).describe('Confidence score in [0, 1]'),
  riskLevel: RiskLevelSchema.nullish(),
  targetPrice: z.number().finite().nullish(),
  keyPoints: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
  conclusion: z.string().nullish(),
  rawData: z.record(z.unknown()).default({}),
});

export type ResultValidation =
  | { ok: true; result: AnalysisResult }
  | { ok: false; reason: string };

/**
 * Check a worker's output against the result contract. Only results with a
 * recommendation and a confidence in [0, 1] are valid.
 */
export function validateResult(value: unknown): ResultValidation {
  const parsed = AnalysisResultSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason };
  }

  const data = parsed.data;
  return {
    ok: true,
    result: {
      recommendation: data.recommendation,
      confidence: data.confidence,
      riskLevel: data.riskLevel ?? undefined,
      targetPrice: data.targetPrice ?? null,
      keyPoints: data.keyPoints,
      warnings: data.warnings,
      conclusion: data.conclusion ?? undefined,
      rawData: data.rawData,
    },
  };
}
