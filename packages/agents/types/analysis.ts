// BC1: Analysis Orchestration - request, per-worker result, consolidated decision
// The coordinator receives requests, fans them out to workers, and consolidates results

export const RECOMMENDATIONS = ['BUY', 'HOLD', 'SELL'] as const;
export type Recommendation = typeof RECOMMENDATIONS[number];
export const NEUTRAL_RECOMMENDATION: Recommendation = 'HOLD';

/** Severity order, lowest first. */
export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type RiskLevel = typeof RISK_LEVELS[number];

export type ParameterValue = string | number | boolean;

export interface AnalysisRequest {
  readonly subjectId: string;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  /** Free text the request was parsed from, when it came from a query */
  readonly query?: string;
}

export interface AnalysisResult {
  readonly recommendation: Recommendation;
  readonly confidence: number;   // 0-1
  readonly riskLevel?: RiskLevel;
  readonly targetPrice?: number | null;
  readonly keyPoints: readonly string[];
  readonly warnings: readonly string[];
  readonly conclusion?: string;
  readonly rawData: Readonly<Record<string, unknown>>;
}

export interface TaggedEntry {
  readonly source: string;   // worker id
  readonly text: string;
}

export interface WorkerBreakdown {
  readonly recommendation: Recommendation;
  readonly confidence: number;
  readonly riskLevel: RiskLevel | null;
  readonly targetPrice: number | null;
  readonly conclusion: string | null;
  readonly rawData: Readonly<Record<string, unknown>>;
}

export interface ConsolidatedResult {
  readonly subjectId: string;
  readonly recommendation: Recommendation;
  readonly confidence: number;
  readonly riskLevel: RiskLevel;
  readonly targetPrice: number | null;
  readonly keyPoints: readonly TaggedEntry[];
  readonly warnings: readonly TaggedEntry[];
  readonly conclusion: string;
  readonly contributorCount: number;
  readonly contributors: readonly string[];
  readonly breakdown: Readonly<Record<string, WorkerBreakdown>>;
  /** Share of the total vote held by the winning recommendation */
  readonly consensusLevel: number;
  readonly unanimous: boolean;
  readonly analyzedAt: Date;
}
