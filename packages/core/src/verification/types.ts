/**
 * Verification system types.
 *
 * A candidate answer is sent to several judge models; each judge returns a
 * verdict (or fails), and the verdicts are reduced to one agreement ratio.
 * Separately, independently generated answers to one query can be compared
 * for consensus without any network calls.
 */

// ---------------------------------------------------------------------------
// Judge outcomes
// ---------------------------------------------------------------------------

/** One judge's structured opinion on a candidate answer. */
export interface Verdict {
  readonly sourceId: string;
  readonly verified: boolean;
  /** 0-1; absent when the judge did not say. */
  readonly confidence?: number;
  readonly feedback: string;
  readonly corrections: readonly string[];
}

/** A judge call that failed. Counted in feedback, never in agreement. */
export interface ErrorMarker {
  readonly sourceId: string;
  readonly error: string;
}

export type JudgeOutcome = Verdict | ErrorMarker;

export function isErrorMarker(outcome: JudgeOutcome): outcome is ErrorMarker {
  return 'error' in outcome;
}

// ---------------------------------------------------------------------------
// Verification report
// ---------------------------------------------------------------------------

export interface UsageSummary {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

export interface VerificationReport {
  originalResponse: string;
  /** Fraction of requested judges whose verdict was verified. */
  agreementRatio: number;
  verified: boolean;
  /** One line per requested judge, in request order. */
  feedback: string[];
  /** One outcome per requested judge, in request order. */
  details: JudgeOutcome[];
  /** The judge identifiers that were requested. */
  models: string[];
  usage: UsageSummary;
}

// ---------------------------------------------------------------------------
// Consensus
// ---------------------------------------------------------------------------

export interface CandidateResponse {
  /** Model that produced the answer; `model_<index>` when absent. */
  id?: string;
  text: string;
  verified: boolean;
}

export interface SimilarityPair {
  sourceA: string;
  sourceB: string;
  similarity: number;
}

export type Recommendation = 'USE_WITH_CONFIDENCE' | 'VERIFY_FURTHER';

export const RECOMMENDATION_LABELS: Record<Recommendation, string> = {
  USE_WITH_CONFIDENCE: 'Use with confidence',
  VERIFY_FURTHER: 'Verify further',
};

export interface ConsensusSummary {
  totalResponses: number;
  verifiedCount: number;
  consensusRatio: number;
  recommendation: Recommendation;
}

export interface ConsensusAnalysis {
  summary: ConsensusSummary;
  similarities: SimilarityPair[];
  responses: CandidateResponse[];
}
