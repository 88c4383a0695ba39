/**
 * Shared types for the Consensus Engine module.
 */

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export const OUTCOMES = ['ACCEPT', 'REJECT', 'REVISE'] as const

/** Three-way outcome; exactly one per decision */
export type Outcome = (typeof OUTCOMES)[number]

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Thresholds for the aggregation rule. Every bound is inclusive.
 */
export interface ConsensusConfig {
  /** Minimum average novelty for acceptance, in [0, 1] */
  readonly noveltyThreshold: number
  /** Minimum count of testable predictions supplied with the statement */
  readonly minTestablePredictions: number
  /** Minimum fraction of judgments agreeing on coherence, in [0, 1] */
  readonly coherenceQuorumFraction: number
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

export interface CoherenceAgreement {
  /** Judgments with a coherence score at or above the agreement cutoff */
  readonly agreeing: number
  /** All judgments considered, including those without a coherence score */
  readonly total: number
}

/** Numbers behind each criterion, kept so callers need not recompute them */
export interface DecisionMetrics {
  readonly testablePredictions: number
  readonly coherenceAgreement: CoherenceAgreement
  /** How many judgments carried a novelty score */
  readonly noveltySamples: number
}

/**
 * Result of applying the aggregation rule to one judgment set.
 * Carries no timestamp: identical input yields an identical Decision.
 */
export interface Decision {
  readonly outcome: Outcome
  readonly averageNovelty: number
  /** One entry per rule that fired, in rule order */
  readonly reasons: readonly string[]
  /** Evaluator ids of the judgments considered, in judgment order */
  readonly contributingJudgmentIds: readonly string[]
  readonly metrics: DecisionMetrics
}
