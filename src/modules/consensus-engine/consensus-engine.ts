/**
 * Consensus Engine: pure aggregation of a judgment set into a Decision.
 *
 * Criteria, evaluated in this order:
 *  1. Unanimous logical validity (hard gate: any failure → REJECT, stop)
 *  2. Average novelty ≥ noveltyThreshold                        (else REVISE)
 *  3. Testable predictions ≥ minTestablePredictions             (else REVISE)
 *  4. Coherence agreement fraction ≥ coherenceQuorumFraction    (else REVISE)
 *  5. Nothing fired → ACCEPT
 *
 * Criteria 2–4 accumulate reasons; REVISE is never escalated to REJECT.
 */

import { InvalidInputError } from '../../core/errors.js'
import type { Judgment } from '../judgment/types.js'
import type { StatementMetadata } from '../evaluator-pool/types.js'
import {
  COHERENCE_AGREEMENT_CUTOFF,
  DEFAULT_CONSENSUS_CONFIG,
  validateConsensusConfig,
} from './consensus-config.js'
import type {
  CoherenceAgreement,
  ConsensusConfig,
  Decision,
  DecisionMetrics,
  Outcome,
} from './types.js'

// Averages are rounded before comparison so that e.g. four scores of 0.7
// compare equal to a 0.7 threshold.
const METRIC_PRECISION = 1e10
const DISPLAY_PRECISION = 1e4

// ---------------------------------------------------------------------------
// Metric helpers
// ---------------------------------------------------------------------------

function roundMetric(value: number): number {
  return Math.round(value * METRIC_PRECISION) / METRIC_PRECISION
}

/** Shortest decimal form of a value rounded to four places */
export function formatMetric(value: number): string {
  return String(Math.round(value * DISPLAY_PRECISION) / DISPLAY_PRECISION)
}

/**
 * Mean of the novelty scores present. Judgments without a score are left out
 * of both numerator and denominator; with no scores at all the mean is 0.
 */
export function computeAverageNovelty(judgments: readonly Judgment[]): {
  average: number
  samples: number
} {
  let sum = 0
  let samples = 0
  for (const judgment of judgments) {
    if (judgment.noveltyScore !== undefined) {
      sum += judgment.noveltyScore
      samples += 1
    }
  }
  return { average: samples > 0 ? roundMetric(sum / samples) : 0, samples }
}

/**
 * Count judgments whose coherence score is present and at or above the cutoff.
 * A judgment with a novelty score but no coherence score counts as
 * non-agreeing. A judgment carrying neither score is left out of the total.
 */
export function computeCoherenceAgreement(judgments: readonly Judgment[]): CoherenceAgreement {
  let agreeing = 0
  let total = 0
  for (const judgment of judgments) {
    if (judgment.coherenceScore === undefined && judgment.noveltyScore === undefined) continue
    total += 1
    if (
      judgment.coherenceScore !== undefined &&
      judgment.coherenceScore >= COHERENCE_AGREEMENT_CUTOFF
    ) {
      agreeing += 1
    }
  }
  return { agreeing, total }
}

/**
 * Number of testable predictions carried by statement metadata: distinct
 * non-empty entries of `testablePredictions` when enumerated, otherwise
 * `testablePredictionCount`, otherwise 0.
 */
export function countTestablePredictions(metadata: StatementMetadata): number {
  if (metadata.testablePredictions !== undefined) {
    const distinct = new Set(
      metadata.testablePredictions.map((p) => p.trim()).filter((p) => p.length > 0),
    )
    return distinct.size
  }
  return metadata.testablePredictionCount ?? 0
}

function freezeDecision(
  outcome: Outcome,
  averageNovelty: number,
  reasons: string[],
  contributingJudgmentIds: string[],
  metrics: DecisionMetrics,
): Decision {
  return Object.freeze({
    outcome,
    averageNovelty,
    reasons: Object.freeze(reasons),
    contributingJudgmentIds: Object.freeze(contributingJudgmentIds),
    metrics: Object.freeze({
      testablePredictions: metrics.testablePredictions,
      coherenceAgreement: Object.freeze({ ...metrics.coherenceAgreement }),
      noveltySamples: metrics.noveltySamples,
    }),
  })
}

// ---------------------------------------------------------------------------
// decide
// ---------------------------------------------------------------------------

/**
 * Apply the aggregation rule to a non-empty judgment set.
 *
 * @param judgments - judgments in collection order; order determines reason order
 * @param testablePredictions - prediction count supplied with the statement
 * @param config - thresholds; defaults to DEFAULT_CONSENSUS_CONFIG
 * @throws {InvalidInputError} if `judgments` is empty or the count is not a non-negative integer
 * @throws {InvalidConfigError} if a threshold is out of range
 */
export function decide(
  judgments: readonly Judgment[],
  testablePredictions: number,
  config: ConsensusConfig = DEFAULT_CONSENSUS_CONFIG,
): Decision {
  if (judgments.length === 0) {
    throw new InvalidInputError('Cannot decide on an empty judgment set', {})
  }
  if (!Number.isInteger(testablePredictions) || testablePredictions < 0) {
    throw new InvalidInputError(
      `Testable prediction count must be a non-negative integer, got ${String(testablePredictions)}`,
      { testablePredictions },
    )
  }
  const thresholds = validateConsensusConfig(config)

  const contributingJudgmentIds = judgments.map((j) => j.evaluatorId)
  const novelty = computeAverageNovelty(judgments)
  const coherence = computeCoherenceAgreement(judgments)
  const metrics: DecisionMetrics = {
    testablePredictions,
    coherenceAgreement: coherence,
    noveltySamples: novelty.samples,
  }

  // 1. Unanimous logical validity: hard gate
  const inconsistent = judgments.filter((j) => !j.isLogicallyConsistent)
  if (inconsistent.length > 0) {
    return freezeDecision(
      'REJECT',
      novelty.average,
      inconsistent.map((j) => `logical inconsistency found by evaluator ${j.evaluatorId}`),
      contributingJudgmentIds,
      metrics,
    )
  }

  const reasons: string[] = []

  // 2. Novelty
  if (novelty.average < thresholds.noveltyThreshold) {
    reasons.push(
      `novelty ${formatMetric(novelty.average)} below threshold ${formatMetric(thresholds.noveltyThreshold)}`,
    )
  }

  // 3. Testable predictions
  if (testablePredictions < thresholds.minTestablePredictions) {
    reasons.push(
      `insufficient testable predictions: ${String(testablePredictions)} < ${String(thresholds.minTestablePredictions)}`,
    )
  }

  // 4. Coherence quorum
  // With no scored judgments the fraction is 0, as the novelty average is.
  const agreementFraction =
    coherence.total > 0 ? roundMetric(coherence.agreeing / coherence.total) : 0
  if (agreementFraction < thresholds.coherenceQuorumFraction) {
    reasons.push(
      `coherence agreement ${String(coherence.agreeing)}/${String(coherence.total)} below quorum`,
    )
  }

  if (reasons.length > 0) {
    return freezeDecision('REVISE', novelty.average, reasons, contributingJudgmentIds, metrics)
  }

  // 5. Accept
  return freezeDecision(
    'ACCEPT',
    novelty.average,
    [
      `accepted: novelty ${formatMetric(novelty.average)} >= ${formatMetric(thresholds.noveltyThreshold)}, ` +
        `testable predictions ${String(testablePredictions)} >= ${String(thresholds.minTestablePredictions)}, ` +
        `coherence agreement ${String(coherence.agreeing)}/${String(coherence.total)}`,
    ],
    contributingJudgmentIds,
    metrics,
  )
}
