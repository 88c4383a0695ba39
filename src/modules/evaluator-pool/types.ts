/**
 * Shared types for the Evaluator Pool module.
 */

import type { EvaluatorRole, Judgment } from '../judgment/types.js'

// ---------------------------------------------------------------------------
// Candidate statement
// ---------------------------------------------------------------------------

/**
 * Metadata supplied alongside a candidate statement by its source.
 * The consensus engine reads only the prediction fields; everything else is
 * passed through untouched.
 */
export interface StatementMetadata {
  /** The problem the statement answers */
  problem?: string
  /** Testable predictions made by the statement */
  testablePredictions?: readonly string[]
  /** Prediction count, used when the source does not enumerate predictions */
  testablePredictionCount?: number
  /** Assumptions the statement rests on */
  assumptions?: readonly string[]
  [key: string]: unknown
}

/** A candidate statement under adjudication; opaque to the core */
export interface CandidateStatement {
  readonly text: string
  readonly metadata: StatementMetadata
}

// ---------------------------------------------------------------------------
// Evaluator capability
// ---------------------------------------------------------------------------

/**
 * Per-call context handed to an evaluator.
 */
export interface EvaluationContext {
  /** Aborted when this call times out or the collection is cancelled */
  signal: AbortSignal
}

/**
 * An independent judgment source. The only capability the collector relies on
 * is evaluate(); evaluator internals are opaque.
 */
export interface Evaluator {
  /** Unique within a pool */
  readonly id: string
  readonly role: EvaluatorRole
  /**
   * Produce exactly one Judgment for the statement. May reject or never settle;
   * the collector treats both as a failure of this evaluator only.
   */
  evaluate(statement: CandidateStatement, context: EvaluationContext): Promise<Judgment>
}
