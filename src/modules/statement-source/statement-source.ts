/**
 * StatementSource interface: produces candidate statements for the runner.
 *
 * Sources are opaque to the adjudication core: the runner only hands them a
 * problem (and, on revision, the critique of the previous round) and gets a
 * CandidateStatement back.
 */

import type { CandidateStatement } from '../evaluator-pool/types.js'

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/**
 * Feedback carried into a revision round.
 */
export interface RevisionContext {
  previous: CandidateStatement
  /** Condensed critique of the previous round (see summarizeCritiques) */
  critiqueSummary: string
}

export interface StatementRequest {
  problem: string
  /** Additional constraints the statement must respect */
  constraints?: readonly string[]
  /** Known positions the statement must differ from */
  existingSolutions?: readonly string[]
  temperature: number
  /** Present when the runner asks for a revised statement */
  revision?: RevisionContext
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// StatementSource interface
// ---------------------------------------------------------------------------

export interface StatementSource {
  /**
   * Produce the next candidate statement for a problem.
   * @throws {GenerationError} if no usable statement could be produced
   */
  generate(request: StatementRequest): Promise<CandidateStatement>
}
