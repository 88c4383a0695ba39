/**
 * Shared types for the Session module.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { CandidateStatement } from '../evaluator-pool/types.js'
import type { Decision } from '../consensus-engine/types.js'
import type { Judgment, JudgmentInput } from '../judgment/types.js'

// ---------------------------------------------------------------------------
// Rounds
// ---------------------------------------------------------------------------

/**
 * One revision cycle: a statement, the judgments collected for it and, once
 * computed, the decision. Iteration 0 is the initial statement.
 */
export interface SessionRound {
  readonly iteration: number
  readonly statement: CandidateStatement
  readonly judgments: readonly Judgment[]
  readonly decision?: Decision
  /** ISO-8601; present exactly when `decision` is */
  readonly decidedAt?: string
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export interface SessionRoundSnapshot {
  iteration: number
  statement: CandidateStatement
  judgments: JudgmentInput[]
  decision?: Decision
  decidedAt?: string
}

/** Plain, JSON-safe copy of a session. Restored with Session.fromSnapshot(). */
export interface SessionSnapshot {
  id: string
  createdAt: string
  rounds: SessionRoundSnapshot[]
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SessionOptions {
  /** Defaults to a generated `session-<uuid>` id */
  id?: string
  /** Receives session:* events */
  eventBus?: TypedEventBus
  /** Clock used for createdAt and decidedAt */
  now?: () => Date
}
