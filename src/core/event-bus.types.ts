/**
 * TribunalEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "critique:completed", "session:decided")
 */

import type { EvaluatorFailureKind } from './errors.js'
import type { EvaluatorRole } from '../modules/judgment/types.js'
import type { Outcome } from '../modules/consensus-engine/types.js'

// ---------------------------------------------------------------------------
// TribunalEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the event bus.
 * Use `keyof TribunalEvents` to constrain event keys.
 */
export interface TribunalEvents {
  // -------------------------------------------------------------------------
  // Critique collection
  // -------------------------------------------------------------------------

  /** A collection call fanned out to every evaluator in the snapshot */
  'critique:started': { collectionId: string; evaluatorIds: string[] }

  /** One evaluator failed; the collection continues without its judgment */
  'critique:evaluator-failed': {
    collectionId: string
    evaluatorId: string
    role: EvaluatorRole
    kind: EvaluatorFailureKind
    message: string
    durationMs: number
  }

  /** All evaluators settled */
  'critique:completed': {
    collectionId: string
    judgmentCount: number
    failureCount: number
    durationMs: number
  }

  // -------------------------------------------------------------------------
  // Session lifecycle
  // -------------------------------------------------------------------------

  /** A session was opened for a new candidate statement */
  'session:created': { sessionId: string }

  /** A decision was computed for the session's current round */
  'session:decided': {
    sessionId: string
    iteration: number
    outcome: Outcome
    reasons: string[]
  }

  /** The orchestrator opened a new revision round */
  'session:revision-started': { sessionId: string; iteration: number }

  // -------------------------------------------------------------------------
  // Runner
  // -------------------------------------------------------------------------

  /** The adjudication runner finished a session */
  'runner:completed': {
    sessionId: string
    outcome: Outcome
    iterations: number
    converged: boolean
  }
}
