/**
 * Shared types for the Critique Collector module.
 */

import type { EvaluatorFailureKind } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { EvaluatorRole, Judgment } from '../judgment/types.js'

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** One evaluator that contributed no judgment to a collection */
export interface EvaluatorFailure {
  readonly evaluatorId: string
  readonly role: EvaluatorRole
  readonly kind: EvaluatorFailureKind
  readonly message: string
  /** Wall time from invocation until the failure was observed */
  readonly durationMs: number
}

/**
 * Outcome of one collection call. `judgments` is never empty: a collection
 * with no judgments raises EmptyCritiqueError instead.
 */
export interface CritiqueCollection {
  /** Judgments in pool order */
  readonly judgments: readonly Judgment[]
  /** Failed evaluators in pool order */
  readonly failures: readonly EvaluatorFailure[]
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CollectOptions {
  /** Upper bound on each individual evaluator call */
  perCallTimeoutMs?: number
  /** Aborts every outstanding evaluator call */
  signal?: AbortSignal
}

export interface CritiqueCollectorOptions {
  /** Default per-call timeout when collect() is not given one */
  perCallTimeoutMs?: number
  /** Receives critique:* events */
  eventBus?: TypedEventBus
}
