/**
 * Shared types for the Adjudication Runner module.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { ConsensusConfig } from '../consensus-engine/types.js'
import type { CritiqueCollector } from '../critique-collector/critique-collector.js'
import type { EvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import type { SessionSnapshot } from '../session/types.js'
import type { StatementSource } from '../statement-source/statement-source.js'

// ---------------------------------------------------------------------------
// Session store
// ---------------------------------------------------------------------------

/**
 * Where the runner records each decided round. Saving the same session id
 * again replaces the earlier copy.
 */
export interface SessionStore {
  save(snapshot: SessionSnapshot): void | Promise<void>
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export interface RunRequest {
  problem: string
  constraints?: readonly string[]
  existingSolutions?: readonly string[]
  /** Cancels generation and every in-flight evaluation */
  signal?: AbortSignal
}

export interface AdjudicationRunnerOptions {
  source: StatementSource
  pool: EvaluatorPool
  /** Defaults to a collector with the default per-call timeout */
  collector?: CritiqueCollector
  consensusConfig?: ConsensusConfig
  /** Revision cycles allowed after the initial statement (default 10) */
  maxIterations?: number
  /** Generation temperature for the initial statement (default 0.7) */
  temperature?: number
  /** Multiplier applied to `temperature` for revised statements (default 0.9) */
  temperatureDecay?: number
  store?: SessionStore
  eventBus?: TypedEventBus
  now?: () => Date
}
