/**
 * AdjudicationRunner: drives one problem through generation, critique and
 * consensus, revising the statement while the decision is REVISE.
 *
 * Loop:
 *   generate → collect → adjudicate
 *   while REVISE and iterationCount < maxIterations:
 *     summarize critiques → generate revision → beginRevision → collect → adjudicate
 *
 * EmptyCritiqueError from any round propagates to the caller.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_CONSENSUS_CONFIG } from '../consensus-engine/consensus-config.js'
import type { ConsensusConfig } from '../consensus-engine/types.js'
import { createCritiqueCollector } from '../critique-collector/critique-collector-impl.js'
import type { CritiqueCollector } from '../critique-collector/critique-collector.js'
import type { EvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import { createSession } from '../session/session.js'
import type { Session } from '../session/session.js'
import type { StatementRequest, StatementSource } from '../statement-source/statement-source.js'
import { summarizeCritiques } from './summarize-critiques.js'
import type { AdjudicationRunnerOptions, RunRequest, SessionStore } from './types.js'

const logger = createLogger('runner')

export const DEFAULT_MAX_ITERATIONS = 10
export const DEFAULT_GENERATION_TEMPERATURE = 0.7
export const DEFAULT_TEMPERATURE_DECAY = 0.9

export class AdjudicationRunner {
  private readonly _source: StatementSource
  private readonly _pool: EvaluatorPool
  private readonly _collector: CritiqueCollector
  private readonly _consensusConfig: ConsensusConfig
  private readonly _maxIterations: number
  private readonly _temperature: number
  private readonly _temperatureDecay: number
  private readonly _store: SessionStore | undefined
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: (() => Date) | undefined

  constructor(options: AdjudicationRunnerOptions) {
    this._source = options.source
    this._pool = options.pool
    this._collector = options.collector ?? createCritiqueCollector(
      options.eventBus !== undefined ? { eventBus: options.eventBus } : {},
    )
    this._consensusConfig = options.consensusConfig ?? DEFAULT_CONSENSUS_CONFIG
    this._maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
    this._temperature = options.temperature ?? DEFAULT_GENERATION_TEMPERATURE
    this._temperatureDecay = options.temperatureDecay ?? DEFAULT_TEMPERATURE_DECAY
    this._store = options.store
    this._eventBus = options.eventBus
    this._now = options.now
  }

  /**
   * Run a problem to a final decision.
   *
   * @returns the session, whose last round carries the final decision
   * @throws {EmptyCritiqueError} if every evaluator fails in some round
   * @throws {GenerationError} if the statement source cannot produce a statement
   */
  async run(request: RunRequest): Promise<Session> {
    const startedAt = Date.now()
    const base: Omit<StatementRequest, 'temperature'> = {
      problem: request.problem,
      ...(request.constraints !== undefined ? { constraints: request.constraints } : {}),
      ...(request.existingSolutions !== undefined ? { existingSolutions: request.existingSolutions } : {}),
      ...(request.signal !== undefined ? { signal: request.signal } : {}),
    }

    const initial = await this._source.generate({ ...base, temperature: this._temperature })
    const session = createSession(initial, {
      ...(this._eventBus !== undefined ? { eventBus: this._eventBus } : {}),
      ...(this._now !== undefined ? { now: this._now } : {}),
    })
    logger.info({ sessionId: session.id, maxIterations: this._maxIterations }, 'Adjudication started')

    await this._runRound(session, request.signal)

    // Revisions reuse one lowered temperature rather than compounding it
    const revisionTemperature = this._temperature * this._temperatureDecay
    let decision = session.decision
    while (decision?.outcome === 'REVISE' && session.iterationCount < this._maxIterations) {
      const revised = await this._source.generate({
        ...base,
        temperature: revisionTemperature,
        revision: {
          previous: session.statement,
          critiqueSummary: summarizeCritiques(session.judgments, decision),
        },
      })
      session.beginRevision(revised)
      logger.info({ sessionId: session.id, iteration: session.iterationCount }, 'Revision started')
      await this._runRound(session, request.signal)
      decision = session.decision
    }

    const outcome = decision?.outcome ?? 'REVISE'
    const converged = outcome !== 'REVISE'
    logger.info(
      {
        sessionId: session.id,
        outcome,
        iterations: session.iterationCount,
        converged,
        durationMs: Date.now() - startedAt,
      },
      'Adjudication complete',
    )
    this._eventBus?.emit('runner:completed', {
      sessionId: session.id,
      outcome,
      iterations: session.iterationCount,
      converged,
    })
    return session
  }

  private async _runRound(session: Session, signal: AbortSignal | undefined): Promise<void> {
    const { judgments, failures } = await this._collector.collect(
      session.statement,
      this._pool,
      signal !== undefined ? { signal } : {},
    )
    if (failures.length > 0) {
      logger.warn(
        { sessionId: session.id, iteration: session.iterationCount, failed: failures.map((f) => f.evaluatorId) },
        'Round decided without every evaluator',
      )
    }
    session.appendJudgments(judgments)
    session.adjudicate(this._consensusConfig)
    if (this._store !== undefined) {
      await this._store.save(session.toSnapshot())
    }
  }
}

export function createAdjudicationRunner(options: AdjudicationRunnerOptions): AdjudicationRunner {
  return new AdjudicationRunner(options)
}
