/**
 * Session: the record tying candidate statements, their judgments and their
 * decisions together across revision cycles.
 *
 * Lifecycle of a round:
 *   open → judgments appended (append-only) → adjudicate() freezes the judgment
 *   set and records the Decision → beginRevision() opens the next round.
 *
 * Only the Session mutates its rounds. Accessors return frozen views.
 */

import { SessionStateError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import { decide, countTestablePredictions } from '../consensus-engine/consensus-engine.js'
import { DEFAULT_CONSENSUS_CONFIG } from '../consensus-engine/consensus-config.js'
import type { ConsensusConfig, Decision } from '../consensus-engine/types.js'
import type { CandidateStatement } from '../evaluator-pool/types.js'
import { createJudgment, isJudgment, judgmentToJSON } from '../judgment/judgment.js'
import type { Judgment } from '../judgment/types.js'
import type { SessionOptions, SessionRound, SessionSnapshot } from './types.js'

const logger = createLogger('session')

interface MutableRound {
  iteration: number
  statement: CandidateStatement
  judgments: Judgment[]
  decision?: Decision
  decidedAt?: string
}

// ---------------------------------------------------------------------------
// Copy helpers
// ---------------------------------------------------------------------------

function freezeStatement(statement: CandidateStatement): CandidateStatement {
  const { testablePredictions, assumptions } = statement.metadata
  return Object.freeze({
    text: statement.text,
    metadata: Object.freeze({
      ...statement.metadata,
      ...(testablePredictions !== undefined
        ? { testablePredictions: Object.freeze([...testablePredictions]) }
        : {}),
      ...(assumptions !== undefined ? { assumptions: Object.freeze([...assumptions]) } : {}),
    }),
  })
}

function freezeDecisionCopy(decision: Decision): Decision {
  return Object.freeze({
    outcome: decision.outcome,
    averageNovelty: decision.averageNovelty,
    reasons: Object.freeze([...decision.reasons]),
    contributingJudgmentIds: Object.freeze([...decision.contributingJudgmentIds]),
    metrics: Object.freeze({
      testablePredictions: decision.metrics.testablePredictions,
      coherenceAgreement: Object.freeze({ ...decision.metrics.coherenceAgreement }),
      noveltySamples: decision.metrics.noveltySamples,
    }),
  })
}

function roundView(round: MutableRound): SessionRound {
  return Object.freeze({
    iteration: round.iteration,
    statement: round.statement,
    judgments: Object.freeze([...round.judgments]),
    ...(round.decision !== undefined ? { decision: round.decision } : {}),
    ...(round.decidedAt !== undefined ? { decidedAt: round.decidedAt } : {}),
  })
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class Session {
  readonly id: string
  readonly createdAt: string

  private readonly _rounds: MutableRound[]
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date

  private constructor(
    id: string,
    createdAt: string,
    rounds: MutableRound[],
    options: SessionOptions,
  ) {
    this.id = id
    this.createdAt = createdAt
    this._rounds = rounds
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  /** Open a session for a freshly generated candidate statement */
  static create(statement: CandidateStatement, options: SessionOptions = {}): Session {
    const now = options.now ?? (() => new Date())
    const session = new Session(
      options.id ?? generateId('session'),
      now().toISOString(),
      [{ iteration: 0, statement: freezeStatement(statement), judgments: [] }],
      options,
    )
    options.eventBus?.emit('session:created', { sessionId: session.id })
    logger.debug({ sessionId: session.id }, 'Session created')
    return session
  }

  /**
   * Rebuild a session from its snapshot. Judgments are re-validated.
   *
   * @throws {SessionStateError} if the rounds do not form a valid history
   * @throws {InvalidJudgmentError} if a stored judgment is invalid
   */
  static fromSnapshot(snapshot: SessionSnapshot, options: Omit<SessionOptions, 'id'> = {}): Session {
    if (snapshot.rounds.length === 0) {
      throw new SessionStateError(`Session ${snapshot.id} has no rounds`, { sessionId: snapshot.id })
    }
    const rounds = snapshot.rounds.map((round, index): MutableRound => {
      if (round.iteration !== index) {
        throw new SessionStateError(
          `Session ${snapshot.id} round ${String(index)} has iteration ${String(round.iteration)}`,
          { sessionId: snapshot.id },
        )
      }
      const isLast = index === snapshot.rounds.length - 1
      if (!isLast && round.decision === undefined) {
        throw new SessionStateError(
          `Session ${snapshot.id} round ${String(index)} was superseded without a decision`,
          { sessionId: snapshot.id },
        )
      }
      return {
        iteration: round.iteration,
        statement: freezeStatement(round.statement),
        judgments: round.judgments.map((j) => createJudgment(j)),
        ...(round.decision !== undefined ? { decision: freezeDecisionCopy(round.decision) } : {}),
        ...(round.decidedAt !== undefined ? { decidedAt: round.decidedAt } : {}),
      }
    })
    return new Session(snapshot.id, snapshot.createdAt, rounds, options)
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  private get _current(): MutableRound {
    const round = this._rounds[this._rounds.length - 1]
    if (round === undefined) {
      throw new SessionStateError(`Session ${this.id} has no rounds`, { sessionId: this.id })
    }
    return round
  }

  /** Statement of the current round */
  get statement(): CandidateStatement {
    return this._current.statement
  }

  /** Judgments of the current round, in collection order */
  get judgments(): readonly Judgment[] {
    return Object.freeze([...this._current.judgments])
  }

  /** Decision of the current round, if computed */
  get decision(): Decision | undefined {
    return this._current.decision
  }

  /** Number of revision cycles begun; 0 for the initial statement */
  get iterationCount(): number {
    return this._current.iteration
  }

  /** Every round so far, oldest first */
  get rounds(): readonly SessionRound[] {
    return Object.freeze(this._rounds.map(roundView))
  }

  get isDecided(): boolean {
    return this._current.decision !== undefined
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Append judgments to the current round.
   *
   * @throws {SessionStateError} after a decision, on a value not built by
   *   createJudgment(), or on a second judgment from the same evaluator
   */
  appendJudgments(judgments: readonly Judgment[]): void {
    const round = this._current
    if (round.decision !== undefined) {
      throw new SessionStateError(
        `Cannot append judgments to session ${this.id}: round ${String(round.iteration)} is already decided`,
        { sessionId: this.id, iteration: round.iteration },
      )
    }
    const seen = new Set(round.judgments.map((j) => j.evaluatorId))
    for (const judgment of judgments) {
      if (!isJudgment(judgment)) {
        throw new SessionStateError('Only judgments built by createJudgment() can be appended', {
          sessionId: this.id,
        })
      }
      if (seen.has(judgment.evaluatorId)) {
        throw new SessionStateError(
          `Evaluator ${judgment.evaluatorId} already judged round ${String(round.iteration)}`,
          { sessionId: this.id, evaluatorId: judgment.evaluatorId },
        )
      }
      seen.add(judgment.evaluatorId)
    }
    round.judgments.push(...judgments)
  }

  /**
   * Decide the current round. The prediction count comes from the statement
   * metadata.
   *
   * @throws {SessionStateError} if the round is already decided or has no judgments
   */
  adjudicate(config: ConsensusConfig = DEFAULT_CONSENSUS_CONFIG): Decision {
    const round = this._current
    if (round.decision !== undefined) {
      throw new SessionStateError(
        `Session ${this.id} round ${String(round.iteration)} is already decided`,
        { sessionId: this.id, iteration: round.iteration },
      )
    }
    if (round.judgments.length === 0) {
      throw new SessionStateError(
        `Session ${this.id} round ${String(round.iteration)} has no judgments to decide on`,
        { sessionId: this.id, iteration: round.iteration },
      )
    }

    const decision = decide(
      Object.freeze([...round.judgments]),
      countTestablePredictions(round.statement.metadata),
      config,
    )
    round.decision = decision
    round.decidedAt = this._now().toISOString()

    logger.info(
      { sessionId: this.id, iteration: round.iteration, outcome: decision.outcome },
      'Round decided',
    )
    this._eventBus?.emit('session:decided', {
      sessionId: this.id,
      iteration: round.iteration,
      outcome: decision.outcome,
      reasons: [...decision.reasons],
    })
    return decision
  }

  /**
   * Open the next round for a revised statement.
   *
   * @throws {SessionStateError} unless the current round was decided REVISE
   */
  beginRevision(statement: CandidateStatement): void {
    const round = this._current
    if (round.decision === undefined) {
      throw new SessionStateError(
        `Cannot revise session ${this.id}: round ${String(round.iteration)} is not decided`,
        { sessionId: this.id, iteration: round.iteration },
      )
    }
    if (round.decision.outcome !== 'REVISE') {
      throw new SessionStateError(
        `Cannot revise session ${this.id}: round ${String(round.iteration)} was decided ${round.decision.outcome}`,
        { sessionId: this.id, iteration: round.iteration, outcome: round.decision.outcome },
      )
    }
    const iteration = round.iteration + 1
    this._rounds.push({ iteration, statement: freezeStatement(statement), judgments: [] })
    this._eventBus?.emit('session:revision-started', { sessionId: this.id, iteration })
  }

  // -------------------------------------------------------------------------
  // Serialization
  // -------------------------------------------------------------------------

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      createdAt: this.createdAt,
      rounds: this._rounds.map((round) => ({
        iteration: round.iteration,
        statement: { text: round.statement.text, metadata: { ...round.statement.metadata } },
        judgments: round.judgments.map(judgmentToJSON),
        ...(round.decision !== undefined ? { decision: freezeDecisionCopy(round.decision) } : {}),
        ...(round.decidedAt !== undefined ? { decidedAt: round.decidedAt } : {}),
      })),
    }
  }
}

/**
 * Open a session for a candidate statement.
 */
export function createSession(statement: CandidateStatement, options: SessionOptions = {}): Session {
  return Session.create(statement, options)
}
