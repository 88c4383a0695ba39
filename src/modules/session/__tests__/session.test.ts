/**
 * Unit tests for Session.
 */

import { describe, it, expect, vi } from 'vitest'
import { Session, createSession } from '../session.js'
import type { SessionSnapshot } from '../types.js'
import { createJudgment } from '../../judgment/judgment.js'
import type { Judgment, JudgmentInput } from '../../judgment/types.js'
import type { CandidateStatement } from '../../evaluator-pool/types.js'
import { createEventBus } from '../../../core/event-bus.js'
import { SessionStateError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const fixedClock = (): Date => new Date('2026-03-01T12:00:00.000Z')

const statement: CandidateStatement = {
  text: 'Migrating birds use quantum coherence in cryptochromes to sense field inclination.',
  metadata: {
    problem: 'How do birds sense magnetic fields?',
    testablePredictions: [
      'oscillating RF fields disrupt orientation',
      'cryptochrome knockouts lose inclination sensing',
      'orientation degrades under dim red light',
    ],
  },
}

const revised: CandidateStatement = {
  text: 'A radical-pair mechanism in retinal cryptochrome 4 supports inclination sensing.',
  metadata: { testablePredictions: ['Cry4 knockouts lose inclination sensing', 'RF at 1.4 MHz disorients'] },
}

function judgment(id: string, novelty: number, overrides: Partial<JudgmentInput> = {}): Judgment {
  return createJudgment({
    evaluatorId: id,
    role: 'critic',
    isLogicallyConsistent: true,
    noveltyScore: novelty,
    coherenceScore: 0.9,
    identifiedIssues: [`issue raised by ${id}`],
    reasoning: `${id} reasoning`,
    ...overrides,
  })
}

const strongPanel = (): Judgment[] => [
  judgment('logic', 0.8),
  judgment('contradiction', 0.75),
  judgment('novelty', 0.9),
  judgment('edge-case', 0.7),
]

const weakPanel = (): Judgment[] => [
  judgment('logic', 0.3),
  judgment('contradiction', 0.2),
  judgment('novelty', 0.4),
  judgment('edge-case', 0.1),
]

// ---------------------------------------------------------------------------
// Creation and accessors
// ---------------------------------------------------------------------------

describe('Session: creation', () => {
  it('starts at iteration 0 with no judgments and no decision', () => {
    const session = createSession(statement, { now: fixedClock })

    expect(session.id).toMatch(/^session-/)
    expect(session.createdAt).toBe('2026-03-01T12:00:00.000Z')
    expect(session.iterationCount).toBe(0)
    expect(session.judgments).toEqual([])
    expect(session.decision).toBeUndefined()
    expect(session.statement.text).toBe(statement.text)
  })

  it('uses a supplied id and emits session:created', () => {
    const eventBus = createEventBus()
    const created = vi.fn()
    eventBus.on('session:created', created)

    const session = createSession(statement, { id: 'session-fixed', eventBus })

    expect(session.id).toBe('session-fixed')
    expect(created).toHaveBeenCalledWith({ sessionId: 'session-fixed' })
  })

  it('does not share the caller statement object', () => {
    const metadata = { testablePredictions: ['a', 'b'] }
    const session = createSession({ text: 'x', metadata })
    metadata.testablePredictions = []

    expect(session.statement.metadata.testablePredictions).toEqual(['a', 'b'])
    expect(Object.isFrozen(session.statement)).toBe(true)
  })

  it('copies prediction and assumption lists so in-place edits do not reach the session', () => {
    const predictions = ['p1', 'p2', 'p3']
    const assumptions = ['fields are static']
    const session = createSession({ text: 'x', metadata: { testablePredictions: predictions, assumptions } })

    predictions.length = 0
    assumptions.push('added later')
    session.appendJudgments(strongPanel())
    const decision = session.adjudicate()

    expect(session.statement.metadata.testablePredictions).toEqual(['p1', 'p2', 'p3'])
    expect(session.statement.metadata.assumptions).toEqual(['fields are static'])
    expect(Object.isFrozen(session.statement.metadata.testablePredictions)).toBe(true)
    expect(decision.outcome).toBe('ACCEPT')
    expect(decision.metrics.testablePredictions).toBe(3)
  })

  it('copies prediction lists when restoring from a snapshot', () => {
    const predictions = ['only one']
    const restored = Session.fromSnapshot({
      id: 'session-restore',
      createdAt: '2026-03-01T12:00:00.000Z',
      rounds: [{ iteration: 0, judgments: [], statement: { text: 'y', metadata: { testablePredictions: predictions } } }],
    })

    predictions.push('another')

    expect(restored.statement.metadata.testablePredictions).toEqual(['only one'])
  })
})

// ---------------------------------------------------------------------------
// Judgments and decisions
// ---------------------------------------------------------------------------

describe('Session: adjudication', () => {
  it('decides the current round using the statement prediction count', () => {
    const session = createSession(statement, { now: fixedClock })
    session.appendJudgments(strongPanel())

    const decision = session.adjudicate()

    expect(decision.outcome).toBe('ACCEPT')
    expect(decision.metrics.testablePredictions).toBe(3)
    expect(session.decision).toBe(decision)
    expect(session.isDecided).toBe(true)
    expect(session.rounds[0]?.decidedAt).toBe('2026-03-01T12:00:00.000Z')
  })

  it('emits session:decided with the outcome and reasons', () => {
    const eventBus = createEventBus()
    const decided = vi.fn()
    eventBus.on('session:decided', decided)
    const session = createSession(statement, { id: 's1', eventBus })
    session.appendJudgments(weakPanel())

    session.adjudicate()

    expect(decided).toHaveBeenCalledWith({
      sessionId: 's1',
      iteration: 0,
      outcome: 'REVISE',
      reasons: ['novelty 0.25 below threshold 0.7'],
    })
  })

  it('appends judgments across several calls in order', () => {
    const session = createSession(statement)
    const panel = strongPanel()
    session.appendJudgments(panel.slice(0, 2))
    session.appendJudgments(panel.slice(2, 3))

    expect(session.judgments.map((j) => j.evaluatorId)).toEqual(['logic', 'contradiction', 'novelty'])
    expect(Object.isFrozen(session.judgments)).toBe(true)
  })

  it('refuses to append after the round is decided', () => {
    const session = createSession(statement)
    session.appendJudgments(strongPanel())
    session.adjudicate()

    expect(() => { session.appendJudgments([judgment('late', 0.9)]) }).toThrow(SessionStateError)
  })

  it('refuses to decide twice or with no judgments', () => {
    const empty = createSession(statement)
    expect(() => empty.adjudicate()).toThrow('has no judgments to decide on')

    const session = createSession(statement)
    session.appendJudgments(strongPanel())
    session.adjudicate()
    expect(() => session.adjudicate()).toThrow('is already decided')
  })

  it('refuses a second judgment from the same evaluator', () => {
    const session = createSession(statement)
    session.appendJudgments([judgment('logic', 0.8)])

    expect(() => { session.appendJudgments([judgment('logic', 0.2)]) }).toThrow(
      'Evaluator logic already judged round 0',
    )
  })

  it('refuses judgment-shaped values not built by createJudgment', () => {
    const session = createSession(statement)
    const forged: Judgment = {
      evaluatorId: 'forged',
      role: 'critic',
      isLogicallyConsistent: true,
      identifiedIssues: [],
      reasoning: '',
    }

    expect(() => { session.appendJudgments([forged]) }).toThrow(SessionStateError)
    expect(session.judgments).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Revision cycles
// ---------------------------------------------------------------------------

describe('Session: revisions', () => {
  it('opens a new round after a REVISE decision and keeps history', () => {
    const eventBus = createEventBus()
    const revisionStarted = vi.fn()
    eventBus.on('session:revision-started', revisionStarted)
    const session = createSession(statement, { id: 's2', eventBus })
    session.appendJudgments(weakPanel())
    session.adjudicate()

    session.beginRevision(revised)

    expect(session.iterationCount).toBe(1)
    expect(session.statement.text).toBe(revised.text)
    expect(session.judgments).toEqual([])
    expect(session.decision).toBeUndefined()
    expect(session.rounds).toHaveLength(2)
    expect(session.rounds[0]?.decision?.outcome).toBe('REVISE')
    expect(session.rounds[0]?.judgments).toHaveLength(4)
    expect(revisionStarted).toHaveBeenCalledWith({ sessionId: 's2', iteration: 1 })
  })

  it('refuses to revise an undecided round', () => {
    const session = createSession(statement)

    expect(() => { session.beginRevision(revised) }).toThrow('round 0 is not decided')
  })

  it('refuses to revise an accepted round', () => {
    const session = createSession(statement)
    session.appendJudgments(strongPanel())
    session.adjudicate()

    expect(() => { session.beginRevision(revised) }).toThrow('round 0 was decided ACCEPT')
  })

  it('decides the revised round independently', () => {
    const session = createSession(statement)
    session.appendJudgments(weakPanel())
    session.adjudicate()
    session.beginRevision(revised)
    session.appendJudgments(strongPanel())

    const decision = session.adjudicate()

    expect(decision.outcome).toBe('ACCEPT')
    expect(decision.metrics.testablePredictions).toBe(2)
    expect(session.rounds.map((r) => r.decision?.outcome)).toEqual(['REVISE', 'ACCEPT'])
  })
})

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

describe('Session: snapshots', () => {
  it('round-trips through JSON without loss', () => {
    const session = createSession(statement, { id: 's3', now: fixedClock })
    session.appendJudgments([...weakPanel(), judgment('bare', 0.5, { noveltyScore: undefined, coherenceScore: undefined })])
    session.adjudicate()
    session.beginRevision(revised)
    session.appendJudgments([judgment('logic', 0.9)])

    const json: SessionSnapshot = JSON.parse(JSON.stringify(session.toSnapshot()))
    const restored = Session.fromSnapshot(json)

    expect(restored.toSnapshot()).toEqual(session.toSnapshot())
    expect(restored.iterationCount).toBe(1)
    expect(restored.isDecided).toBe(false)
    expect(restored.rounds[0]?.judgments[4]?.noveltyScore).toBeUndefined()
  })

  it('allows a restored undecided round to be decided', () => {
    const session = createSession(statement, { id: 's4' })
    session.appendJudgments(strongPanel())

    const restored = Session.fromSnapshot(session.toSnapshot())

    expect(restored.adjudicate().outcome).toBe('ACCEPT')
  })

  it('rejects snapshots whose rounds are out of sequence', () => {
    const snapshot: SessionSnapshot = {
      id: 'broken',
      createdAt: '2026-03-01T12:00:00.000Z',
      rounds: [{ iteration: 1, statement, judgments: [] }],
    }

    expect(() => Session.fromSnapshot(snapshot)).toThrow('round 0 has iteration 1')
  })

  it('rejects snapshots with an undecided round before the last', () => {
    const snapshot: SessionSnapshot = {
      id: 'broken',
      createdAt: '2026-03-01T12:00:00.000Z',
      rounds: [
        { iteration: 0, statement, judgments: [] },
        { iteration: 1, statement: revised, judgments: [] },
      ],
    }

    expect(() => Session.fromSnapshot(snapshot)).toThrow('superseded without a decision')
  })
})
