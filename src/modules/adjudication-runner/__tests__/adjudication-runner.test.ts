/**
 * Unit tests for AdjudicationRunner and summarizeCritiques.
 *
 * Evaluators are scripted per statement text; the statement source hands out
 * a fixed sequence so every round's outcome is known in advance.
 */

import { describe, it, expect } from 'vitest'
import { EmptyCritiqueError } from '../../../core/errors.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { TribunalEvents } from '../../../core/event-bus.types.js'
import { createJudgment } from '../../judgment/judgment.js'
import type { EvaluatorRole, JudgmentInput } from '../../judgment/types.js'
import { createEvaluatorPool } from '../../evaluator-pool/evaluator-pool.js'
import type { CandidateStatement, Evaluator } from '../../evaluator-pool/types.js'
import { decide } from '../../consensus-engine/consensus-engine.js'
import type { SessionSnapshot } from '../../session/types.js'
import type { StatementRequest, StatementSource } from '../../statement-source/statement-source.js'
import { AdjudicationRunner } from '../adjudication-runner.js'
import { summarizeCritiques } from '../summarize-critiques.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

type Script = Record<string, Partial<JudgmentInput>>

function statement(text: string): CandidateStatement {
  return { text, metadata: { testablePredictions: ['p1', 'p2'] } }
}

function scriptedEvaluator(id: string, role: EvaluatorRole, script: Script): Evaluator {
  return {
    id,
    role,
    evaluate: async (candidate) =>
      createJudgment({
        evaluatorId: id,
        role,
        isLogicallyConsistent: true,
        coherenceScore: 0.9,
        ...script[candidate.text],
      }),
  }
}

const LOGIC_SCRIPT: Script = {
  weak: { identifiedIssues: ['circular definition of value'] },
  broken: { isLogicallyConsistent: false },
}

const NOVELTY_SCRIPT: Script = {
  weak: { noveltyScore: 0.3 },
  strong: { noveltyScore: 0.8 },
  broken: { noveltyScore: 0.9 },
}

function pool(): ReturnType<typeof createEvaluatorPool> {
  return createEvaluatorPool([
    scriptedEvaluator('logic', 'logic-checker', LOGIC_SCRIPT),
    scriptedEvaluator('novelty', 'novelty-assessor', NOVELTY_SCRIPT),
  ])
}

/** Hands out statements in order and records every request */
function recordingSource(texts: string[]): StatementSource & { requests: StatementRequest[] } {
  const requests: StatementRequest[] = []
  return {
    requests,
    generate: async (request) => {
      const text = texts[requests.length]
      requests.push(request)
      if (text === undefined) throw new Error('script exhausted')
      return statement(text)
    },
  }
}

function memoryStore(): { saved: SessionSnapshot[]; save: (snapshot: SessionSnapshot) => void } {
  const saved: SessionSnapshot[] = []
  return { saved, save: (snapshot) => { saved.push(snapshot) } }
}

// ---------------------------------------------------------------------------
// AdjudicationRunner
// ---------------------------------------------------------------------------

describe('AdjudicationRunner', () => {
  it('accepts in the first round without revising', async () => {
    const source = recordingSource(['strong'])
    const store = memoryStore()
    const runner = new AdjudicationRunner({ source, pool: pool(), store })

    const session = await runner.run({ problem: 'What grounds value?' })

    expect(session.decision?.outcome).toBe('ACCEPT')
    expect(session.iterationCount).toBe(0)
    expect(source.requests).toEqual([{ problem: 'What grounds value?', temperature: 0.7 }])
    expect(store.saved).toHaveLength(1)
    expect(store.saved[0]?.id).toBe(session.id)
  })

  it('revises with a critique summary at the lowered temperature', async () => {
    const source = recordingSource(['weak', 'strong'])
    const store = memoryStore()
    const runner = new AdjudicationRunner({
      source,
      pool: pool(),
      store,
      temperature: 0.5,
      temperatureDecay: 0.5,
    })

    const session = await runner.run({ problem: 'What grounds value?', constraints: ['no theology'] })

    expect(session.rounds.map((r) => r.decision?.outcome)).toEqual(['REVISE', 'ACCEPT'])
    expect(session.iterationCount).toBe(1)

    const revision = source.requests[1]
    expect(revision?.temperature).toBe(0.25)
    expect(revision?.constraints).toEqual(['no theology'])
    expect(revision?.revision?.previous.text).toBe('weak')
    expect(revision?.revision?.critiqueSummary).toBe(
      [
        'Reasons:',
        '- novelty 0.3 below threshold 0.7',
        'Issues:',
        '- logic: 1 issue identified',
        '  • circular definition of value',
      ].join('\n'),
    )

    expect(store.saved).toHaveLength(2)
    expect(store.saved[1]?.rounds).toHaveLength(2)
  })

  it('stops at maxIterations without converging', async () => {
    const source = recordingSource(['weak', 'weak', 'weak', 'weak'])
    const bus = createEventBus()
    const completed: TribunalEvents['runner:completed'][] = []
    bus.on('runner:completed', (payload) => completed.push(payload))

    const runner = new AdjudicationRunner({ source, pool: pool(), maxIterations: 2, eventBus: bus })
    const session = await runner.run({ problem: 'p' })

    expect(session.rounds).toHaveLength(3)
    expect(session.decision?.outcome).toBe('REVISE')
    expect(source.requests).toHaveLength(3)
    expect(completed).toEqual([{ sessionId: session.id, outcome: 'REVISE', iterations: 2, converged: false }])
  })

  it('never revises when maxIterations is 0', async () => {
    const source = recordingSource(['weak'])
    const runner = new AdjudicationRunner({ source, pool: pool(), maxIterations: 0 })

    const session = await runner.run({ problem: 'p' })

    expect(session.rounds).toHaveLength(1)
    expect(session.decision?.outcome).toBe('REVISE')
  })

  it('stops on REJECT and reports convergence', async () => {
    const source = recordingSource(['broken'])
    const bus = createEventBus()
    const completed: TribunalEvents['runner:completed'][] = []
    bus.on('runner:completed', (payload) => completed.push(payload))

    const session = await new AdjudicationRunner({ source, pool: pool(), eventBus: bus }).run({ problem: 'p' })

    expect(session.decision?.reasons).toEqual(['logical inconsistency found by evaluator logic'])
    expect(completed[0]?.converged).toBe(true)
  })

  it('propagates EmptyCritiqueError and saves nothing', async () => {
    const failing: Evaluator = {
      id: 'down',
      role: 'critic',
      evaluate: () => Promise.reject(new Error('connection refused')),
    }
    const store = memoryStore()
    const runner = new AdjudicationRunner({
      source: recordingSource(['strong']),
      pool: createEvaluatorPool([failing]),
      store,
    })

    await expect(runner.run({ problem: 'p' })).rejects.toBeInstanceOf(EmptyCritiqueError)
    expect(store.saved).toEqual([])
  })

  it('decides a round without the evaluators that failed', async () => {
    const failing: Evaluator = {
      id: 'down',
      role: 'critic',
      evaluate: () => Promise.reject(new Error('connection refused')),
    }
    const members = [...pool().snapshot(), failing]
    const runner = new AdjudicationRunner({ source: recordingSource(['strong']), pool: createEvaluatorPool(members) })

    const session = await runner.run({ problem: 'p' })

    expect(session.decision?.outcome).toBe('ACCEPT')
    expect(session.decision?.contributingJudgmentIds).toEqual(['logic', 'novelty'])
  })
})

// ---------------------------------------------------------------------------
// summarizeCritiques
// ---------------------------------------------------------------------------

describe('summarizeCritiques', () => {
  const judgments = [
    createJudgment({
      evaluatorId: 'edge',
      role: 'edge-case-generator',
      isLogicallyConsistent: true,
      identifiedIssues: ['a', 'b', 'c', 'd'],
    }),
    createJudgment({ evaluatorId: 'quiet', role: 'critic', isLogicallyConsistent: true }),
  ]

  it('keeps at most three issues per evaluator and skips silent ones', () => {
    expect(summarizeCritiques(judgments)).toBe(
      ['Issues:', '- edge: 4 issues identified', '  • a', '  • b', '  • c'].join('\n'),
    )
  })

  it('honours a custom issue limit and leads with decision reasons', () => {
    const decision = decide(judgments, 0)
    expect(summarizeCritiques(judgments, decision, 1)).toBe(
      [
        'Reasons:',
        '- novelty 0 below threshold 0.7',
        '- insufficient testable predictions: 0 < 2',
        '- coherence agreement 0/0 below quorum',
        'Issues:',
        '- edge: 4 issues identified',
        '  • a',
      ].join('\n'),
    )
  })

  it('says so when no evaluator raised an issue', () => {
    const quiet = createJudgment({ evaluatorId: 'quiet', role: 'critic', isLogicallyConsistent: true })
    expect(summarizeCritiques([quiet])).toBe('No specific issues identified.')
  })
})
