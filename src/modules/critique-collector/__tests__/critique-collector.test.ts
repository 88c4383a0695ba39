/**
 * Unit tests for the Critique Collector.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  collectCritiques,
  createCritiqueCollector,
} from '../critique-collector-impl.js'
import { createEvaluatorPool } from '../../evaluator-pool/evaluator-pool.js'
import type {
  CandidateStatement,
  EvaluationContext,
  Evaluator,
} from '../../evaluator-pool/types.js'
import { createJudgment } from '../../judgment/judgment.js'
import type { Judgment } from '../../judgment/types.js'
import { createEventBus } from '../../../core/event-bus.js'
import {
  EmptyCritiqueError,
  EvaluatorFailureError,
  InvalidConfigError,
} from '../../../core/errors.js'
import { sleep } from '../../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const statement: CandidateStatement = {
  text: 'Tidal heating keeps subsurface oceans liquid on small icy moons.',
  metadata: { testablePredictions: ['plume activity correlates with orbital phase'] },
}

function judgmentFor(id: string): Judgment {
  return createJudgment({
    evaluatorId: id,
    role: 'critic',
    isLogicallyConsistent: true,
    noveltyScore: 0.8,
    coherenceScore: 0.9,
  })
}

function evaluator(
  id: string,
  evaluate: (context: EvaluationContext) => Promise<Judgment>,
): Evaluator {
  return { id, role: 'critic', evaluate: (_statement, context) => evaluate(context) }
}

function succeeding(id: string, delayMs = 0): Evaluator {
  return evaluator(id, async () => {
    await sleep(delayMs)
    return judgmentFor(id)
  })
}

function hanging(id: string, onSignal?: (signal: AbortSignal) => void): Evaluator {
  return evaluator(id, (context) => {
    onSignal?.(context.signal)
    return new Promise<Judgment>(() => undefined)
  })
}

function failing(id: string, message = 'boom'): Evaluator {
  return evaluator(id, () => Promise.reject(new Error(message)))
}

// ---------------------------------------------------------------------------
// Resilience
// ---------------------------------------------------------------------------

describe('CritiqueCollector: partial failure', () => {
  it('returns the three judgments when one of four evaluators times out', async () => {
    let timedOutSignal: AbortSignal | undefined
    const pool = createEvaluatorPool([
      succeeding('logic'),
      hanging('contradiction', (signal) => {
        timedOutSignal = signal
      }),
      succeeding('novelty'),
      succeeding('edge-case'),
    ])

    const collection = await createCritiqueCollector().collect(statement, pool, {
      perCallTimeoutMs: 30,
    })

    expect(collection.judgments.map((j) => j.evaluatorId)).toEqual(['logic', 'novelty', 'edge-case'])
    expect(collection.failures).toHaveLength(1)
    expect(collection.failures[0]).toMatchObject({
      evaluatorId: 'contradiction',
      role: 'critic',
      kind: 'timeout',
      message: 'Evaluation timed out after 30ms',
    })
    expect(timedOutSignal?.aborted).toBe(true)
  })

  it('does not abort sibling calls when one evaluator fails', async () => {
    const signals: AbortSignal[] = []
    const pool = [
      failing('a'),
      evaluator('b', async (context) => {
        signals.push(context.signal)
        await sleep(20)
        return judgmentFor('b')
      }),
    ]

    const judgments = await collectCritiques(statement, pool)

    expect(judgments.map((j) => j.evaluatorId)).toEqual(['b'])
    expect(signals[0]?.aborted).toBe(false)
  })

  it('records a synchronous throw from evaluate() as an error failure', async () => {
    const throwing: Evaluator = {
      id: 'sync',
      role: 'logic-checker',
      evaluate: () => {
        throw new Error('not ready')
      },
    }

    const collection = await createCritiqueCollector().collect(statement, [
      throwing,
      succeeding('ok'),
    ])

    expect(collection.failures).toEqual([
      { evaluatorId: 'sync', role: 'logic-checker', kind: 'error', message: 'not ready', durationMs: expect.any(Number) },
    ])
  })

  it('keeps the failure kind reported by an evaluator', async () => {
    const collection = await createCritiqueCollector().collect(statement, [
      evaluator('yaml', () =>
        Promise.reject(new EvaluatorFailureError('yaml', 'malformed', 'No verdict block found')),
      ),
      succeeding('ok'),
    ])

    expect(collection.failures[0]).toMatchObject({ kind: 'malformed', message: 'No verdict block found' })
  })
})

// ---------------------------------------------------------------------------
// Malformed output
// ---------------------------------------------------------------------------

describe('CritiqueCollector: malformed output', () => {
  it('rejects a judgment-shaped value that was not constructed through createJudgment', async () => {
    const forged: Judgment = {
      evaluatorId: 'forger',
      role: 'critic',
      isLogicallyConsistent: true,
      noveltyScore: 5,
      identifiedIssues: [],
      reasoning: '',
    }

    const collection = await createCritiqueCollector().collect(statement, [
      evaluator('forger', () => Promise.resolve(forged)),
      succeeding('ok'),
    ])

    expect(collection.judgments.map((j) => j.evaluatorId)).toEqual(['ok'])
    expect(collection.failures[0]).toMatchObject({
      evaluatorId: 'forger',
      kind: 'malformed',
      message: 'Evaluator returned a value that is not a Judgment',
    })
  })

  it('rejects a judgment attributed to another evaluator', async () => {
    const collection = await createCritiqueCollector().collect(statement, [
      evaluator('impostor', () => Promise.resolve(judgmentFor('someone-else'))),
      succeeding('ok'),
    ])

    expect(collection.failures[0]).toMatchObject({
      evaluatorId: 'impostor',
      kind: 'malformed',
      message: 'Evaluator returned a judgment attributed to someone-else',
    })
  })
})

// ---------------------------------------------------------------------------
// Total failure
// ---------------------------------------------------------------------------

describe('CritiqueCollector: total failure', () => {
  it('raises EmptyCritiqueError carrying every failure', async () => {
    const pool = [failing('a', 'first'), failing('b', 'second')]

    const promise = createCritiqueCollector().collect(statement, pool)

    await expect(promise).rejects.toBeInstanceOf(EmptyCritiqueError)
    await expect(promise).rejects.toMatchObject({
      code: 'EMPTY_CRITIQUE',
      message: 'No judgments obtained: all 2 evaluator(s) failed',
      context: {
        poolSize: 2,
        failures: [
          { evaluatorId: 'a', kind: 'error', message: 'first' },
          { evaluatorId: 'b', kind: 'error', message: 'second' },
        ],
      },
    })
  })

  it('raises EmptyCritiqueError for an empty pool', async () => {
    await expect(collectCritiques(statement, [])).rejects.toThrow(
      'No judgments obtained: all 0 evaluator(s) failed',
    )
  })

  it('aborts every call when the caller signal fires', async () => {
    const controller = new AbortController()
    const signals: AbortSignal[] = []
    const pool = [
      hanging('a', (s) => signals.push(s)),
      hanging('b', (s) => signals.push(s)),
    ]

    const promise = createCritiqueCollector().collect(statement, pool, {
      signal: controller.signal,
      perCallTimeoutMs: 5_000,
    })
    controller.abort()

    await expect(promise).rejects.toMatchObject({
      context: {
        failures: [
          { evaluatorId: 'a', kind: 'aborted' },
          { evaluatorId: 'b', kind: 'aborted' },
        ],
      },
    })
    expect(signals.map((s) => s.aborted)).toEqual([true, true])
  })
})

// ---------------------------------------------------------------------------
// Ordering, concurrency and snapshotting
// ---------------------------------------------------------------------------

describe('CritiqueCollector: ordering and concurrency', () => {
  it('reports judgments in pool order regardless of completion order', async () => {
    const pool = [succeeding('slow', 40), succeeding('medium', 20), succeeding('fast', 0)]

    const judgments = await collectCritiques(statement, pool)

    expect(judgments.map((j) => j.evaluatorId)).toEqual(['slow', 'medium', 'fast'])
  })

  it('starts every evaluator before any of them finishes', async () => {
    let started = 0
    let startedWhenFirstFinished = -1
    const make = (id: string): Evaluator =>
      evaluator(id, async () => {
        started += 1
        await sleep(10)
        if (startedWhenFirstFinished < 0) startedWhenFirstFinished = started
        return judgmentFor(id)
      })

    await collectCritiques(statement, [make('a'), make('b'), make('c'), make('d')])

    expect(startedWhenFirstFinished).toBe(4)
  })

  it('uses the pool snapshot taken at call time', async () => {
    const pool = createEvaluatorPool([succeeding('a', 10), succeeding('b', 10)])

    const promise = createCritiqueCollector().collect(statement, pool)
    pool.remove('b')
    pool.add(succeeding('late'))
    const collection = await promise

    expect(collection.judgments.map((j) => j.evaluatorId)).toEqual(['a', 'b'])
  })

  it('refuses a per-call timeout longer than a timer can wait', async () => {
    expect(() => createCritiqueCollector({ perCallTimeoutMs: 2 ** 31 })).toThrow(InvalidConfigError)

    const collector = createCritiqueCollector()
    await expect(
      collector.collect(statement, [succeeding('a', 20)], { perCallTimeoutMs: 2 ** 31 }),
    ).rejects.toThrow('perCallTimeoutMs must be an integer between 1 and 2147483647, got 2147483648')
  })

  it('waits for slower evaluators under the largest allowed timeout', async () => {
    const collector = createCritiqueCollector({ perCallTimeoutMs: 2_147_483_647 })

    const collection = await collector.collect(statement, [succeeding('a', 20), succeeding('b', 20)])

    expect(collection.judgments.map((j) => j.evaluatorId)).toEqual(['a', 'b'])
    expect(collection.failures).toEqual([])
  })

  it('rejects an evaluator array with duplicate ids', async () => {
    await expect(collectCritiques(statement, [succeeding('x'), succeeding('x')])).rejects.toThrow(
      InvalidConfigError,
    )
  })
})

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

describe('CritiqueCollector: events', () => {
  it('emits started, evaluator-failed and completed events', async () => {
    const eventBus = createEventBus()
    const started = vi.fn()
    const failed = vi.fn()
    const completed = vi.fn()
    eventBus.on('critique:started', started)
    eventBus.on('critique:evaluator-failed', failed)
    eventBus.on('critique:completed', completed)

    await createCritiqueCollector({ eventBus }).collect(statement, [failing('bad'), succeeding('good')])

    expect(started).toHaveBeenCalledWith(
      expect.objectContaining({ evaluatorIds: ['bad', 'good'] }),
    )
    expect(failed).toHaveBeenCalledTimes(1)
    expect(failed).toHaveBeenCalledWith(
      expect.objectContaining({ evaluatorId: 'bad', kind: 'error', message: 'boom' }),
    )
    expect(completed).toHaveBeenCalledWith(
      expect.objectContaining({ judgmentCount: 1, failureCount: 1 }),
    )
  })
})
