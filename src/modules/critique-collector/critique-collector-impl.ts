/**
 * CritiqueCollectorImpl: fan-out/fan-in over an evaluator pool snapshot.
 *
 * Every call gets its own AbortController and timer. The collector waits on
 * Promise.allSettled, so one evaluator's failure or slowness never cancels or
 * short-circuits its siblings. Results are reported in pool order.
 */

import type pino from 'pino'
import { EmptyCritiqueError, EvaluatorFailureError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger } from '../../utils/logger.js'
import { generateId, toError, validateTimeoutMs } from '../../utils/helpers.js'
import { isJudgment } from '../judgment/judgment.js'
import type { Judgment } from '../judgment/types.js'
import { createEvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import type { EvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import type { CandidateStatement, Evaluator } from '../evaluator-pool/types.js'
import type { CritiqueCollector } from './critique-collector.js'
import type {
  CollectOptions,
  CritiqueCollection,
  CritiqueCollectorOptions,
  EvaluatorFailure,
} from './types.js'

const logger = createLogger('critique-collector')

export const DEFAULT_PER_CALL_TIMEOUT_MS = 120_000

// ---------------------------------------------------------------------------
// Single evaluator invocation
// ---------------------------------------------------------------------------

function failureFrom(evaluator: Evaluator, err: unknown): EvaluatorFailureError {
  if (err instanceof EvaluatorFailureError && err.evaluatorId === evaluator.id) {
    return err
  }
  const error = toError(err)
  return new EvaluatorFailureError(evaluator.id, 'error', error.message, {
    cause: error.name,
  })
}

/**
 * Run one evaluator under its own timeout. Rejects with EvaluatorFailureError
 * on error, timeout, cancellation or malformed output.
 */
function invokeEvaluator(
  evaluator: Evaluator,
  statement: CandidateStatement,
  timeoutMs: number,
  parentSignal: AbortSignal | undefined,
): Promise<Judgment> {
  return new Promise<Judgment>((resolve, reject) => {
    const controller = new AbortController()
    let settled = false

    const cleanup = (): void => {
      clearTimeout(timer)
      parentSignal?.removeEventListener('abort', onParentAbort)
    }

    const fail = (err: EvaluatorFailureError, abort: boolean): void => {
      if (settled) return
      settled = true
      cleanup()
      if (abort) controller.abort(err)
      reject(err)
    }

    const onParentAbort = (): void => {
      fail(new EvaluatorFailureError(evaluator.id, 'aborted', 'Evaluation aborted by caller'), true)
    }

    const timer = setTimeout(() => {
      fail(
        new EvaluatorFailureError(
          evaluator.id,
          'timeout',
          `Evaluation timed out after ${String(timeoutMs)}ms`,
          { timeoutMs },
        ),
        true,
      )
    }, timeoutMs)

    if (parentSignal?.aborted) {
      onParentAbort()
      return
    }
    parentSignal?.addEventListener('abort', onParentAbort, { once: true })

    let pending: Promise<Judgment>
    try {
      pending = evaluator.evaluate(statement, { signal: controller.signal })
    } catch (err) {
      fail(failureFrom(evaluator, err), false)
      return
    }

    pending.then(
      (value: unknown) => {
        if (settled) return
        if (!isJudgment(value)) {
          fail(
            new EvaluatorFailureError(evaluator.id, 'malformed', 'Evaluator returned a value that is not a Judgment'),
            false,
          )
          return
        }
        if (value.evaluatorId !== evaluator.id) {
          fail(
            new EvaluatorFailureError(
              evaluator.id,
              'malformed',
              `Evaluator returned a judgment attributed to ${value.evaluatorId}`,
              { reportedEvaluatorId: value.evaluatorId },
            ),
            false,
          )
          return
        }
        settled = true
        cleanup()
        resolve(value)
      },
      (err: unknown) => {
        fail(failureFrom(evaluator, err), false)
      },
    )
  })
}

// ---------------------------------------------------------------------------
// CritiqueCollectorImpl
// ---------------------------------------------------------------------------

export class CritiqueCollectorImpl implements CritiqueCollector {
  private readonly _perCallTimeoutMs: number
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _logger: pino.Logger

  constructor(options: CritiqueCollectorOptions = {}) {
    this._perCallTimeoutMs = validateTimeoutMs(
      options.perCallTimeoutMs ?? DEFAULT_PER_CALL_TIMEOUT_MS,
      'perCallTimeoutMs',
    )
    this._eventBus = options.eventBus
    this._logger = logger
  }

  async collect(
    statement: CandidateStatement,
    pool: EvaluatorPool | readonly Evaluator[],
    options: CollectOptions = {},
  ): Promise<CritiqueCollection> {
    const evaluators = 'snapshot' in pool ? pool.snapshot() : createEvaluatorPool(pool).snapshot()
    const timeoutMs =
      options.perCallTimeoutMs !== undefined
        ? validateTimeoutMs(options.perCallTimeoutMs, 'perCallTimeoutMs')
        : this._perCallTimeoutMs
    const collectionId = generateId('collection')
    const startedAt = Date.now()

    this._eventBus?.emit('critique:started', {
      collectionId,
      evaluatorIds: evaluators.map((e) => e.id),
    })
    this._logger.debug(
      { collectionId, evaluators: evaluators.length, timeoutMs },
      'Collecting critiques',
    )

    const durations = evaluators.map(() => 0)
    const settled = await Promise.allSettled(
      evaluators.map(async (evaluator, index) => {
        const callStartedAt = Date.now()
        try {
          return await invokeEvaluator(evaluator, statement, timeoutMs, options.signal)
        } finally {
          durations[index] = Date.now() - callStartedAt
        }
      }),
    )

    const judgments: Judgment[] = []
    const failures: EvaluatorFailure[] = []

    settled.forEach((result, index) => {
      const evaluator = evaluators[index]
      if (evaluator === undefined) return
      if (result.status === 'fulfilled') {
        judgments.push(result.value)
        return
      }
      const error = failureFrom(evaluator, result.reason)
      const durationMs = durations[index] ?? 0
      const failure: EvaluatorFailure = Object.freeze({
        evaluatorId: evaluator.id,
        role: evaluator.role,
        kind: error.kind,
        message: error.message,
        durationMs,
      })
      failures.push(failure)
      this._logger.warn(
        { collectionId, evaluatorId: evaluator.id, role: evaluator.role, kind: error.kind, durationMs, err: error },
        'Evaluator failed; continuing without its judgment',
      )
      this._eventBus?.emit('critique:evaluator-failed', { collectionId, ...failure })
    })

    const durationMs = Date.now() - startedAt
    this._eventBus?.emit('critique:completed', {
      collectionId,
      judgmentCount: judgments.length,
      failureCount: failures.length,
      durationMs,
    })

    if (judgments.length === 0) {
      throw new EmptyCritiqueError(evaluators.length, { collectionId, failures })
    }

    this._logger.debug(
      { collectionId, judgments: judgments.length, failures: failures.length, durationMs },
      'Critique collection complete',
    )

    return Object.freeze({
      judgments: Object.freeze(judgments),
      failures: Object.freeze(failures),
    })
  }
}

// ---------------------------------------------------------------------------
// Factory and convenience function
// ---------------------------------------------------------------------------

export function createCritiqueCollector(options: CritiqueCollectorOptions = {}): CritiqueCollector {
  return new CritiqueCollectorImpl(options)
}

/**
 * Collect critiques and return only the judgments, in pool order.
 *
 * @throws {EmptyCritiqueError} if no evaluator produced a judgment
 */
export async function collectCritiques(
  statement: CandidateStatement,
  pool: EvaluatorPool | readonly Evaluator[],
  options: CollectOptions & CritiqueCollectorOptions = {},
): Promise<readonly Judgment[]> {
  const collector = new CritiqueCollectorImpl(options)
  const { judgments } = await collector.collect(statement, pool, options)
  return judgments
}
