/**
 * EvaluatorPool: ordered, id-unique set of evaluators.
 *
 * The collector never iterates a live pool: it takes a snapshot at call time,
 * so adding or removing evaluators mid-collection does not affect that call.
 */

import { InvalidConfigError } from '../../core/errors.js'
import type { Evaluator } from './types.js'

// ---------------------------------------------------------------------------
// EvaluatorPool interface
// ---------------------------------------------------------------------------

export interface EvaluatorPool {
  /** Number of evaluators currently registered */
  readonly size: number

  /**
   * Append an evaluator to the end of the pool.
   * @throws {InvalidConfigError} if an evaluator with the same id is registered
   */
  add(evaluator: Evaluator): void

  /** Remove an evaluator by id. Returns false if it was not registered. */
  remove(evaluatorId: string): boolean

  /** Look up an evaluator by id */
  get(evaluatorId: string): Evaluator | undefined

  /** Frozen copy of the pool in registration order */
  snapshot(): readonly Evaluator[]
}

// ---------------------------------------------------------------------------
// EvaluatorPoolImpl
// ---------------------------------------------------------------------------

export class EvaluatorPoolImpl implements EvaluatorPool {
  private readonly _evaluators = new Map<string, Evaluator>()

  constructor(evaluators: Iterable<Evaluator> = []) {
    for (const evaluator of evaluators) {
      this.add(evaluator)
    }
  }

  get size(): number {
    return this._evaluators.size
  }

  add(evaluator: Evaluator): void {
    if (this._evaluators.has(evaluator.id)) {
      throw new InvalidConfigError(`Duplicate evaluator id in pool: ${evaluator.id}`, {
        evaluatorId: evaluator.id,
      })
    }
    this._evaluators.set(evaluator.id, evaluator)
  }

  remove(evaluatorId: string): boolean {
    return this._evaluators.delete(evaluatorId)
  }

  get(evaluatorId: string): Evaluator | undefined {
    return this._evaluators.get(evaluatorId)
  }

  snapshot(): readonly Evaluator[] {
    // Map iteration order is insertion order
    return Object.freeze([...this._evaluators.values()])
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new EvaluatorPool, optionally seeded with evaluators in order.
 */
export function createEvaluatorPool(evaluators: Iterable<Evaluator> = []): EvaluatorPool {
  return new EvaluatorPoolImpl(evaluators)
}
