/**
 * CritiqueCollector interface: concurrent fan-out of one candidate statement
 * to every evaluator in a pool, with per-evaluator failure isolation.
 */

import type { CandidateStatement, Evaluator } from '../evaluator-pool/types.js'
import type { EvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import type { CollectOptions, CritiqueCollection } from './types.js'

export interface CritiqueCollector {
  /**
   * Invoke every evaluator of the pool snapshot concurrently and wait for all
   * of them to settle.
   *
   * Failed, timed-out and malformed calls are logged and reported in
   * `failures`; they never fail the collection on their own.
   *
   * @throws {EmptyCritiqueError} if no evaluator produced a judgment
   * @throws {InvalidConfigError} if an evaluator array holds duplicate ids
   */
  collect(
    statement: CandidateStatement,
    pool: EvaluatorPool | readonly Evaluator[],
    options?: CollectOptions,
  ): Promise<CritiqueCollection>
}
