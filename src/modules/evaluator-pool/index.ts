/**
 * evaluator-pool module: Evaluator capability and pool
 */

export type {
  CandidateStatement,
  StatementMetadata,
  EvaluationContext,
  Evaluator,
} from './types.js'

export type { EvaluatorPool } from './evaluator-pool.js'
export { EvaluatorPoolImpl, createEvaluatorPool } from './evaluator-pool.js'
