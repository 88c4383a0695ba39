/**
 * judgment module: Judgment value records
 */

// Types
export type { EvaluatorRole, Judgment, JudgmentInput } from './types.js'
export { EvaluatorRoleEnum, JudgmentInputSchema } from './types.js'

// Construction
export { createJudgment, isJudgment, judgmentToJSON } from './judgment.js'
