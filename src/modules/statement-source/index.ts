/**
 * statement-source module: candidate statement producers
 */

export type { StatementSource, StatementRequest, RevisionContext } from './statement-source.js'
export type { PromptedStatementSourceOptions } from './prompted-statement-source.js'
export { PromptedStatementSource, PositionSchema, POSITION_ANCHOR_KEYS } from './prompted-statement-source.js'
export { FixedStatementSource } from './fixed-statement-source.js'
export { buildGenerationPrompt } from './prompts.js'
