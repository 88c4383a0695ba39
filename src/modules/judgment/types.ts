/**
 * Judgment types: one evaluator's scored opinion of one candidate statement.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export const EvaluatorRoleEnum = z.enum([
  'logic-checker',
  'contradiction-finder',
  'novelty-assessor',
  'edge-case-generator',
  'critic',
])
export type EvaluatorRole = z.infer<typeof EvaluatorRoleEnum>

// ---------------------------------------------------------------------------
// Judgment input schema
// ---------------------------------------------------------------------------

const UnitScoreSchema = z
  .number()
  .finite()
  .min(0, 'must be at least 0.0')
  .max(1, 'must be at most 1.0')

export const JudgmentInputSchema = z
  .object({
    evaluatorId: z.string().min(1),
    role: EvaluatorRoleEnum,
    isLogicallyConsistent: z.boolean(),
    noveltyScore: UnitScoreSchema.optional(),
    coherenceScore: UnitScoreSchema.optional(),
    identifiedIssues: z.array(z.string()).default([]),
    reasoning: z.string().default(''),
  })
  .strict()

/** Raw fields accepted by createJudgment() */
export type JudgmentInput = z.input<typeof JudgmentInputSchema>

// ---------------------------------------------------------------------------
// Judgment value
// ---------------------------------------------------------------------------

/**
 * An immutable judgment. Produced exactly once per evaluator per candidate.
 *
 * `reasoning` is retained for audit only and never read by aggregation.
 */
export interface Judgment {
  readonly evaluatorId: string
  readonly role: EvaluatorRole
  readonly isLogicallyConsistent: boolean
  readonly noveltyScore?: number
  readonly coherenceScore?: number
  readonly identifiedIssues: readonly string[]
  readonly reasoning: string
}
