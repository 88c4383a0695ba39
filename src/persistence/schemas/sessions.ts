/**
 * Zod schemas for session history rows.
 *
 * Every row read back from SQLite is validated here before it is turned into
 * a session snapshot.
 */

import { z } from 'zod'
import { EvaluatorRoleEnum } from '../../modules/judgment/types.js'
import { OUTCOMES } from '../../modules/consensus-engine/types.js'

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const OutcomeEnum = z.enum(OUTCOMES)

/** A TEXT column holding JSON, decoded and validated against `inner` */
function jsonColumn<T extends z.ZodTypeAny>(inner: T): z.ZodEffects<z.ZodString, z.output<T>> {
  return z.string().transform((text, ctx): z.output<T> => {
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON' })
      return z.NEVER
    }
    const result = inner.safeParse(value)
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message })
      }
      return z.NEVER
    }
    return result.data
  })
}

const StringListJson = jsonColumn(z.array(z.string()))

export const StatementMetadataSchema = z
  .object({
    problem: z.string().optional(),
    testablePredictions: z.array(z.string()).optional(),
    testablePredictionCount: z.number().optional(),
    assumptions: z.array(z.string()).optional(),
  })
  .passthrough()

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export const SessionRowSchema = z.object({
  id: z.string().min(1),
  problem: z.string().nullable(),
  iteration_count: z.number().int().min(0),
  final_outcome: OutcomeEnum.nullable(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type SessionRow = z.infer<typeof SessionRowSchema>

export const SessionRoundRowSchema = z.object({
  session_id: z.string(),
  iteration: z.number().int().min(0),
  statement_text: z.string(),
  statement_metadata: jsonColumn(StatementMetadataSchema),
  outcome: OutcomeEnum.nullable(),
  average_novelty: z.number().nullable(),
  reasons: StringListJson.nullable(),
  contributing_ids: StringListJson.nullable(),
  testable_predictions: z.number().int().nullable(),
  coherence_agreeing: z.number().int().nullable(),
  coherence_total: z.number().int().nullable(),
  novelty_samples: z.number().int().nullable(),
  decided_at: z.string().nullable(),
})
export type SessionRoundRow = z.infer<typeof SessionRoundRowSchema>

export const JudgmentRowSchema = z.object({
  session_id: z.string(),
  iteration: z.number().int().min(0),
  position: z.number().int().min(0),
  evaluator_id: z.string().min(1),
  role: EvaluatorRoleEnum,
  is_logically_consistent: z.union([z.literal(0), z.literal(1)]),
  novelty_score: z.number().nullable(),
  coherence_score: z.number().nullable(),
  identified_issues: StringListJson,
  reasoning: z.string(),
})
export type JudgmentRow = z.infer<typeof JudgmentRowSchema>

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

export const SessionSummaryRowSchema = SessionRowSchema.extend({
  statement_text: z.string().nullable(),
})
export type SessionSummaryRow = z.infer<typeof SessionSummaryRowSchema>
