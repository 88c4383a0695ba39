/**
 * Judgment construction and validation.
 *
 * Every Judgment in the system is created here. Score fields outside [0, 1]
 * are rejected with InvalidJudgmentError and never reach a collection.
 */

import { InvalidJudgmentError } from '../../core/errors.js'
import { JudgmentInputSchema } from './types.js'
import type { Judgment, JudgmentInput } from './types.js'

/** Judgments created through createJudgment(); used to detect malformed evaluator output */
const constructed = new WeakSet<object>()

/**
 * Validate raw fields and return a frozen Judgment.
 *
 * @throws {InvalidJudgmentError} if any field fails validation
 */
export function createJudgment(input: JudgmentInput): Judgment {
  const parsed = JudgmentInputSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new InvalidJudgmentError(`Invalid judgment: ${issues}`, {
      evaluatorId: typeof input.evaluatorId === 'string' ? input.evaluatorId : undefined,
      issues: parsed.error.issues,
    })
  }

  const data = parsed.data
  const judgment: Judgment = Object.freeze({
    evaluatorId: data.evaluatorId,
    role: data.role,
    isLogicallyConsistent: data.isLogicallyConsistent,
    ...(data.noveltyScore !== undefined ? { noveltyScore: data.noveltyScore } : {}),
    ...(data.coherenceScore !== undefined ? { coherenceScore: data.coherenceScore } : {}),
    identifiedIssues: Object.freeze([...data.identifiedIssues]),
    reasoning: data.reasoning,
  })
  constructed.add(judgment)
  return judgment
}

/**
 * Whether a value is a Judgment produced by createJudgment().
 */
export function isJudgment(value: unknown): value is Judgment {
  return typeof value === 'object' && value !== null && constructed.has(value)
}

/**
 * Plain serializable copy of a judgment. Absent scores are omitted.
 */
export function judgmentToJSON(judgment: Judgment): JudgmentInput {
  return {
    evaluatorId: judgment.evaluatorId,
    role: judgment.role,
    isLogicallyConsistent: judgment.isLogicallyConsistent,
    ...(judgment.noveltyScore !== undefined ? { noveltyScore: judgment.noveltyScore } : {}),
    ...(judgment.coherenceScore !== undefined ? { coherenceScore: judgment.coherenceScore } : {}),
    identifiedIssues: [...judgment.identifiedIssues],
    reasoning: judgment.reasoning,
  }
}
