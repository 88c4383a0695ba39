/**
 * Condenses a decided round into the feedback text handed to the statement
 * source for the next revision.
 */

import type { Decision } from '../consensus-engine/types.js'
import type { Judgment } from '../judgment/types.js'

export const DEFAULT_ISSUES_PER_EVALUATOR = 3

/**
 * Render the decision reasons followed by up to `maxIssues` issues per
 * evaluator, in judgment order. Evaluators that raised nothing are omitted.
 */
export function summarizeCritiques(
  judgments: readonly Judgment[],
  decision?: Decision,
  maxIssues: number = DEFAULT_ISSUES_PER_EVALUATOR,
): string {
  const lines: string[] = []

  if (decision !== undefined && decision.reasons.length > 0) {
    lines.push('Reasons:')
    for (const reason of decision.reasons) {
      lines.push(`- ${reason}`)
    }
  }

  const withIssues = judgments.filter((j) => j.identifiedIssues.length > 0)
  if (withIssues.length === 0) {
    lines.push('No specific issues identified.')
    return lines.join('\n')
  }

  lines.push('Issues:')
  for (const judgment of withIssues) {
    const count = judgment.identifiedIssues.length
    lines.push(`- ${judgment.evaluatorId}: ${String(count)} issue${count === 1 ? '' : 's'} identified`)
    for (const issue of judgment.identifiedIssues.slice(0, maxIssues)) {
      lines.push(`  • ${issue}`)
    }
  }
  return lines.join('\n')
}
