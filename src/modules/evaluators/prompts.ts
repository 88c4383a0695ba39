/**
 * Evaluation prompt builder.
 *
 * Each role gets its own task list; every prompt ends with the same
 * instruction to emit a trailing `verdict:` YAML block.
 */

import type { EvaluatorRole } from '../judgment/types.js'
import type { CandidateStatement } from '../evaluator-pool/types.js'

// ---------------------------------------------------------------------------
// Role briefs
// ---------------------------------------------------------------------------

interface RoleBrief {
  title: string
  tasks: readonly string[]
  /** Whether the verdict must carry a novelty score */
  scoresNovelty: boolean
}

export const ROLE_BRIEFS: Readonly<Record<EvaluatorRole, RoleBrief>> = {
  'logic-checker': {
    title: 'Perform a formal logical consistency check of the position below.',
    tasks: [
      'Identify all explicit and implicit premises',
      'Check for logical contradictions',
      'Verify argument validity (not just soundness)',
      'Identify any informal fallacies',
    ],
    scoresNovelty: false,
  },
  'contradiction-finder': {
    title: 'Find contradictions, paradoxes and logical tensions in the position below.',
    tasks: [
      'Direct contradictions (P and not-P)',
      'Pragmatic contradictions',
      'Tensions between implications',
      'Unresolved paradoxes',
      'Incompatibilities with the stated assumptions',
    ],
    scoresNovelty: false,
  },
  'novelty-assessor': {
    title: 'Assess the novelty of the position below.',
    tasks: [
      'Compare it against known positions in Western and Eastern philosophy',
      'Compare it against contemporary analytic and continental work',
      'Compare it against philosophy of science and philosophy of mind',
      'Name the closest existing positions and how this one differs',
    ],
    scoresNovelty: true,
  },
  'edge-case-generator': {
    title: 'Generate edge cases and test scenarios for the position below.',
    tasks: [
      'Boundary cases where the position might fail',
      'Thought experiments that challenge core claims',
      'Scenarios that exercise its testable predictions',
      'Counter-examples to key arguments',
      'List at least 5 cases as issues',
    ],
    scoresNovelty: false,
  },
  critic: {
    title: 'Critique the position below rigorously.',
    tasks: [
      'Identify logical inconsistencies or contradictions',
      'Evaluate the strength of its arguments',
      'Assess novelty compared to existing literature',
      'Check whether its testable predictions are truly falsifiable',
      'Identify hidden assumptions',
    ],
    scoresNovelty: true,
  },
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the full evaluation prompt for one role and one statement.
 */
export function buildEvaluationPrompt(role: EvaluatorRole, statement: CandidateStatement): string {
  const brief = ROLE_BRIEFS[role]
  const sections: string[] = []

  sections.push(brief.title)
  sections.push(buildPositionSection(statement))
  sections.push(`## Task\n${brief.tasks.map((task, i) => `${String(i + 1)}. ${task}`).join('\n')}`)
  sections.push(buildOutputFormatSection(brief.scoresNovelty))

  return sections.join('\n\n')
}

function buildPositionSection(statement: CandidateStatement): string {
  const lines = [`## Position\n${statement.text}`]
  const { testablePredictions, assumptions } = statement.metadata

  if (testablePredictions !== undefined && testablePredictions.length > 0) {
    lines.push(`## Testable Predictions\n${testablePredictions.map((p) => `- ${p}`).join('\n')}`)
  }
  if (assumptions !== undefined && assumptions.length > 0) {
    lines.push(`## Assumptions\n${assumptions.map((a) => `- ${a}`).join('\n')}`)
  }
  return lines.join('\n\n')
}

function buildOutputFormatSection(scoresNovelty: boolean): string {
  const fields = [
    'verdict:',
    '  logically_consistent: true   # or false',
    ...(scoresNovelty ? ['  novelty: 0.0                 # 0.0 derivative .. 1.0 entirely original'] : []),
    '  coherence: 0.0               # 0.0 incoherent .. 1.0 fully coherent',
    '  issues:',
    '    - one line per issue found',
    '  reasoning: one short paragraph',
  ]
  return [
    '## Output Format',
    'Write your analysis, then end your answer with a YAML block in exactly this shape:',
    '',
    '```yaml',
    ...fields,
    '```',
  ].join('\n')
}
