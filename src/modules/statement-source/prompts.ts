/**
 * Generation prompt builder for PromptedStatementSource.
 */

import type { StatementRequest } from './statement-source.js'

/**
 * Build the prompt asking for a new (or revised) position on a problem.
 *
 * Revision requests add the previous statement and its critique summary.
 */
export function buildGenerationPrompt(request: StatementRequest): string {
  const sections: string[] = []

  sections.push('You are a philosophical innovation engine. Propose a novel, rigorous position on the problem below.')
  sections.push(`## Problem\n${request.problem}`)

  const constraints = [
    'Make at least 2 falsifiable, testable predictions',
    'State the assumptions the position rests on',
    ...(request.constraints ?? []),
  ]
  if (request.revision !== undefined) {
    constraints.push('Address every critique of the previous position', 'Keep its strengths while fixing its weaknesses')
  }
  if (request.existingSolutions !== undefined && request.existingSolutions.length > 0) {
    constraints.push(`Differ from these existing positions: ${request.existingSolutions.join('; ')}`)
  }
  sections.push(`## Constraints\n${constraints.map((c) => `- ${c}`).join('\n')}`)

  if (request.revision !== undefined) {
    sections.push(`## Previous Position\n${request.revision.previous.text}`)
    sections.push(
      `## Critique\n${request.revision.critiqueSummary}\n\nRevise the position so that it answers this critique.`,
    )
  }

  sections.push(
    [
      '## Output Format',
      'End your answer with a YAML block in exactly this shape:',
      '',
      '```yaml',
      'position:',
      '  statement: the position in one paragraph',
      '  testable_predictions:',
      '    - one prediction per line',
      '  assumptions:',
      '    - one assumption per line',
      '```',
    ].join('\n'),
  )

  return sections.join('\n\n')
}
