/**
 * CLI output formatting utilities
 *
 * Human-readable tables for decisions, judgments and session history, and the
 * JSON envelope shared by every command's `--output-format json` mode.
 */

import type { Decision } from '../../modules/consensus-engine/types.js'
import { formatMetric } from '../../modules/consensus-engine/consensus-engine.js'
import type { JudgmentInput } from '../../modules/judgment/types.js'
import type { SessionSnapshot } from '../../modules/session/types.js'
import type { SessionSummary } from '../../persistence/queries/sessions.js'

export type OutputFormat = 'table' | 'json'

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n')
}

// ---------------------------------------------------------------------------
// Decisions and judgments
// ---------------------------------------------------------------------------

/**
 * Render a decision as labelled lines followed by its reasons.
 */
export function formatDecision(decision: Decision): string {
  const { coherenceAgreement } = decision.metrics
  return [
    `Outcome: ${decision.outcome}`,
    `Average novelty: ${formatMetric(decision.averageNovelty)} (${String(decision.metrics.noveltySamples)} sample(s))`,
    `Testable predictions: ${String(decision.metrics.testablePredictions)}`,
    `Coherence agreement: ${String(coherenceAgreement.agreeing)}/${String(coherenceAgreement.total)}`,
    'Reasons:',
    ...decision.reasons.map((reason) => `  - ${reason}`),
  ].join('\n')
}

function score(value: number | undefined): string {
  return value === undefined ? '-' : formatMetric(value)
}

/**
 * Render judgments as a table, one row per evaluator.
 */
export function formatJudgmentTable(judgments: readonly JudgmentInput[]): string {
  const headers = ['Evaluator', 'Role', 'Consistent', 'Novelty', 'Coherence', 'Issues']
  const keys = ['evaluator', 'role', 'consistent', 'novelty', 'coherence', 'issues']
  const rows = judgments.map((j) => ({
    evaluator: j.evaluatorId,
    role: j.role,
    consistent: j.isLogicallyConsistent ? 'yes' : 'no',
    novelty: score(j.noveltyScore),
    coherence: score(j.coherenceScore),
    issues: String(j.identifiedIssues?.length ?? 0),
  }))
  return formatTable(headers, rows, keys)
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`
}

export function formatSessionList(sessions: readonly SessionSummary[]): string {
  if (sessions.length === 0) {
    return 'No sessions found.'
  }
  const headers = ['ID', 'Outcome', 'Iterations', 'Updated', 'Statement']
  const keys = ['id', 'outcome', 'iterations', 'updated', 'statement']
  const rows = sessions.map((s) => ({
    id: s.id,
    outcome: s.finalOutcome ?? 'PENDING',
    iterations: String(s.iterationCount),
    updated: s.updatedAt,
    statement: truncate(s.statement ?? '', 60),
  }))
  return formatTable(headers, rows, keys)
}

/**
 * Render every round of a session: statement, judgments and decision.
 */
export function formatSessionDetail(snapshot: SessionSnapshot): string {
  const lines: string[] = [`Session ${snapshot.id} (created ${snapshot.createdAt})`]
  for (const round of snapshot.rounds) {
    lines.push('')
    lines.push(`Round ${String(round.iteration)}: ${round.statement.text}`)
    if (round.judgments.length > 0) {
      lines.push(formatJudgmentTable(round.judgments))
    }
    lines.push(round.decision !== undefined ? formatDecision(round.decision) : 'Outcome: PENDING')
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// JSON envelope
// ---------------------------------------------------------------------------

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Tribunal version string */
  version: string
  /** The CLI command that was executed */
  command: string
  /** The actual data payload */
  data: T
}

/**
 * Build a CLIJsonOutput wrapper around data.
 */
export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
