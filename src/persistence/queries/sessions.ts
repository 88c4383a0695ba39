/**
 * Session history query functions for the SQLite persistence layer.
 *
 * A session is stored across three tables; saveSession() rewrites all of
 * them in one transaction, so a reader never sees a partly saved session.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Outcome, Decision } from '../../modules/consensus-engine/types.js'
import type { JudgmentInput } from '../../modules/judgment/types.js'
import type { SessionRoundSnapshot, SessionSnapshot } from '../../modules/session/types.js'
import {
  JudgmentRowSchema,
  SessionRoundRowSchema,
  SessionRowSchema,
  SessionSummaryRowSchema,
} from '../schemas/sessions.js'
import type { JudgmentRow, SessionRoundRow } from '../schemas/sessions.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionSummary {
  id: string
  problem: string | null
  /** Statement of the latest round */
  statement: string | null
  iterationCount: number
  /** Null while the latest round is undecided */
  finalOutcome: Outcome | null
  createdAt: string
  updatedAt: string
}

export interface ListSessionsOptions {
  /** Default 20 */
  limit?: number
  outcome?: Outcome
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Insert or replace a session and all of its rounds and judgments.
 */
export function saveSession(db: BetterSqlite3Database, snapshot: SessionSnapshot): void {
  const last = snapshot.rounds[snapshot.rounds.length - 1]
  const first = snapshot.rounds[0]
  const problem = first !== undefined && typeof first.statement.metadata.problem === 'string'
    ? first.statement.metadata.problem
    : null

  const upsertSession = db.prepare(`
    INSERT INTO sessions (id, problem, iteration_count, final_outcome, created_at, updated_at)
    VALUES (@id, @problem, @iteration_count, @final_outcome, @created_at, @updated_at)
    ON CONFLICT(id) DO UPDATE SET
      problem = excluded.problem,
      iteration_count = excluded.iteration_count,
      final_outcome = excluded.final_outcome,
      updated_at = excluded.updated_at
  `)
  const deleteJudgments = db.prepare('DELETE FROM judgments WHERE session_id = ?')
  const deleteRounds = db.prepare('DELETE FROM session_rounds WHERE session_id = ?')
  const insertRound = db.prepare(`
    INSERT INTO session_rounds (
      session_id, iteration, statement_text, statement_metadata, outcome, average_novelty,
      reasons, contributing_ids, testable_predictions, coherence_agreeing, coherence_total,
      novelty_samples, decided_at
    ) VALUES (
      @session_id, @iteration, @statement_text, @statement_metadata, @outcome, @average_novelty,
      @reasons, @contributing_ids, @testable_predictions, @coherence_agreeing, @coherence_total,
      @novelty_samples, @decided_at
    )
  `)
  const insertJudgment = db.prepare(`
    INSERT INTO judgments (
      session_id, iteration, position, evaluator_id, role, is_logically_consistent,
      novelty_score, coherence_score, identified_issues, reasoning
    ) VALUES (
      @session_id, @iteration, @position, @evaluator_id, @role, @is_logically_consistent,
      @novelty_score, @coherence_score, @identified_issues, @reasoning
    )
  `)

  const write = db.transaction(() => {
    upsertSession.run({
      id: snapshot.id,
      problem,
      iteration_count: last?.iteration ?? 0,
      final_outcome: last?.decision?.outcome ?? null,
      created_at: snapshot.createdAt,
      updated_at: last?.decidedAt ?? snapshot.createdAt,
    })
    deleteJudgments.run(snapshot.id)
    deleteRounds.run(snapshot.id)

    for (const round of snapshot.rounds) {
      const decision = round.decision
      insertRound.run({
        session_id: snapshot.id,
        iteration: round.iteration,
        statement_text: round.statement.text,
        statement_metadata: JSON.stringify(round.statement.metadata),
        outcome: decision?.outcome ?? null,
        average_novelty: decision?.averageNovelty ?? null,
        reasons: decision !== undefined ? JSON.stringify(decision.reasons) : null,
        contributing_ids: decision !== undefined ? JSON.stringify(decision.contributingJudgmentIds) : null,
        testable_predictions: decision?.metrics.testablePredictions ?? null,
        coherence_agreeing: decision?.metrics.coherenceAgreement.agreeing ?? null,
        coherence_total: decision?.metrics.coherenceAgreement.total ?? null,
        novelty_samples: decision?.metrics.noveltySamples ?? null,
        decided_at: round.decidedAt ?? null,
      })

      round.judgments.forEach((judgment, position) => {
        insertJudgment.run({
          session_id: snapshot.id,
          iteration: round.iteration,
          position,
          evaluator_id: judgment.evaluatorId,
          role: judgment.role,
          is_logically_consistent: judgment.isLogicallyConsistent ? 1 : 0,
          novelty_score: judgment.noveltyScore ?? null,
          coherence_score: judgment.coherenceScore ?? null,
          identified_issues: JSON.stringify(judgment.identifiedIssues ?? []),
          reasoning: judgment.reasoning ?? '',
        })
      })
    }
  })

  write()
}

/**
 * Delete a session with its rounds and judgments. Returns false if it did not exist.
 */
export function deleteSession(db: BetterSqlite3Database, sessionId: string): boolean {
  const remove = db.transaction((id: string): boolean => {
    db.prepare('DELETE FROM judgments WHERE session_id = ?').run(id)
    db.prepare('DELETE FROM session_rounds WHERE session_id = ?').run(id)
    return db.prepare('DELETE FROM sessions WHERE id = ?').run(id).changes > 0
  })
  return remove(sessionId)
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

function toJudgmentInput(row: JudgmentRow): JudgmentInput {
  return {
    evaluatorId: row.evaluator_id,
    role: row.role,
    isLogicallyConsistent: row.is_logically_consistent === 1,
    ...(row.novelty_score !== null ? { noveltyScore: row.novelty_score } : {}),
    ...(row.coherence_score !== null ? { coherenceScore: row.coherence_score } : {}),
    identifiedIssues: row.identified_issues,
    reasoning: row.reasoning,
  }
}

function toDecision(row: SessionRoundRow): Decision | undefined {
  if (row.outcome === null) return undefined
  return {
    outcome: row.outcome,
    averageNovelty: row.average_novelty ?? 0,
    reasons: row.reasons ?? [],
    contributingJudgmentIds: row.contributing_ids ?? [],
    metrics: {
      testablePredictions: row.testable_predictions ?? 0,
      coherenceAgreement: {
        agreeing: row.coherence_agreeing ?? 0,
        total: row.coherence_total ?? 0,
      },
      noveltySamples: row.novelty_samples ?? 0,
    },
  }
}

/**
 * Retrieve a session snapshot by id. Returns undefined if not found.
 */
export function getSession(db: BetterSqlite3Database, sessionId: string): SessionSnapshot | undefined {
  const sessionRow: unknown = db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId)
  if (sessionRow === undefined) {
    return undefined
  }
  const session = SessionRowSchema.parse(sessionRow)

  const rounds = db
    .prepare('SELECT * FROM session_rounds WHERE session_id = ? ORDER BY iteration')
    .all(sessionId)
    .map((row) => SessionRoundRowSchema.parse(row))
  const judgments = db
    .prepare('SELECT * FROM judgments WHERE session_id = ? ORDER BY iteration, position')
    .all(sessionId)
    .map((row) => JudgmentRowSchema.parse(row))

  return {
    id: session.id,
    createdAt: session.created_at,
    rounds: rounds.map((round): SessionRoundSnapshot => {
      const decision = toDecision(round)
      return {
        iteration: round.iteration,
        statement: { text: round.statement_text, metadata: round.statement_metadata },
        judgments: judgments.filter((j) => j.iteration === round.iteration).map(toJudgmentInput),
        ...(decision !== undefined ? { decision } : {}),
        ...(round.decided_at !== null ? { decidedAt: round.decided_at } : {}),
      }
    }),
  }
}

/**
 * List sessions, most recently updated first.
 */
export function listSessions(
  db: BetterSqlite3Database,
  options: ListSessionsOptions = {},
): SessionSummary[] {
  const limit = options.limit ?? 20
  const where = options.outcome !== undefined ? 'WHERE s.final_outcome = @outcome' : ''
  const rows = db
    .prepare(`
      SELECT s.*, r.statement_text
      FROM sessions s
      LEFT JOIN session_rounds r ON r.session_id = s.id AND r.iteration = s.iteration_count
      ${where}
      ORDER BY s.updated_at DESC, s.id ASC
      LIMIT @limit
    `)
    .all({ limit, ...(options.outcome !== undefined ? { outcome: options.outcome } : {}) })

  return rows.map((raw) => {
    const row = SessionSummaryRowSchema.parse(raw)
    return {
      id: row.id,
      problem: row.problem,
      statement: row.statement_text,
      iterationCount: row.iteration_count,
      finalOutcome: row.final_outcome,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }
  })
}
