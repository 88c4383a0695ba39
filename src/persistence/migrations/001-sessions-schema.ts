/**
 * Migration 001: Session history schema.
 *
 *  - sessions        one row per adjudication session
 *  - session_rounds  one row per statement/revision, with its decision
 *  - judgments       one row per evaluator per round, in collection order
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const sessionsSchemaMigration: Migration = {
  version: 1,
  name: '001-sessions-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id              TEXT PRIMARY KEY,
        problem         TEXT,
        iteration_count INTEGER NOT NULL,
        final_outcome   TEXT,
        created_at      TEXT NOT NULL,
        updated_at      TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_rounds (
        session_id            TEXT    NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        iteration             INTEGER NOT NULL,
        statement_text        TEXT    NOT NULL,
        statement_metadata    TEXT    NOT NULL,
        outcome               TEXT,
        average_novelty       REAL,
        reasons               TEXT,
        contributing_ids      TEXT,
        testable_predictions  INTEGER,
        coherence_agreeing    INTEGER,
        coherence_total       INTEGER,
        novelty_samples       INTEGER,
        decided_at            TEXT,
        PRIMARY KEY (session_id, iteration)
      );

      CREATE TABLE IF NOT EXISTS judgments (
        session_id              TEXT    NOT NULL,
        iteration               INTEGER NOT NULL,
        position                INTEGER NOT NULL,
        evaluator_id            TEXT    NOT NULL,
        role                    TEXT    NOT NULL,
        is_logically_consistent INTEGER NOT NULL,
        novelty_score           REAL,
        coherence_score         REAL,
        identified_issues       TEXT    NOT NULL,
        reasoning               TEXT    NOT NULL,
        PRIMARY KEY (session_id, iteration, evaluator_id),
        FOREIGN KEY (session_id, iteration)
          REFERENCES session_rounds(session_id, iteration) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_final_outcome ON sessions(final_outcome);
      CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);
    `)
  },
}
