/**
 * Tests for session history query functions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import {
  saveSession,
  getSession,
  listSessions,
  deleteSession,
} from '../../../src/persistence/queries/sessions.js'
import { createSqliteSessionStore } from '../../../src/persistence/session-store.js'
import { Session, createSession } from '../../../src/modules/session/session.js'
import { createJudgment } from '../../../src/modules/judgment/judgment.js'
import type { JudgmentInput } from '../../../src/modules/judgment/types.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  runMigrations(db)
  return db
}

function judgment(id: string, overrides: Partial<JudgmentInput> = {}): ReturnType<typeof createJudgment> {
  return createJudgment({
    evaluatorId: id,
    role: 'critic',
    isLogicallyConsistent: true,
    noveltyScore: 0.8,
    coherenceScore: 0.9,
    identifiedIssues: [`${id} issue`],
    reasoning: `${id} reasoning`,
    ...overrides,
  })
}

/** A session revised once: REVISE then ACCEPT */
function revisedSession(id: string, clock: string): Session {
  const now = (): Date => new Date(clock)
  const session = createSession(
    {
      text: 'Habits are cached policies.',
      metadata: { problem: 'What is a habit?', testablePredictions: ['a'], assumptions: ['RL applies'] },
    },
    { id, now },
  )
  session.appendJudgments([judgment('logic', { noveltyScore: 0.2 }), judgment('edge', { coherenceScore: undefined })])
  session.adjudicate()
  session.beginRevision({ text: 'Habits are compiled policies.', metadata: { testablePredictions: ['a', 'b'] } })
  session.appendJudgments([judgment('logic'), judgment('edge', { noveltyScore: undefined, identifiedIssues: [] })])
  session.adjudicate()
  return session
}

describe('sessions queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  describe('saveSession / getSession', () => {
    it('round-trips every round, judgment and decision field', () => {
      const session = revisedSession('session-a', '2026-03-01T12:00:00.000Z')
      const snapshot = session.toSnapshot()

      saveSession(db, snapshot)

      expect(getSession(db, 'session-a')).toEqual(snapshot)
    })

    it('restores into a Session with the same decisions', () => {
      saveSession(db, revisedSession('session-a', '2026-03-01T12:00:00.000Z').toSnapshot())
      const stored = getSession(db, 'session-a')
      expect(stored).toBeDefined()
      if (stored === undefined) return

      const restored = Session.fromSnapshot(stored)
      expect(restored.rounds.map((r) => r.decision?.outcome)).toEqual(['REVISE', 'ACCEPT'])
      expect(restored.iterationCount).toBe(1)
    })

    it('stores an undecided latest round without a decision', () => {
      const session = createSession({ text: 'open', metadata: {} }, { id: 'session-open' })

      saveSession(db, session.toSnapshot())

      const stored = getSession(db, 'session-open')
      expect(stored?.rounds).toHaveLength(1)
      expect(stored?.rounds[0]?.decision).toBeUndefined()
      expect(stored?.rounds[0]?.decidedAt).toBeUndefined()
      expect(listSessions(db)[0]?.finalOutcome).toBeNull()
    })

    it('replaces an earlier save of the same session', () => {
      const session = createSession(
        { text: 'first', metadata: { testablePredictions: ['a', 'b'] } },
        { id: 'session-b', now: () => new Date('2026-03-02T00:00:00.000Z') },
      )
      saveSession(db, session.toSnapshot())
      session.appendJudgments([judgment('logic')])
      session.adjudicate()
      saveSession(db, session.toSnapshot())

      expect(getSession(db, 'session-b')).toEqual(session.toSnapshot())
      expect(db.prepare('SELECT COUNT(*) FROM judgments').pluck().get()).toBe(1)
    })

    it('returns undefined for a missing id', () => {
      expect(getSession(db, 'nonexistent')).toBeUndefined()
    })
  })

  describe('listSessions', () => {
    beforeEach(() => {
      saveSession(db, revisedSession('session-old', '2026-03-01T00:00:00.000Z').toSnapshot())
      saveSession(db, revisedSession('session-new', '2026-03-05T00:00:00.000Z').toSnapshot())
      const rejected = createSession(
        { text: 'Nothing exists.', metadata: {} },
        { id: 'session-rejected', now: () => new Date('2026-03-03T00:00:00.000Z') },
      )
      rejected.appendJudgments([judgment('logic', { isLogicallyConsistent: false })])
      rejected.adjudicate()
      saveSession(db, rejected.toSnapshot())
    })

    it('lists the most recently updated first', () => {
      expect(listSessions(db).map((s) => s.id)).toEqual(['session-new', 'session-rejected', 'session-old'])
    })

    it('summarizes the latest round', () => {
      expect(listSessions(db, { limit: 1 })).toEqual([
        {
          id: 'session-new',
          problem: 'What is a habit?',
          statement: 'Habits are compiled policies.',
          iterationCount: 1,
          finalOutcome: 'ACCEPT',
          createdAt: '2026-03-05T00:00:00.000Z',
          updatedAt: '2026-03-05T00:00:00.000Z',
        },
      ])
    })

    it('filters by final outcome', () => {
      expect(listSessions(db, { outcome: 'REJECT' }).map((s) => s.id)).toEqual(['session-rejected'])
      expect(listSessions(db, { outcome: 'REVISE' })).toEqual([])
    })
  })

  describe('deleteSession', () => {
    it('removes the session and its rows', () => {
      saveSession(db, revisedSession('session-a', '2026-03-01T12:00:00.000Z').toSnapshot())

      expect(deleteSession(db, 'session-a')).toBe(true)
      expect(getSession(db, 'session-a')).toBeUndefined()
      expect(db.prepare('SELECT COUNT(*) FROM session_rounds').pluck().get()).toBe(0)
      expect(db.prepare('SELECT COUNT(*) FROM judgments').pluck().get()).toBe(0)
    })

    it('returns false for a missing id', () => {
      expect(deleteSession(db, 'nonexistent')).toBe(false)
    })
  })

  describe('SqliteSessionStore', () => {
    it('saves snapshots through saveSession', () => {
      const session = revisedSession('session-store', '2026-03-01T12:00:00.000Z')

      void createSqliteSessionStore(db).save(session.toSnapshot())

      expect(getSession(db, 'session-store')).toEqual(session.toSnapshot())
    })
  })
})
