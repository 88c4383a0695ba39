/**
 * SQLite-backed SessionStore for the adjudication runner.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { SessionStore } from '../modules/adjudication-runner/types.js'
import type { SessionSnapshot } from '../modules/session/types.js'
import { createLogger } from '../utils/logger.js'
import { saveSession } from './queries/sessions.js'

const logger = createLogger('persistence:sessions')

export class SqliteSessionStore implements SessionStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  save(snapshot: SessionSnapshot): void {
    saveSession(this._db, snapshot)
    logger.debug({ sessionId: snapshot.id, rounds: snapshot.rounds.length }, 'Session saved')
  }
}

export function createSqliteSessionStore(db: BetterSqlite3Database): SessionStore {
  return new SqliteSessionStore(db)
}
