/**
 * Session history database: a better-sqlite3 connection plus the lifecycle
 * used by the CLI and the SQLite session store.
 *
 * A file database lives in WAL mode. Its directory is created on first
 * open, and the WAL is checkpointed on shutdown so that a finished command
 * leaves a single `tribunal.db` behind. `:memory:` skips both.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { mkdir } from 'fs/promises'
import { dirname } from 'path'
import { MIGRATIONS, runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY_DATABASE = ':memory:'

// ---------------------------------------------------------------------------
// SessionDatabaseConnection
// ---------------------------------------------------------------------------

/**
 * Owns the raw connection and the pragmas session queries rely on:
 * foreign keys for cascading round and judgment deletes, and a busy
 * timeout for a second CLI process reading history.
 */
export class SessionDatabaseConnection {
  private _db: BetterSqlite3Database | null = null
  readonly path: string

  constructor(databasePath: string) {
    this.path = databasePath
  }

  get isInMemory(): boolean {
    return this.path === IN_MEMORY_DATABASE
  }

  /** No-op when already open */
  open(): void {
    if (this._db !== null) return

    const db = new BetterSqlite3(this.path)
    if (!this.isInMemory) {
      db.pragma('journal_mode = WAL')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')
    this._db = db
    logger.debug({ path: this.path }, 'Session database opened')
  }

  /** Checkpoints a file database before closing. No-op when already closed. */
  close(): void {
    if (this._db === null) return

    if (!this.isInMemory) {
      this._db.pragma('wal_checkpoint(TRUNCATE)')
    }
    this._db.close()
    this._db = null
    logger.debug({ path: this.path }, 'Session database closed')
  }

  /** @throws {Error} when the connection has not been opened */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`Session database ${this.path} is not open`)
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService {
  readonly path: string
  readonly isOpen: boolean
  /** Raw connection for the session queries */
  readonly db: BetterSqlite3Database
  /** Create the directory if needed, open, and bring the schema up to date */
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _connection: SessionDatabaseConnection

  constructor(databasePath: string) {
    this._connection = new SessionDatabaseConnection(databasePath)
  }

  get path(): string {
    return this._connection.path
  }

  get isOpen(): boolean {
    return this._connection.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._connection.db
  }

  async initialize(): Promise<void> {
    if (!this._connection.isInMemory) {
      await mkdir(dirname(this._connection.path), { recursive: true })
    }
    this._connection.open()
    runMigrations(this._connection.db)
    logger.debug(
      { path: this._connection.path, schemaVersion: MIGRATIONS.length },
      'Session history ready',
    )
  }

  async shutdown(): Promise<void> {
    this._connection.close()
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
