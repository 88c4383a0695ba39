/**
 * Tribunal - Main module exports
 * Public API surface for the adjudication library
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { TribunalEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Adjudication core
export * from './modules/judgment/index.js'
export * from './modules/evaluator-pool/index.js'
export * from './modules/critique-collector/index.js'
export * from './modules/consensus-engine/index.js'
export * from './modules/session/index.js'

// Generation, evaluation and the revision loop
export * from './modules/evaluators/index.js'
export * from './modules/statement-source/index.js'
export * from './modules/adjudication-runner/index.js'

// Configuration
export * from './modules/config/index.js'

// Session history
export type { DatabaseService } from './persistence/database.js'
export { createDatabaseService } from './persistence/database.js'
export type { SessionSummary, ListSessionsOptions } from './persistence/queries/sessions.js'
export { saveSession, getSession, listSessions, deleteSession } from './persistence/queries/sessions.js'
export { SqliteSessionStore, createSqliteSessionStore } from './persistence/session-store.js'
