/**
 * session module: statement, judgments and decisions across revision rounds
 */

export type {
  SessionRound,
  SessionRoundSnapshot,
  SessionSnapshot,
  SessionOptions,
} from './types.js'
export { Session, createSession } from './session.js'
