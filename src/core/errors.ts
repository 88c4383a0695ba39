/**
 * Error definitions for Tribunal
 * Provides structured error hierarchy for adjudication, critique collection and configuration
 */

/** Base error class for all Tribunal errors */
export class TribunalError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'TribunalError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TribunalError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a judgment fails validation at construction */
export class InvalidJudgmentError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_JUDGMENT', context)
    this.name = 'InvalidJudgmentError'
  }
}

/** Kind of failure observed for a single evaluator call */
export type EvaluatorFailureKind = 'error' | 'timeout' | 'malformed' | 'aborted'

/** Error describing one evaluator's failed, timed-out or malformed call */
export class EvaluatorFailureError extends TribunalError {
  public readonly evaluatorId: string
  public readonly kind: EvaluatorFailureKind

  constructor(
    evaluatorId: string,
    kind: EvaluatorFailureKind,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, 'EVALUATOR_FAILURE', { evaluatorId, kind, ...context })
    this.name = 'EvaluatorFailureError'
    this.evaluatorId = evaluatorId
    this.kind = kind
  }
}

/** Error thrown when every evaluator in a pool failed to produce a judgment */
export class EmptyCritiqueError extends TribunalError {
  constructor(poolSize: number, context: Record<string, unknown> = {}) {
    super(
      `No judgments obtained: all ${String(poolSize)} evaluator(s) failed`,
      'EMPTY_CRITIQUE',
      { poolSize, ...context }
    )
    this.name = 'EmptyCritiqueError'
  }
}

/** Error thrown when the consensus engine receives input that breaks its contract */
export class InvalidInputError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_INPUT', context)
    this.name = 'InvalidInputError'
  }
}

/** Error thrown when a threshold or configuration value is out of range */
export class InvalidConfigError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_CONFIG', context)
    this.name = 'InvalidConfigError'
  }
}

/** Error thrown when configuration is unreadable, missing or addressed by an unknown key */
export class ConfigError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Error thrown when a session operation violates the session lifecycle */
export class SessionStateError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SESSION_STATE', context)
    this.name = 'SessionStateError'
  }
}

/** Error thrown when a session id is not present in the session store */
export class SessionNotFoundError extends TribunalError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', {
      sessionId,
    })
    this.name = 'SessionNotFoundError'
  }
}

/** Error thrown when text generation fails at the transport or parsing level */
export class GenerationError extends TribunalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GENERATION_ERROR', context)
    this.name = 'GenerationError'
  }
}
