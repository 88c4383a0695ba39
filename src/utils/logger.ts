/**
 * Logger utility for Tribunal
 * Uses pino for structured JSON logging with pretty printing in development.
 * Logs go to stderr; stdout is reserved for command output.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use): default to warn to avoid noise
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // Plain JSON in CLI use and production; pino-pretty runs a worker thread.
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // pino-pretty is a devDependency; only used outside production.
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  } else {
    instance = pino(baseOptions, pino.destination({ dest: 2, sync: true }))
  }
  if (options.level === undefined) {
    registry.add(instance)
  }
  return instance
}

/** Loggers created without an explicit level; setLogLevel() retunes them */
const registry = new Set<pino.Logger>()

/**
 * Apply a configured log level to every logger that took the default.
 * LOG_LEVEL in the environment wins over configuration.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  for (const instance of registry) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('tribunal')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
