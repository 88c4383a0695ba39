/**
 * Shared command plumbing: config loading, database access and error output.
 */

import { InvalidArgumentError } from 'commander'
import { join } from 'path'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import type { PartialTribunalConfig, TribunalConfig } from '../../modules/config/config-schema.js'
import { createDatabaseService } from '../../persistence/database.js'
import type { DatabaseService } from '../../persistence/database.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'

const logger = createLogger('cli')

export const CLI_EXIT_SUCCESS = 0
export const CLI_EXIT_ERROR = 1
/** The run finished but the panel did not accept the final statement */
export const CLI_EXIT_NOT_ACCEPTED = 2

export const DATABASE_FILE_NAME = 'tribunal.db'

/** Options every command accepts for locating configuration */
export interface ConfigLocationOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment to read TRIBUNAL_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Create and load a config system for a command.
 */
export async function loadConfigSystem(
  opts: ConfigLocationOptions,
  cliOverrides?: PartialTribunalConfig,
): Promise<ConfigSystem> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
    ...(cliOverrides !== undefined && { cliOverrides }),
  })
  await system.load()
  setLogLevel(system.getConfig().global.log_level)
  return system
}

/**
 * Session history lives in `global.database_path`, else beside the project config.
 */
export function resolveDatabasePath(config: TribunalConfig, projectConfigDir: string): string {
  return config.global.database_path ?? join(projectConfigDir, DATABASE_FILE_NAME)
}

/**
 * Open (creating if needed) and migrate the session database.
 */
export async function openSessionDatabase(path: string): Promise<DatabaseService> {
  const service = createDatabaseService(path)
  await service.initialize()
  return service
}

/**
 * Report a command failure on stderr and return the error exit code.
 */
export function reportError(err: unknown, command: string): number {
  const error = toError(err)
  logger.debug({ err: error, command }, 'Command failed')
  process.stderr.write(`Error: ${error.message}\n`)
  return CLI_EXIT_ERROR
}

/** Parse an `--output-format` value */
export function parseOutputFormat(value: string | undefined): 'table' | 'json' {
  return value === 'json' ? 'json' : 'table'
}

/** Commander argument parser for non-negative integers */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`)
  }
  return parsed
}

/** Commander collector for repeatable options */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}
