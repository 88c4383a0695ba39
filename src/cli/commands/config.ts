/**
 * `tribunal config` command group
 *
 * Subcommands:
 *   - `tribunal config show`              display merged config (credentials masked)
 *   - `tribunal config get <key>`         print one value by dot-notation key
 *   - `tribunal config set <key> <value>` update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError, ConfigIncompatibleFormatError, InvalidConfigError } from '../../core/errors.js'
import { coerceScalar, getByPath } from '../../modules/config/config-system-impl.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { CLI_EXIT_ERROR, CLI_EXIT_SUCCESS, loadConfigSystem } from '../utils/runtime.js'
import type { ConfigLocationOptions } from '../utils/runtime.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = CLI_EXIT_SUCCESS
export const CONFIG_EXIT_ERROR = CLI_EXIT_ERROR
/** The configuration or the requested change failed validation */
export const CONFIG_EXIT_INVALID = 2

export type ConfigFormat = 'yaml' | 'json'

function parseConfigFormat(value: string | undefined): ConfigFormat {
  return value === 'json' ? 'json' : 'yaml'
}

/**
 * Write a load/update failure to stderr; configuration errors map to CONFIG_EXIT_INVALID.
 */
function reportConfigError(err: unknown, action: string): number {
  if (
    err instanceof ConfigError ||
    err instanceof InvalidConfigError ||
    err instanceof ConfigIncompatibleFormatError
  ) {
    process.stderr.write(`  Configuration error: ${err.message}\n`)
    return CONFIG_EXIT_INVALID
  }
  const error = toError(err)
  logger.error({ err: error }, `Failed to ${action} configuration`)
  process.stderr.write(`  Error: ${error.message}\n`)
  return CONFIG_EXIT_ERROR
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigLocationOptions {
  format?: ConfigFormat
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  try {
    const system = await loadConfigSystem(opts)
    const masked = system.getMasked()

    if (opts.format === 'json') {
      process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
    } else {
      process.stdout.write('# Tribunal Configuration (credentials masked)\n\n')
      process.stdout.write(yaml.dump(masked))
    }
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    return reportConfigError(err, 'load')
  }
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigShowOptions = {}): Promise<number> {
  try {
    const system = await loadConfigSystem(opts)
    const value = getByPath(system.getMasked(), key)
    if (value === undefined) {
      process.stderr.write(`  Error: Unknown config key: ${key}\n`)
      return CONFIG_EXIT_ERROR
    }

    if (typeof value === 'object' && value !== null) {
      process.stdout.write(
        opts.format === 'json' ? JSON.stringify(value, null, 2) + '\n' : yaml.dump(value),
      )
    } else {
      process.stdout.write(`${String(value)}\n`)
    }
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    return reportConfigError(err, 'load')
  }
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigLocationOptions = {},
): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const value = coerceScalar(rawValue.trim())

  try {
    const system = await loadConfigSystem(opts)
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    return reportConfigError(err, 'update')
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

interface LocationFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

function locationOptions(flags: LocationFlags): ConfigLocationOptions {
  return {
    ...(flags.projectConfigDir !== undefined && { projectConfigDir: flags.projectConfigDir }),
    ...(flags.globalConfigDir !== undefined && { globalConfigDir: flags.globalConfigDir }),
  }
}

export function registerConfigCommand(program: Command, _version: string): void {
  const configCmd = program
    .command('config')
    .description('Show, read and change configuration')

  // -----------------------------------------------------------------------
  // config show
  // -----------------------------------------------------------------------
  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (opts: LocationFlags & { format: string }) => {
      const exitCode = await runConfigShow({
        ...locationOptions(opts),
        format: parseConfigFormat(opts.format),
      })
      process.exit(exitCode)
    })

  // -----------------------------------------------------------------------
  // config get
  // -----------------------------------------------------------------------
  configCmd
    .command('get <key>')
    .description('Print one configuration value (e.g. consensus.novelty_threshold)')
    .option('--format <format>', 'Output format for sections: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (key: string, opts: LocationFlags & { format: string }) => {
      const exitCode = await runConfigGet(key, {
        ...locationOptions(opts),
        format: parseConfigFormat(opts.format),
      })
      process.exit(exitCode)
    })

  // -----------------------------------------------------------------------
  // config set
  // -----------------------------------------------------------------------
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. consensus.novelty_threshold 0.8)')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (key: string, value: string, opts: LocationFlags) => {
      process.exit(await runConfigSet(key, value, locationOptions(opts)))
    })
}
