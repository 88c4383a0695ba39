/**
 * `tribunal sessions` command group
 *
 * Subcommands:
 *   - `tribunal sessions list`        list saved sessions, newest first
 *   - `tribunal sessions show <id>`   every round of one session
 *   - `tribunal sessions delete <id>` remove a session from history
 */

import type { Command } from 'commander'
import { SessionNotFoundError } from '../../core/errors.js'
import type { Outcome } from '../../modules/consensus-engine/types.js'
import type { DatabaseService } from '../../persistence/database.js'
import { deleteSession, getSession, listSessions } from '../../persistence/queries/sessions.js'
import { OutcomeEnum } from '../../persistence/schemas/sessions.js'
import { buildJsonOutput, formatSessionDetail, formatSessionList } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import {
  CLI_EXIT_ERROR,
  CLI_EXIT_SUCCESS,
  loadConfigSystem,
  openSessionDatabase,
  parseNonNegativeInt,
  parseOutputFormat,
  reportError,
  resolveDatabasePath,
} from '../utils/runtime.js'
import type { ConfigLocationOptions } from '../utils/runtime.js'

export interface SessionsCommandOptions extends ConfigLocationOptions {
  outputFormat?: OutputFormat
  version: string
}

export interface SessionsListOptions extends SessionsCommandOptions {
  limit?: number
  /** Raw --outcome value; validated against ACCEPT, REJECT and REVISE */
  outcome?: string
}

async function withSessionDatabase<T>(
  opts: ConfigLocationOptions,
  fn: (service: DatabaseService) => T,
): Promise<T> {
  const system = await loadConfigSystem(opts)
  const service = await openSessionDatabase(resolveDatabasePath(system.getConfig(), system.projectConfigDir))
  try {
    return fn(service)
  } finally {
    await service.shutdown()
  }
}

function writeJson(command: string, data: unknown, version: string): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version), null, 2) + '\n')
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export async function runSessionsList(opts: SessionsListOptions): Promise<number> {
  try {
    let outcome: Outcome | undefined
    if (opts.outcome !== undefined) {
      const parsed = OutcomeEnum.safeParse(opts.outcome.toUpperCase())
      if (!parsed.success) {
        process.stderr.write(`Error: Unknown outcome "${opts.outcome}": expected ACCEPT, REJECT or REVISE\n`)
        return CLI_EXIT_ERROR
      }
      outcome = parsed.data
    }

    const sessions = await withSessionDatabase(opts, ({ db }) =>
      listSessions(db, {
        ...(opts.limit !== undefined && { limit: opts.limit }),
        ...(outcome !== undefined && { outcome }),
      }),
    )

    if (parseOutputFormat(opts.outputFormat) === 'json') {
      writeJson('tribunal sessions list', sessions, opts.version)
    } else {
      process.stdout.write(formatSessionList(sessions) + '\n')
    }
    return CLI_EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'sessions list')
  }
}

// ---------------------------------------------------------------------------
// show
// ---------------------------------------------------------------------------

export async function runSessionsShow(sessionId: string, opts: SessionsCommandOptions): Promise<number> {
  try {
    const snapshot = await withSessionDatabase(opts, ({ db }) => getSession(db, sessionId))
    if (snapshot === undefined) {
      throw new SessionNotFoundError(sessionId)
    }

    if (parseOutputFormat(opts.outputFormat) === 'json') {
      writeJson('tribunal sessions show', snapshot, opts.version)
    } else {
      process.stdout.write(formatSessionDetail(snapshot) + '\n')
    }
    return CLI_EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'sessions show')
  }
}

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

export async function runSessionsDelete(sessionId: string, opts: ConfigLocationOptions): Promise<number> {
  try {
    const deleted = await withSessionDatabase(opts, ({ db }) => deleteSession(db, sessionId))
    if (!deleted) {
      throw new SessionNotFoundError(sessionId)
    }
    process.stdout.write(`Deleted session ${sessionId}\n`)
    return CLI_EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'sessions delete')
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

export function registerSessionsCommand(program: Command, version: string): void {
  const sessionsCmd = program.command('sessions').description('Inspect saved adjudication sessions')

  sessionsCmd
    .command('list')
    .description('List saved sessions, most recently updated first')
    .option('--limit <n>', 'Maximum number of sessions to list', parseNonNegativeInt)
    .option('--outcome <outcome>', 'Only sessions whose final outcome is ACCEPT, REJECT or REVISE')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (opts: LocationFlags & { limit?: number; outcome?: string; outputFormat: string }) => {
      const exitCode = await runSessionsList({
        ...locationOptions(opts),
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        ...(opts.limit !== undefined && { limit: opts.limit }),
        ...(opts.outcome !== undefined && { outcome: opts.outcome }),
      })
      process.exit(exitCode)
    })

  sessionsCmd
    .command('show <id>')
    .description('Show every round of a session')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (id: string, opts: LocationFlags & { outputFormat: string }) => {
      const exitCode = await runSessionsShow(id, {
        ...locationOptions(opts),
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
      process.exit(exitCode)
    })

  sessionsCmd
    .command('delete <id>')
    .description('Delete a session from history')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(async (id: string, opts: LocationFlags) => {
      process.exit(await runSessionsDelete(id, locationOptions(opts)))
    })
}
