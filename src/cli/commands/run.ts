/**
 * `tribunal run` command
 *
 * Generates a position for a problem, puts it before the configured evaluator
 * pool and revises it until the panel accepts or rejects it, or the iteration
 * limit is reached. Every decided round is saved to the session database.
 */

import type { Command } from 'commander'
import { createEventBus } from '../../core/event-bus.js'
import { toConsensusConfig } from '../../modules/config/config-system-impl.js'
import type { PartialTribunalConfig, TribunalConfig } from '../../modules/config/config-schema.js'
import { createAdjudicationRunner } from '../../modules/adjudication-runner/adjudication-runner.js'
import type { RunRequest } from '../../modules/adjudication-runner/types.js'
import { createCritiqueCollector } from '../../modules/critique-collector/critique-collector-impl.js'
import { buildEvaluatorPool, createTextGenerator } from '../../modules/evaluators/evaluator-factory.js'
import type { TextGenerator } from '../../modules/evaluators/text-generator.js'
import type { Session } from '../../modules/session/session.js'
import { PromptedStatementSource } from '../../modules/statement-source/prompted-statement-source.js'
import type { StatementSource } from '../../modules/statement-source/statement-source.js'
import { createSqliteSessionStore } from '../../persistence/session-store.js'
import { createLogger } from '../../utils/logger.js'
import { buildJsonOutput, formatSessionDetail } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import {
  CLI_EXIT_NOT_ACCEPTED,
  CLI_EXIT_SUCCESS,
  collectValues,
  loadConfigSystem,
  openSessionDatabase,
  parseNonNegativeInt,
  parseOutputFormat,
  reportError,
  resolveDatabasePath,
} from '../utils/runtime.js'
import type { ConfigLocationOptions } from '../utils/runtime.js'

const logger = createLogger('run-cmd')

export interface RunOptions extends ConfigLocationOptions {
  problem: string
  constraints?: string[]
  existingSolutions?: string[]
  /** Overrides pipeline.max_iterations */
  maxIterations?: number
  outputFormat?: OutputFormat
  version: string
  /** Replaces the configured Ollama generator */
  generator?: TextGenerator
}

// ---------------------------------------------------------------------------
// Shared adjudication plumbing
// ---------------------------------------------------------------------------

export interface AdjudicateOptions extends ConfigLocationOptions {
  command: string
  version: string
  outputFormat?: OutputFormat
  generator?: TextGenerator
  cliOverrides?: PartialTribunalConfig
  /** Builds the statement source; defaults to a prompted source on generator.model */
  createSource?: (generator: TextGenerator, config: TribunalConfig) => StatementSource
}

/**
 * Load config, wire the runner to the session database and run one request.
 * Exit code is 0 when the panel accepted the final statement, 2 when it did not.
 */
export async function adjudicate(request: RunRequest, opts: AdjudicateOptions): Promise<number> {
  const system = await loadConfigSystem(opts, opts.cliOverrides)
  const config = system.getConfig()
  const generator = opts.generator ?? createTextGenerator(config.generator, opts.env)
  const source =
    opts.createSource?.(generator, config) ??
    new PromptedStatementSource({ generator, model: config.generator.model })

  const database = await openSessionDatabase(resolveDatabasePath(config, system.projectConfigDir))
  try {
    const eventBus = createEventBus()
    eventBus.on('critique:evaluator-failed', ({ evaluatorId, kind, message }) => {
      process.stderr.write(`  evaluator ${evaluatorId} failed (${kind}): ${message}\n`)
    })
    eventBus.on('session:decided', ({ sessionId, iteration, outcome }) => {
      logger.debug({ sessionId, iteration, outcome }, 'Round decided')
      if (parseOutputFormat(opts.outputFormat) === 'table') {
        process.stderr.write(`  round ${String(iteration)}: ${outcome}\n`)
      }
    })

    const runner = createAdjudicationRunner({
      source,
      pool: buildEvaluatorPool(config.evaluators, generator, config.generator.model),
      collector: createCritiqueCollector({
        perCallTimeoutMs: config.critique.per_call_timeout_ms,
        eventBus,
      }),
      consensusConfig: toConsensusConfig(config),
      maxIterations: config.pipeline.max_iterations,
      temperature: config.generator.temperature,
      temperatureDecay: config.pipeline.revision_temperature_decay,
      store: createSqliteSessionStore(database.db),
      eventBus,
    })

    const session = await runner.run(request)
    writeSessionResult(session, opts)
    return session.decision?.outcome === 'ACCEPT' ? CLI_EXIT_SUCCESS : CLI_EXIT_NOT_ACCEPTED
  } finally {
    await database.shutdown()
  }
}

function writeSessionResult(session: Session, opts: AdjudicateOptions): void {
  if (parseOutputFormat(opts.outputFormat) === 'json') {
    const output = buildJsonOutput(opts.command, session.toSnapshot(), opts.version)
    process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    return
  }
  process.stdout.write(formatSessionDetail(session.toSnapshot()) + '\n')
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

export async function runRun(opts: RunOptions): Promise<number> {
  try {
    return await adjudicate(
      {
        problem: opts.problem,
        ...(opts.constraints !== undefined && { constraints: opts.constraints }),
        ...(opts.existingSolutions !== undefined && { existingSolutions: opts.existingSolutions }),
      },
      {
        command: 'tribunal run',
        version: opts.version,
        ...(opts.outputFormat !== undefined && { outputFormat: opts.outputFormat }),
        ...(opts.generator !== undefined && { generator: opts.generator }),
        ...(opts.maxIterations !== undefined && {
          cliOverrides: { pipeline: { max_iterations: opts.maxIterations } },
        }),
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        ...(opts.env !== undefined && { env: opts.env }),
      },
    )
  } catch (err) {
    return reportError(err, 'run')
  }
}

export function registerRunCommand(program: Command, version: string): void {
  program
    .command('run')
    .description('Generate a position for a problem and revise it until the panel decides')
    .requiredOption('--problem <text>', 'Problem the position must answer')
    .option('--constraint <text>', 'Extra constraint for the generator (repeatable)', collectValues)
    .option('--existing <text>', 'Existing position to differ from (repeatable)', collectValues)
    .option('--max-iterations <n>', 'Revision cycles allowed after the first statement', parseNonNegativeInt)
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(
      async (opts: {
        problem: string
        constraint?: string[]
        existing?: string[]
        maxIterations?: number
        outputFormat: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        const exitCode = await runRun({
          problem: opts.problem,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          ...(opts.constraint !== undefined && { constraints: opts.constraint }),
          ...(opts.existing !== undefined && { existingSolutions: opts.existing }),
          ...(opts.maxIterations !== undefined && { maxIterations: opts.maxIterations }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}
