/**
 * `tribunal judge` command
 *
 * Puts a single, already-written statement before the evaluator pool once.
 * No revision is attempted; the session is saved like any other run.
 */

import type { Command } from 'commander'
import type { StatementMetadata } from '../../modules/evaluator-pool/types.js'
import type { TextGenerator } from '../../modules/evaluators/text-generator.js'
import { FixedStatementSource } from '../../modules/statement-source/fixed-statement-source.js'
import type { OutputFormat } from '../utils/formatting.js'
import { collectValues, parseOutputFormat, reportError } from '../utils/runtime.js'
import type { ConfigLocationOptions } from '../utils/runtime.js'
import { adjudicate } from './run.js'

export interface JudgeOptions extends ConfigLocationOptions {
  statement: string
  problem?: string
  predictions?: string[]
  assumptions?: string[]
  outputFormat?: OutputFormat
  version: string
  generator?: TextGenerator
}

export async function runJudge(opts: JudgeOptions): Promise<number> {
  try {
    const metadata: StatementMetadata = {
      ...(opts.problem !== undefined && { problem: opts.problem }),
      testablePredictions: opts.predictions ?? [],
      ...(opts.assumptions !== undefined && { assumptions: opts.assumptions }),
    }
    const source = new FixedStatementSource({ text: opts.statement, metadata })

    return await adjudicate(
      { problem: opts.problem ?? opts.statement },
      {
        command: 'tribunal judge',
        version: opts.version,
        cliOverrides: { pipeline: { max_iterations: 0 } },
        createSource: () => source,
        ...(opts.outputFormat !== undefined && { outputFormat: opts.outputFormat }),
        ...(opts.generator !== undefined && { generator: opts.generator }),
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        ...(opts.env !== undefined && { env: opts.env }),
      },
    )
  } catch (err) {
    return reportError(err, 'judge')
  }
}

export function registerJudgeCommand(program: Command, version: string): void {
  program
    .command('judge')
    .description('Evaluate one statement once, without revision')
    .requiredOption('--statement <text>', 'Statement to evaluate')
    .option('--problem <text>', 'Problem the statement answers')
    .option('--prediction <text>', 'Testable prediction made by the statement (repeatable)', collectValues)
    .option('--assumption <text>', 'Assumption the statement rests on (repeatable)', collectValues)
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(
      async (opts: {
        statement: string
        problem?: string
        prediction?: string[]
        assumption?: string[]
        outputFormat: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        const exitCode = await runJudge({
          statement: opts.statement,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          ...(opts.problem !== undefined && { problem: opts.problem }),
          ...(opts.prediction !== undefined && { predictions: opts.prediction }),
          ...(opts.assumption !== undefined && { assumptions: opts.assumption }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}
