/**
 * `tribunal decide` command
 *
 * Applies the consensus rule to a file of judgments without calling any
 * model. The file is YAML or JSON: either a list of judgments or an object
 * with `judgments` and an optional `testablePredictions` count.
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import yaml from 'js-yaml'
import { z } from 'zod'
import { InvalidInputError } from '../../core/errors.js'
import { toConsensusConfig } from '../../modules/config/config-system-impl.js'
import { decide } from '../../modules/consensus-engine/consensus-engine.js'
import { createJudgment, judgmentToJSON } from '../../modules/judgment/judgment.js'
import { JudgmentInputSchema } from '../../modules/judgment/types.js'
import type { JudgmentInput } from '../../modules/judgment/types.js'
import { buildJsonOutput, formatDecision, formatJudgmentTable } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import {
  CLI_EXIT_SUCCESS,
  loadConfigSystem,
  parseNonNegativeInt,
  parseOutputFormat,
  reportError,
} from '../utils/runtime.js'
import type { ConfigLocationOptions } from '../utils/runtime.js'

// Scores are range-checked by createJudgment so that bad values surface as
// InvalidJudgmentError rather than as a malformed file.
const JudgmentListSchema = z.array(
  JudgmentInputSchema.extend({
    noveltyScore: z.number().optional(),
    coherenceScore: z.number().optional(),
  }),
)

const DecideDocumentSchema = z.object({
  judgments: JudgmentListSchema,
  testablePredictions: z.number().int().min(0).optional(),
})

export interface DecideOptions extends ConfigLocationOptions {
  judgmentsFile: string
  /** Overrides the count given in the file */
  predictions?: number
  outputFormat?: OutputFormat
  version: string
}

/**
 * Parse the judgments file into raw judgment inputs and the prediction count it names.
 */
export function parseJudgmentsDocument(text: string): { inputs: JudgmentInput[]; predictions?: number } {
  const raw: unknown = yaml.load(text)
  const parsed = Array.isArray(raw)
    ? JudgmentListSchema.transform((judgments) => ({ judgments, testablePredictions: undefined })).safeParse(raw)
    : DecideDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidInputError(`Invalid judgments file: ${detail}`, { issues: parsed.error.issues })
  }
  const { judgments, testablePredictions } = parsed.data
  return {
    inputs: judgments,
    ...(testablePredictions !== undefined ? { predictions: testablePredictions } : {}),
  }
}

export async function runDecide(opts: DecideOptions): Promise<number> {
  try {
    const system = await loadConfigSystem(opts)
    const { inputs, predictions: filePredictions } = parseJudgmentsDocument(
      await readFile(opts.judgmentsFile, 'utf-8'),
    )

    const predictions = opts.predictions ?? filePredictions
    if (predictions === undefined) {
      throw new InvalidInputError(
        'Testable prediction count is required: pass --predictions or set testablePredictions in the file',
      )
    }

    const judgments = inputs.map(createJudgment)
    const decision = decide(judgments, predictions, toConsensusConfig(system.getConfig()))

    if (parseOutputFormat(opts.outputFormat) === 'json') {
      const data = { decision, judgments: judgments.map(judgmentToJSON) }
      process.stdout.write(JSON.stringify(buildJsonOutput('tribunal decide', data, opts.version), null, 2) + '\n')
    } else {
      process.stdout.write(formatJudgmentTable(judgments.map(judgmentToJSON)) + '\n\n')
      process.stdout.write(formatDecision(decision) + '\n')
    }
    return CLI_EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'decide')
  }
}

export function registerDecideCommand(program: Command, version: string): void {
  program
    .command('decide')
    .description('Decide ACCEPT, REJECT or REVISE for a file of judgments')
    .requiredOption('--judgments <file>', 'YAML or JSON file of judgments')
    .option('--predictions <n>', 'Number of testable predictions made by the statement', parseNonNegativeInt)
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .tribunal/ directory')
    .option('--global-config-dir <dir>', 'Path to global .tribunal/ directory')
    .action(
      async (opts: {
        judgments: string
        predictions?: number
        outputFormat: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        const exitCode = await runDecide({
          judgmentsFile: opts.judgments,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          ...(opts.predictions !== undefined && { predictions: opts.predictions }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}
