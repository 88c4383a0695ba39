/**
 * PromptedStatementSource: asks a TextGenerator for a position and reads it
 * from the trailing `position:` YAML block.
 */

import { z } from 'zod'
import { GenerationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { extractYamlBlock, parseYamlResult } from '../../utils/yaml-parser.js'
import type { CandidateStatement } from '../evaluator-pool/types.js'
import type { TextGenerator } from '../evaluators/text-generator.js'
import { buildGenerationPrompt } from './prompts.js'
import type { StatementRequest, StatementSource } from './statement-source.js'

const logger = createLogger('statement-source')

export const POSITION_ANCHOR_KEYS: readonly string[] = ['position:']

export const PositionSchema = z.object({
  position: z.object({
    statement: z.string().trim().min(1),
    testable_predictions: z.array(z.string()).nullish(),
    assumptions: z.array(z.string()).nullish(),
  }),
})

export interface PromptedStatementSourceOptions {
  generator: TextGenerator
  model: string
}

export class PromptedStatementSource implements StatementSource {
  private readonly _generator: TextGenerator
  private readonly _model: string

  constructor(options: PromptedStatementSourceOptions) {
    this._generator = options.generator
    this._model = options.model
  }

  async generate(request: StatementRequest): Promise<CandidateStatement> {
    const output = await this._generator.generate({
      model: this._model,
      prompt: buildGenerationPrompt(request),
      temperature: request.temperature,
      ...(request.signal !== undefined ? { signal: request.signal } : {}),
    })

    const block = extractYamlBlock(output, POSITION_ANCHOR_KEYS)
    if (block === null) {
      throw new GenerationError('No position block found in model output', {
        model: this._model,
        outputChars: output.length,
      })
    }

    const { parsed, error } = parseYamlResult(block, PositionSchema)
    if (parsed === null) {
      throw new GenerationError(error ?? 'Invalid position block', { model: this._model })
    }

    const { statement, testable_predictions, assumptions } = parsed.position
    logger.debug(
      { model: this._model, revision: request.revision !== undefined, predictions: testable_predictions?.length ?? 0 },
      'Statement generated',
    )

    return {
      text: statement,
      metadata: {
        problem: request.problem,
        testablePredictions: testable_predictions ?? [],
        assumptions: assumptions ?? [],
      },
    }
  }
}
