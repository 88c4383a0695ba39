/**
 * PromptedEvaluator: an Evaluator that asks a language model for a verdict
 * and turns the trailing `verdict:` YAML block into a Judgment.
 *
 * Output that carries no verdict block, fails the schema, or holds scores
 * outside [0, 1] is reported as a malformed evaluation of this evaluator.
 */

import { z } from 'zod'
import { EvaluatorFailureError, InvalidJudgmentError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { extractYamlBlock, parseYamlResult } from '../../utils/yaml-parser.js'
import { createJudgment } from '../judgment/judgment.js'
import type { EvaluatorRole, Judgment } from '../judgment/types.js'
import type { CandidateStatement, EvaluationContext, Evaluator } from '../evaluator-pool/types.js'
import { buildEvaluationPrompt } from './prompts.js'
import type { TextGenerator } from './text-generator.js'

const logger = createLogger('evaluators')

export const VERDICT_ANCHOR_KEYS: readonly string[] = ['verdict:']

export const VerdictSchema = z.object({
  verdict: z
    .object({
      logically_consistent: z.boolean(),
      novelty: z.number().nullish(),
      coherence: z.number().nullish(),
      issues: z.array(z.string()).nullish(),
      reasoning: z.string().nullish(),
    })
    .passthrough(),
})

export type Verdict = z.infer<typeof VerdictSchema>['verdict']

export interface PromptedEvaluatorOptions {
  id: string
  role: EvaluatorRole
  model: string
  temperature: number
  generator: TextGenerator
}

export class PromptedEvaluator implements Evaluator {
  readonly id: string
  readonly role: EvaluatorRole
  readonly model: string
  readonly temperature: number
  private readonly _generator: TextGenerator

  constructor(options: PromptedEvaluatorOptions) {
    this.id = options.id
    this.role = options.role
    this.model = options.model
    this.temperature = options.temperature
    this._generator = options.generator
  }

  async evaluate(statement: CandidateStatement, context: EvaluationContext): Promise<Judgment> {
    const output = await this._generator.generate({
      model: this.model,
      prompt: buildEvaluationPrompt(this.role, statement),
      temperature: this.temperature,
      signal: context.signal,
    })

    const block = extractYamlBlock(output, VERDICT_ANCHOR_KEYS)
    if (block === null) {
      throw new EvaluatorFailureError(this.id, 'malformed', 'No verdict block found in model output', {
        model: this.model,
        outputChars: output.length,
      })
    }

    const { parsed, error } = parseYamlResult(block, VerdictSchema)
    if (parsed === null) {
      throw new EvaluatorFailureError(this.id, 'malformed', error ?? 'Invalid verdict block', {
        model: this.model,
      })
    }

    const judgment = this._toJudgment(parsed.verdict)
    logger.debug(
      { evaluatorId: this.id, consistent: judgment.isLogicallyConsistent, issues: judgment.identifiedIssues.length },
      'Verdict parsed',
    )
    return judgment
  }

  private _toJudgment(verdict: Verdict): Judgment {
    try {
      return createJudgment({
        evaluatorId: this.id,
        role: this.role,
        isLogicallyConsistent: verdict.logically_consistent,
        ...(verdict.novelty != null ? { noveltyScore: verdict.novelty } : {}),
        ...(verdict.coherence != null ? { coherenceScore: verdict.coherence } : {}),
        identifiedIssues: verdict.issues ?? [],
        reasoning: verdict.reasoning ?? '',
      })
    } catch (err) {
      if (err instanceof InvalidJudgmentError) {
        throw new EvaluatorFailureError(this.id, 'malformed', err.message, { model: this.model })
      }
      throw err
    }
  }
}
