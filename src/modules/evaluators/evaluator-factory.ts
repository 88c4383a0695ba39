/**
 * Builds generators and evaluator pools from validated configuration.
 */

import type { EvaluatorSettings, GeneratorSettings } from '../config/config-schema.js'
import { createEvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import type { EvaluatorPool } from '../evaluator-pool/evaluator-pool.js'
import { createOllamaGenerator } from './ollama-generator.js'
import { PromptedEvaluator } from './prompted-evaluator.js'
import type { TextGenerator } from './text-generator.js'

/**
 * Create the Ollama-backed generator described by the `generator` section.
 * The bearer token, if any, is read from the variable named by `api_key_env`.
 */
export function createTextGenerator(
  settings: GeneratorSettings,
  env: NodeJS.ProcessEnv = process.env,
): TextGenerator {
  const apiKey = settings.api_key_env !== undefined ? env[settings.api_key_env] : undefined
  return createOllamaGenerator({
    host: settings.host,
    requestTimeoutMs: settings.request_timeout_ms,
    ...(apiKey !== undefined && apiKey !== '' ? { apiKey } : {}),
  })
}

/**
 * Build a pool of prompted evaluators from the `evaluators` section.
 * Disabled entries are skipped; order follows the config list.
 */
export function buildEvaluatorPool(
  settings: readonly EvaluatorSettings[],
  generator: TextGenerator,
  defaultModel: string,
): EvaluatorPool {
  return createEvaluatorPool(
    settings
      .filter((entry) => entry.enabled)
      .map(
        (entry) =>
          new PromptedEvaluator({
            id: entry.id,
            role: entry.role,
            model: entry.model ?? defaultModel,
            temperature: entry.temperature,
            generator,
          }),
      ),
  )
}
