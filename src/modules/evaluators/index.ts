/**
 * evaluators module: language-model backed evaluators
 */

export type { GenerateRequest, TextGenerator } from './text-generator.js'
export type { OllamaGeneratorOptions } from './ollama-generator.js'
export { OllamaGenerator, createOllamaGenerator, DEFAULT_REQUEST_TIMEOUT_MS } from './ollama-generator.js'
export type { PromptedEvaluatorOptions, Verdict } from './prompted-evaluator.js'
export { PromptedEvaluator, VerdictSchema, VERDICT_ANCHOR_KEYS } from './prompted-evaluator.js'
export { buildEvaluationPrompt, ROLE_BRIEFS } from './prompts.js'
export { buildEvaluatorPool, createTextGenerator } from './evaluator-factory.js'
