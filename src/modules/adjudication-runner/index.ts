/**
 * adjudication-runner module: generate, critique, decide, revise
 */

export type { AdjudicationRunnerOptions, RunRequest, SessionStore } from './types.js'
export {
  AdjudicationRunner,
  createAdjudicationRunner,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_GENERATION_TEMPERATURE,
  DEFAULT_TEMPERATURE_DECAY,
} from './adjudication-runner.js'
export { summarizeCritiques, DEFAULT_ISSUES_PER_EVALUATOR } from './summarize-critiques.js'
