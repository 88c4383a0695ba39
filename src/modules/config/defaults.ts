/**
 * Built-in default values for the Tribunal configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  TribunalConfig,
  GlobalSettings,
  ConsensusSettings,
  CritiqueSettings,
  PipelineSettings,
  GeneratorSettings,
  EvaluatorSettings,
} from './config-schema.js'

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export const DEFAULT_PRIMARY_MODEL = 'qwen2.5:72b-instruct-q4_K_M'
export const DEFAULT_CRITIC_MODEL = 'deepseek-r1:70b'
export const DEFAULT_CREATIVE_MODEL = 'mixtral:8x22b'

// ---------------------------------------------------------------------------
// Section defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
}

export const DEFAULT_CONSENSUS_SETTINGS: ConsensusSettings = {
  novelty_threshold: 0.7,
  min_testable_predictions: 2,
  coherence_quorum_fraction: 0.75,
}

export const DEFAULT_CRITIQUE_SETTINGS: CritiqueSettings = {
  per_call_timeout_ms: 120_000,
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  max_iterations: 10,
  revision_temperature_decay: 0.9,
}

export const DEFAULT_GENERATOR_SETTINGS: GeneratorSettings = {
  host: 'http://localhost:11434',
  model: DEFAULT_PRIMARY_MODEL,
  temperature: 0.7,
  request_timeout_ms: 300_000,
}

// ---------------------------------------------------------------------------
// Default evaluator roster
// ---------------------------------------------------------------------------

// Lower temperatures for analytical roles, higher for edge-case invention.
export const DEFAULT_EVALUATORS: EvaluatorSettings[] = [
  { id: 'logic', role: 'logic-checker', model: DEFAULT_PRIMARY_MODEL, temperature: 0.3, enabled: true },
  { id: 'contradiction', role: 'contradiction-finder', model: DEFAULT_CRITIC_MODEL, temperature: 0.4, enabled: true },
  { id: 'novelty', role: 'novelty-assessor', model: DEFAULT_PRIMARY_MODEL, temperature: 0.5, enabled: true },
  { id: 'edge-case', role: 'edge-case-generator', model: DEFAULT_CREATIVE_MODEL, temperature: 0.8, enabled: true },
]

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: TribunalConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  consensus: DEFAULT_CONSENSUS_SETTINGS,
  critique: DEFAULT_CRITIQUE_SETTINGS,
  pipeline: DEFAULT_PIPELINE_SETTINGS,
  generator: DEFAULT_GENERATOR_SETTINGS,
  evaluators: DEFAULT_EVALUATORS,
}
