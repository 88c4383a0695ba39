/**
 * Zod validation schemas for the Tribunal configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - consensus thresholds
 *  - critique collection
 *  - revision pipeline
 *  - text generator (Ollama)
 *  - evaluator roster
 *  - full config document
 */

import { z } from 'zod'
import { EvaluatorRoleEnum } from '../judgment/types.js'
import { MAX_TIMER_DELAY_MS } from '../../utils/helpers.js'

/** Milliseconds a timer can wait for */
const TimeoutMsSchema = z.number().int().positive().max(MAX_TIMER_DELAY_MS)

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** SQLite file holding session history (default: <project>/.tribunal/tribunal.db) */
    database_path: z.string().min(1).optional(),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Consensus thresholds
// ---------------------------------------------------------------------------

const UnitIntervalSchema = z.number().finite().min(0).max(1)

export const ConsensusSettingsSchema = z
  .object({
    novelty_threshold: UnitIntervalSchema,
    min_testable_predictions: z.number().int().min(0),
    coherence_quorum_fraction: UnitIntervalSchema,
  })
  .strict()

export type ConsensusSettings = z.infer<typeof ConsensusSettingsSchema>

// ---------------------------------------------------------------------------
// Critique collection and revision pipeline
// ---------------------------------------------------------------------------

export const CritiqueSettingsSchema = z
  .object({
    per_call_timeout_ms: TimeoutMsSchema,
  })
  .strict()

export type CritiqueSettings = z.infer<typeof CritiqueSettingsSchema>

export const PipelineSettingsSchema = z
  .object({
    /** Revision cycles allowed after the initial statement */
    max_iterations: z.number().int().min(0).max(100),
    /** Multiplier applied to the generation temperature on each revision */
    revision_temperature_decay: z.number().gt(0).max(1),
  })
  .strict()

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>

// ---------------------------------------------------------------------------
// Text generator
// ---------------------------------------------------------------------------

const TemperatureSchema = z.number().finite().min(0).max(2)

export const GeneratorSettingsSchema = z
  .object({
    host: z.string().refine(isHttpUrl, { message: 'Expected an http:// or https:// URL' }),
    model: z.string().min(1),
    temperature: TemperatureSchema,
    request_timeout_ms: TimeoutMsSchema,
    /** Name of the environment variable holding a bearer token for a proxied host */
    api_key_env: z.string().min(1).optional(),
  })
  .strict()

export type GeneratorSettings = z.infer<typeof GeneratorSettingsSchema>

// ---------------------------------------------------------------------------
// Evaluators
// ---------------------------------------------------------------------------

export const EvaluatorSettingsSchema = z
  .object({
    id: z.string().min(1),
    role: EvaluatorRoleEnum,
    /** Falls back to generator.model */
    model: z.string().min(1).optional(),
    temperature: TemperatureSchema,
    enabled: z.boolean(),
  })
  .strict()

export type EvaluatorSettings = z.infer<typeof EvaluatorSettingsSchema>

const EvaluatorListSchema = z.array(EvaluatorSettingsSchema).superRefine((list, ctx) => {
  const seen = new Set<string>()
  list.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `duplicate evaluator id "${entry.id}"`,
      })
    }
    seen.add(entry.id)
  })
})

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this tool can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const TribunalConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    consensus: ConsensusSettingsSchema,
    critique: CritiqueSettingsSchema,
    pipeline: PipelineSettingsSchema,
    generator: GeneratorSettingsSchema,
    evaluators: EvaluatorListSchema,
  })
  .strict()

export type TribunalConfig = z.infer<typeof TribunalConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer of the hierarchy before merging)
// ---------------------------------------------------------------------------

export const PartialTribunalConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    consensus: ConsensusSettingsSchema.partial().optional(),
    critique: CritiqueSettingsSchema.partial().optional(),
    pipeline: PipelineSettingsSchema.partial().optional(),
    generator: GeneratorSettingsSchema.partial().optional(),
    /** Replaces the whole roster; arrays are not merged */
    evaluators: EvaluatorListSchema.optional(),
  })
  .strict()

export type PartialTribunalConfig = z.infer<typeof PartialTribunalConfigSchema>
