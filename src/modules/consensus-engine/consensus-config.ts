/**
 * Consensus configuration: validated, immutable thresholds passed by value
 * into decide(). There is no process-wide threshold state.
 */

import { z } from 'zod'
import { InvalidConfigError } from '../../core/errors.js'
import type { ConsensusConfig } from './types.js'

/** Coherence score at or above which an evaluator counts as agreeing */
export const COHERENCE_AGREEMENT_CUTOFF = 0.7

export const ConsensusConfigSchema = z
  .object({
    noveltyThreshold: z.number().finite().min(0).max(1),
    minTestablePredictions: z.number().int().min(0),
    coherenceQuorumFraction: z.number().finite().min(0).max(1),
  })
  .strict()

export const DEFAULT_CONSENSUS_CONFIG: ConsensusConfig = Object.freeze({
  noveltyThreshold: 0.7,
  minTestablePredictions: 2,
  coherenceQuorumFraction: 0.75,
})

/** Configs already validated by this module */
const validated = new WeakSet<ConsensusConfig>([DEFAULT_CONSENSUS_CONFIG])

/**
 * Merge overrides onto the defaults, validate and freeze.
 *
 * @throws {InvalidConfigError} if any threshold is out of range
 */
export function createConsensusConfig(overrides: Partial<ConsensusConfig> = {}): ConsensusConfig {
  return validateConsensusConfig({ ...DEFAULT_CONSENSUS_CONFIG, ...overrides })
}

/**
 * Validate a consensus config, returning a frozen copy.
 *
 * @throws {InvalidConfigError} if any threshold is out of range
 */
export function validateConsensusConfig(config: ConsensusConfig): ConsensusConfig {
  if (validated.has(config)) return config

  const result = ConsensusConfigSchema.safeParse(config)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new InvalidConfigError(`Invalid consensus configuration: ${issues}`, {
      issues: result.error.issues,
    })
  }

  const frozen: ConsensusConfig = Object.freeze({ ...result.data })
  validated.add(frozen)
  return frozen
}
