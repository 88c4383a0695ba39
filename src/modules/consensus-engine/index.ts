/**
 * consensus-engine module: aggregation of judgments into decisions
 *
 * Public API re-exports for the consensus-engine module.
 */

// Types
export type {
  Outcome,
  ConsensusConfig,
  CoherenceAgreement,
  DecisionMetrics,
  Decision,
} from './types.js'
export { OUTCOMES } from './types.js'

// Configuration
export {
  COHERENCE_AGREEMENT_CUTOFF,
  ConsensusConfigSchema,
  DEFAULT_CONSENSUS_CONFIG,
  createConsensusConfig,
  validateConsensusConfig,
} from './consensus-config.js'

// Engine
export {
  decide,
  computeAverageNovelty,
  computeCoherenceAgreement,
  countTestablePredictions,
  formatMetric,
} from './consensus-engine.js'
