/**
 * critique-collector module: concurrent, failure-tolerant judgment collection
 */

export type {
  EvaluatorFailure,
  CritiqueCollection,
  CollectOptions,
  CritiqueCollectorOptions,
} from './types.js'

export type { CritiqueCollector } from './critique-collector.js'
export {
  CritiqueCollectorImpl,
  createCritiqueCollector,
  collectCritiques,
  DEFAULT_PER_CALL_TIMEOUT_MS,
} from './critique-collector-impl.js'
