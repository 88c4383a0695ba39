/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  ENV_VAR_MAP,
  coerceScalar,
  deepMerge,
  getByPath,
  setByPath,
  toConsensusConfig,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  TribunalConfigSchema,
  PartialTribunalConfigSchema,
  EvaluatorSettingsSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  TribunalConfig,
  PartialTribunalConfig,
  GlobalSettings,
  ConsensusSettings,
  CritiqueSettings,
  PipelineSettings,
  GeneratorSettings,
  EvaluatorSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_EVALUATORS } from './defaults.js'
export { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
