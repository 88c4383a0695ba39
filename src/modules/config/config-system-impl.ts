/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.tribunal/config.yaml)
 *     → project config      (./.tribunal/config.yaml)
 *     → environment vars    (TRIBUNAL_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  ConfigError,
  ConfigIncompatibleFormatError,
  InvalidConfigError,
} from '../../core/errors.js'
import { createConsensusConfig } from '../consensus-engine/consensus-config.js'
import type { ConsensusConfig } from '../consensus-engine/types.js'
import {
  TribunalConfigSchema,
  PartialTribunalConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type TribunalConfig,
  type PartialTribunalConfig,
} from './config-schema.js'
import { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

export const CONFIG_DIR_NAME = '.tribunal'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` onto `base`. Plain objects merge key by key; arrays and
 * scalars replace. `undefined` never overrides.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of TRIBUNAL_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  TRIBUNAL_LOG_LEVEL: 'global.log_level',
  TRIBUNAL_DATABASE_PATH: 'global.database_path',
  TRIBUNAL_NOVELTY_THRESHOLD: 'consensus.novelty_threshold',
  TRIBUNAL_MIN_TESTABLE_PREDICTIONS: 'consensus.min_testable_predictions',
  TRIBUNAL_COHERENCE_QUORUM_FRACTION: 'consensus.coherence_quorum_fraction',
  TRIBUNAL_PER_CALL_TIMEOUT_MS: 'critique.per_call_timeout_ms',
  TRIBUNAL_MAX_ITERATIONS: 'pipeline.max_iterations',
  TRIBUNAL_GENERATOR_HOST: 'generator.host',
  TRIBUNAL_GENERATOR_MODEL: 'generator.model',
}

/** Coerce a raw string from the environment or the command line */
export function coerceScalar(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTribunalConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  // Validate the env overrides as partial config
  const parsed = PartialTribunalConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 * Numeric segments index into arrays (e.g. "evaluators.0.model").
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (Array.isArray(cursor)) {
      if (!/^\d+$/.test(part)) return undefined
      const item: unknown = cursor[parseInt(part, 10)]
      cursor = item
    } else if (isPlainObject(cursor)) {
      cursor = cursor[part]
    } else {
      return undefined
    }
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Consensus bridge
// ---------------------------------------------------------------------------

/**
 * Build the immutable ConsensusConfig value handed to decide().
 */
export function toConsensusConfig(config: TribunalConfig): ConsensusConfig {
  return createConsensusConfig({
    noveltyThreshold: config.consensus.novelty_threshold,
    minTestablePredictions: config.consensus.min_testable_predictions,
    coherenceQuorumFraction: config.consensus.coherence_quorum_fraction,
  })
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TribunalConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialTribunalConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigDir(): string {
    return this._projectConfigDir
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply global user config if present
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    // 3. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    // 4. Apply environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. Apply CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = TribunalConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new InvalidConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues },
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): TribunalConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // The key must resolve in the merged config, or be a known optional scalar
    if (existing === undefined && !OPTIONAL_SCALAR_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections are not replaced
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(
        `Cannot set object key "${key}": use a more specific dot-notation path`,
        { key },
      )
    }

    if (key.startsWith('evaluators.')) {
      throw new ConfigError(
        `Cannot set "${key}": edit the evaluators list in ${CONFIG_FILE_NAME} directly`,
        { key },
      )
    }

    const projectConfigPath = join(this._projectConfigDir, CONFIG_FILE_NAME)
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    // Validate the partial update
    const partial = PartialTribunalConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    // Write back and reload
    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')
    logger.info({ key, path: projectConfigPath }, 'Config value updated')

    await this.load()
  }

  getMasked(): TribunalConfig {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialTribunalConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !isVersionSupported(version, SUPPORTED_CONFIG_FORMAT_VERSIONS)) {
        throw new ConfigIncompatibleFormatError(
          formatUnsupportedVersionError(version, SUPPORTED_CONFIG_FORMAT_VERSIONS),
          { filePath, version },
        )
      }
    }

    const result = PartialTribunalConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

/** Optional keys that `set` may create even though the merged config omits them */
const OPTIONAL_SCALAR_KEYS = new Set(['global.database_path', 'generator.api_key_env'])

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
