/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { TribunalConfig, PartialTribunalConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .tribunal/ directory (default: <cwd>/.tribunal) */
  projectConfigDir?: string
  /** Path to the global user-level .tribunal/ directory (default: ~/.tribunal) */
  globalConfigDir?: string
  /**
   * Highest-priority values, typically populated from CLI flags.
   */
  cliOverrides?: PartialTribunalConfig
  /** Environment to read TRIBUNAL_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Tribunal configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   * @throws {InvalidConfigError} if the merged document fails validation
   * @throws {ConfigError} if a config file cannot be read or parsed
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): TribunalConfig

  /**
   * Return a single value by dot-notation key (e.g. "consensus.novelty_threshold").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown, addresses a section, or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /**
   * Return the merged config with all credential values masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): TribunalConfig

  /** Directory holding the project config file */
  readonly projectConfigDir: string

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
