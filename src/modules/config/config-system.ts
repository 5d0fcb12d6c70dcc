/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Callers depend on this interface; create an instance via
 * `createConfigSystem()` from config-system-impl.ts.
 */

import type { ArtemisConfig, PartialArtemisConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Project-level .artemis/ directory (default: <cwd>/.artemis) */
  projectConfigDir?: string
  /** User-level .artemis/ directory (default: ~/.artemis) */
  globalConfigDir?: string
  /** Highest-priority values, typically from CLI flags */
  cliOverrides?: PartialArtemisConfig
}

/**
 * Fully-merged, validated Artemis configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /** Load and validate all sources. Must precede `getConfig()`. */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not completed
   */
  getConfig(): ArtemisConfig

  /** Value at a dot-notation key (e.g. "retry.max_retries"), or undefined */
  get(key: string): unknown

  /**
   * Persist one scalar value to the project config file and reload.
   * @throws {ConfigError} for unknown keys, section keys or invalid values
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential fields masked, safe to display */
  getMasked(): ArtemisConfig

  readonly isLoaded: boolean
}
