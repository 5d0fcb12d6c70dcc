/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.artemis/config.yaml)
 *     → project config      (./.artemis/config.yaml)
 *     → environment vars    (ARTEMIS_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import type { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  ArtemisConfigSchema,
  PartialArtemisConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type ArtemisConfig,
  type PartialArtemisConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../utils/redaction.js'

const logger = createLogger('config')

export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * ARTEMIS_ environment variable names and the config paths they set.
 * Scalars only.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  ARTEMIS_LOG_LEVEL: 'global.log_level',
  ARTEMIS_STATE_DIR: 'global.state_dir',
  ARTEMIS_CHECKPOINT_DIR: 'global.checkpoint_dir',
  ARTEMIS_DATABASE_PATH: 'global.database_path',
  ARTEMIS_MAX_RETRIES: 'retry.max_retries',
  ARTEMIS_PARALLEL_ENABLED: 'parallel.enabled',
  ARTEMIS_MAX_WORKERS: 'parallel.max_workers',
  ARTEMIS_TWO_PASS_INTENSITY: 'two_pass.intensity',
  ARTEMIS_CHECKPOINT_STORAGE: 'checkpoint.storage',
  ARTEMIS_ENABLE_LLM_CACHE: 'checkpoint.enable_llm_cache',
}

/** Interpret a raw string (env var or CLI argument) as boolean, number or string */
export function coerceScalar(raw: string): boolean | number | string {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^-?\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^-?\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

function readEnvOverrides(env: NodeJS.ProcessEnv): PartialArtemisConfig {
  let overrides: Record<string, unknown> = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  const parsed = PartialArtemisConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/** Copy of `obj` with `path` set to `value`; intermediate objects are created */
function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head = '', ...rest] = path.split('.')
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: ArtemisConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialArtemisConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.artemis')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.artemis')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigPath(): string {
    return join(this._projectConfigDir, CONFIG_FILE_NAME)
  }

  async load(): Promise<void> {
    const layers: PartialArtemisConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(this.projectConfigPath)
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = ArtemisConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ layers: layers.length }, 'Configuration loaded')
  }

  getConfig(): ArtemisConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)
    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (isPlainObject(existing)) {
      throw new ConfigError(`Cannot set section "${key}"; use a more specific dot-notation path`, { key })
    }

    const projectConfig = (await this._loadYamlFile(this.projectConfigPath)) ?? {}
    const updated = setByPath(projectConfig, key, value)

    const partial = PartialArtemisConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(this.projectConfigPath, yaml.dump(partial.data), 'utf-8')
    logger.info({ key, path: this.projectConfigPath }, 'Project configuration updated')

    await this.load()
  }

  getMasked(): ArtemisConfig {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialArtemisConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in config file at ${filePath}: ${message}`, { filePath })
    }
    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (version !== undefined && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))) {
        throw new ConfigError(
          `Unsupported config_format_version "${String(version)}" in ${filePath}. ` +
            `Supported versions: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version },
        )
      }
    }

    const result = PartialArtemisConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const { retry } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}, env?: NodeJS.ProcessEnv): ConfigSystem {
  return new ConfigSystemImpl(options, env)
}
