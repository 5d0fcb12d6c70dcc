/**
 * `artemis config` command group
 *
 * Subcommands:
 *   - `artemis config show`                - display merged config (credentials masked)
 *   - `artemis config get <key>`           - print one value by dot-notation key
 *   - `artemis config set <key> <value>`   - update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem, coerceScalar } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export interface ConfigDirOptions {
  projectConfigDir?: string
  globalConfigDir?: string
}

/** Loaded config system, or the exit code explaining why loading failed */
async function loadConfig(opts: ConfigDirOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  })
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigDirOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Artemis Configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigDirOptions = {}): Promise<number> {
  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  process.stdout.write((typeof value === 'string' ? value : JSON.stringify(value)) + '\n')
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigDirOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const value = coerceScalar(rawValue.trim())
  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerConfigCommand
// ---------------------------------------------------------------------------

interface DirFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

function dirOptions(flags: DirFlags): ConfigDirOptions {
  return {
    ...(flags.projectConfigDir !== undefined && { projectConfigDir: flags.projectConfigDir }),
    ...(flags.globalConfigDir !== undefined && { globalConfigDir: flags.globalConfigDir }),
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and modify Artemis configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .artemis/ directory')
    .option('--global-config-dir <dir>', 'Path to global .artemis/ directory')
    .action(async (opts: DirFlags & { format: string }) => {
      process.exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        ...dirOptions(opts),
      })
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value by dot-notation key (e.g. retry.max_retries)')
    .option('--project-config-dir <dir>', 'Path to project .artemis/ directory')
    .option('--global-config-dir <dir>', 'Path to global .artemis/ directory')
    .action(async (key: string, opts: DirFlags) => {
      process.exitCode = await runConfigGet(key, dirOptions(opts))
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. parallel.max_workers 8)')
    .option('--project-config-dir <dir>', 'Path to project .artemis/ directory')
    .option('--global-config-dir <dir>', 'Path to global .artemis/ directory')
    .action(async (key: string, value: string, opts: DirFlags) => {
      process.exitCode = await runConfigSet(key, value, dirOptions(opts))
    })
}
