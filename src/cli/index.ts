#!/usr/bin/env node
/**
 * Artemis CLI - Main entry point
 * Provides the `artemis` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { realpathSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerDagCommand } from './commands/dag.js'
import { registerStatusCommand } from './commands/status.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** Version from the project package.json, found from src/cli or dist/src/cli */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) continue
      throw err
    }
    const pkg: unknown = JSON.parse(content)
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export function createProgram(version = '0.0.0'): Command {
  const program = new Command()

  program
    .name('artemis')
    .description('Artemis - dynamic pipeline engine with checkpoints and recovery workflows')
    .version(version, '-v, --version', 'Output the current version')

  registerDagCommand(program)
  registerStatusCommand(program)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = createProgram(await getPackageVersion())
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  void main()
}
