/**
 * Unit tests for the `artemis config` command group
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, writeFile, rm, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import yaml from 'js-yaml'
import {
  runConfigShow,
  runConfigGet,
  runConfigSet,
  CONFIG_EXIT_SUCCESS,
  CONFIG_EXIT_INVALID,
} from '../config.js'
import { captureOutput } from './capture.js'
import type { CapturedOutput } from './capture.js'

let testDir: string
let projectConfigDir: string
let globalConfigDir: string
let output: CapturedOutput

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'artemis-config-cmd-'))
  projectConfigDir = join(testDir, '.artemis')
  globalConfigDir = join(testDir, 'global', '.artemis')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  await rm(testDir, { recursive: true, force: true })
})

async function writeConfigYaml(content: string): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

describe('runConfigShow', () => {
  it('prints the merged config as YAML under a header', async () => {
    const exitCode = await runConfigShow({ projectConfigDir, globalConfigDir })

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    const stdout = output.getStdout()
    expect(stdout.startsWith('# Artemis Configuration (credentials masked)\n\n')).toBe(true)
    const body = yaml.load(stdout)
    expect(body).toMatchObject({ config_format_version: '1', parallel: { enabled: false, max_workers: 4 } })
  })

  it('prints JSON when asked', async () => {
    await runConfigShow({ projectConfigDir, globalConfigDir, format: 'json' })

    const parsed: unknown = JSON.parse(output.getStdout())
    expect(parsed).toMatchObject({ retry: { max_retries: 3 }, checkpoint: { storage: 'file' } })
  })

  it('reflects project overrides', async () => {
    await writeConfigYaml('two_pass:\n  intensity: 0.9\n')
    await runConfigShow({ projectConfigDir, globalConfigDir, format: 'json' })

    expect(JSON.parse(output.getStdout())).toMatchObject({ two_pass: { intensity: 0.9 } })
  })

  it('returns CONFIG_EXIT_INVALID for an invalid project file', async () => {
    await writeConfigYaml('global:\n  log_level: NOTVALID\n')

    expect(await runConfigShow({ projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_INVALID)
    expect(output.getStderr()).toContain('Configuration error')
  })
})

// ---------------------------------------------------------------------------
// config get
// ---------------------------------------------------------------------------

describe('runConfigGet', () => {
  it('prints scalar values as they are', async () => {
    expect(await runConfigGet('global.log_level', { projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_SUCCESS)
    expect(await runConfigGet('retry.max_retries', { projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_SUCCESS)
    expect(output.getStdout()).toBe('info\n3\n')
  })

  it('prints sections as JSON', async () => {
    await runConfigGet('checkpoint', { projectConfigDir, globalConfigDir })
    expect(output.getStdout()).toBe('{"storage":"file","enable_llm_cache":true}\n')
  })

  it('rejects unknown keys', async () => {
    expect(await runConfigGet('nope', { projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_INVALID)
    expect(output.getStderr()).toBe('  Error: Unknown config key: nope\n')
  })
})

// ---------------------------------------------------------------------------
// config set
// ---------------------------------------------------------------------------

describe('runConfigSet', () => {
  it('coerces and persists the value to the project file', async () => {
    const exitCode = await runConfigSet('parallel.max_workers', '8', { projectConfigDir, globalConfigDir })

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    expect(output.getStdout()).toBe('  Set parallel.max_workers = 8\n')
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ parallel: { max_workers: 8 } })
  })

  it('persists booleans', async () => {
    await runConfigSet('checkpoint.enable_llm_cache', 'false', { projectConfigDir, globalConfigDir })
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ checkpoint: { enable_llm_cache: false } })
  })

  it('rejects values the schema refuses', async () => {
    const exitCode = await runConfigSet('checkpoint.storage', 'redis', { projectConfigDir, globalConfigDir })
    expect(exitCode).toBe(CONFIG_EXIT_INVALID)
    expect(output.getStderr()).toContain('Invalid value for "checkpoint.storage"')
  })

  it('rejects whole sections', async () => {
    expect(await runConfigSet('retry', '3', { projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_INVALID)
  })

  it('rejects an empty key', async () => {
    expect(await runConfigSet('  ', 'x', { projectConfigDir, globalConfigDir })).toBe(CONFIG_EXIT_INVALID)
    expect(output.getStderr()).toBe('  Error: key must not be empty\n')
  })
})
