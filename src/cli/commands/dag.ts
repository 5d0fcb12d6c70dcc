/**
 * `artemis dag` command
 *
 * Reads a stage graph file and prints its execution order and critical path.
 *
 * Usage:
 *   artemis dag stages.yaml                         Human-readable order and critical path
 *   artemis dag stages.yaml --output-format json    JSON document
 *
 * Graph file shape (YAML or JSON):
 *   stages:
 *     plan:  { duration: 2 }
 *     build: { depends_on: [plan], duration: 5 }
 *
 * Exit codes:
 *   0  success
 *   1  unexpected system error
 *   2  file not found, parse error, dangling dependency or cycle
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import yaml from 'js-yaml'
import { z } from 'zod'
import { StageCycleError } from '../../core/errors.js'
import { createStageDAG } from '../../modules/stage-dag/stage-dag.js'
import type { CriticalPathResult } from '../../modules/stage-dag/stage-dag.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const DAG_EXIT_SUCCESS = 0
export const DAG_EXIT_ERROR = 1
export const DAG_EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Graph file
// ---------------------------------------------------------------------------

const StageEntrySchema = z
  .object({
    depends_on: z.array(z.string().min(1)).default([]),
    duration: z.number().nonnegative().optional(),
  })
  .strict()

type StageEntry = z.infer<typeof StageEntrySchema>

/** A stage with nothing to declare may be written as `name:` with no value */
export const StageGraphFileSchema = z.object({
  stages: z.record(
    z.string().min(1),
    StageEntrySchema.nullable().transform((entry): StageEntry => entry ?? { depends_on: [] }),
  ),
})

export type StageGraphFile = z.infer<typeof StageGraphFileSchema>

export class StageGraphParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StageGraphParseError'
  }
}

/**
 * Parse a stage graph from text. `.json` files are read as JSON, anything
 * else as YAML.
 *
 * @throws {StageGraphParseError}
 */
export function parseStageGraph(text: string, fileName: string): StageGraphFile {
  let raw: unknown
  try {
    raw = extname(fileName).toLowerCase() === '.json' ? JSON.parse(text) : yaml.load(text)
  } catch (err) {
    throw new StageGraphParseError(err instanceof Error ? err.message : String(err))
  }

  const parsed = StageGraphFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n')
    throw new StageGraphParseError(issues)
  }
  return parsed.data
}

/** Dependencies that name no stage in the file */
export function findDanglingDependencies(graph: StageGraphFile): string[] {
  const errors: string[] = []
  for (const [name, entry] of Object.entries(graph.stages)) {
    for (const dep of entry.depends_on) {
      if (graph.stages[dep] === undefined) {
        errors.push(`stage "${name}" depends on unknown stage "${dep}"`)
      }
    }
  }
  return errors
}

// ---------------------------------------------------------------------------
// Analysis and rendering
// ---------------------------------------------------------------------------

export interface DagReport {
  order: string[]
  criticalPath: CriticalPathResult
}

/**
 * @throws {StageCycleError} when the stages form a cycle
 */
export function analyzeStageGraph(graph: StageGraphFile): DagReport {
  const dag = createStageDAG(
    Object.entries(graph.stages).map(([name, entry]) => ({
      name,
      dependencies: entry.depends_on,
      duration: entry.duration,
    })),
  )
  const stages = Object.keys(graph.stages)
  return { order: dag.topologicalSort(stages), criticalPath: dag.criticalPath(stages) }
}

export function renderHuman(report: DagReport): string {
  const lines = ['Execution order:']
  report.order.forEach((stage, i) => {
    lines.push(`  ${String(i + 1)}. ${stage}`)
  })
  lines.push('')
  lines.push(
    `Critical path: ${report.criticalPath.path.join(' --> ')} (total duration ${String(report.criticalPath.totalDuration)})`,
  )
  return lines.join('\n')
}

export function renderJson(report: DagReport): string {
  return JSON.stringify(
    {
      order: report.order,
      criticalPath: report.criticalPath.path,
      totalDuration: report.criticalPath.totalDuration,
    },
    null,
    2,
  )
}

// ---------------------------------------------------------------------------
// runDagAction - testable core logic
// ---------------------------------------------------------------------------

export interface DagActionOptions {
  filePath: string
  outputFormat: 'human' | 'json'
}

export async function runDagAction(options: DagActionOptions): Promise<number> {
  const { filePath, outputFormat } = options

  if (!existsSync(filePath)) {
    process.stderr.write(`Error: Stage graph file not found: ${filePath}\n`)
    return DAG_EXIT_USAGE_ERROR
  }

  let graph: StageGraphFile
  try {
    graph = parseStageGraph(await readFile(filePath, 'utf-8'), filePath)
  } catch (err) {
    if (err instanceof StageGraphParseError) {
      process.stderr.write(`Error: Failed to parse stage graph file: ${filePath}\n${err.message}\n`)
      return DAG_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    return DAG_EXIT_ERROR
  }

  const dangling = findDanglingDependencies(graph)
  if (dangling.length > 0) {
    for (const error of dangling) {
      process.stderr.write(`Error: ${error}\n`)
    }
    return DAG_EXIT_USAGE_ERROR
  }

  let report: DagReport
  try {
    report = analyzeStageGraph(graph)
  } catch (err) {
    if (err instanceof StageCycleError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return DAG_EXIT_USAGE_ERROR
    }
    throw err
  }

  process.stdout.write((outputFormat === 'json' ? renderJson(report) : renderHuman(report)) + '\n')
  return DAG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerDagCommand
// ---------------------------------------------------------------------------

export function registerDagCommand(program: Command): void {
  program
    .command('dag <file>')
    .description('Print the execution order and critical path of a stage graph file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (file: string, opts: { outputFormat: string }) => {
      const outputFormat = opts.outputFormat === 'json' ? 'json' : 'human'
      process.exitCode = await runDagAction({ filePath: file, outputFormat })
    })
}
