/**
 * `artemis status` command
 *
 * Shows checkpoint progress for one card from the configured checkpoint store.
 *
 * Usage:
 *   artemis status <cardId>                         Human-readable summary
 *   artemis status <cardId> --output-format json    JSON document
 *
 * Exit codes:
 *   0  success
 *   1  configuration or storage error
 *   2  no checkpoint exists for the card
 */

import type { Command } from 'commander'
import { ConfigError } from '../../core/errors.js'
import { ServiceRegistry } from '../../core/di.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { CheckpointManager } from '../../modules/checkpoint/checkpoint-manager.js'
import { createCheckpointStore } from '../../modules/checkpoint/store-factory.js'
import type { CheckpointProgress, PipelineCheckpoint } from '../../modules/checkpoint/models.js'
import { formatSeconds } from '../../utils/helpers.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('status-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const STATUS_EXIT_SUCCESS = 0
export const STATUS_EXIT_ERROR = 1
export const STATUS_EXIT_NOT_FOUND = 2

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export interface StatusReport {
  cardId: string
  checkpointId: string
  status: PipelineCheckpoint['status']
  progress: CheckpointProgress
  completedStages: string[]
  failedStages: string[]
  skippedStages: string[]
  resumeCount: number
}

export function buildStatusReport(checkpoint: PipelineCheckpoint, progress: CheckpointProgress): StatusReport {
  return {
    cardId: checkpoint.cardId,
    checkpointId: checkpoint.checkpointId,
    status: checkpoint.status,
    progress,
    completedStages: checkpoint.completedStages,
    failedStages: checkpoint.failedStages,
    skippedStages: checkpoint.skippedStages,
    resumeCount: checkpoint.resumeCount,
  }
}

function listOrDash(items: string[]): string {
  return items.length === 0 ? '-' : items.join(', ')
}

export function renderStatusHuman(report: StatusReport): string {
  const { progress } = report
  return [
    `Card:        ${report.cardId}`,
    `Checkpoint:  ${report.checkpointId}`,
    `Status:      ${report.status}`,
    `Progress:    ${String(progress.stagesCompleted)}/${String(progress.totalStages)} stages (${String(progress.progressPercent)}%)`,
    `Current:     ${progress.currentStage ?? '-'}`,
    `Elapsed:     ${formatSeconds(progress.elapsedSeconds)}`,
    `Remaining:   ${formatSeconds(progress.estimatedRemainingSeconds)}`,
    `Completed:   ${listOrDash(report.completedStages)}`,
    `Failed:      ${listOrDash(report.failedStages)}`,
    `Skipped:     ${listOrDash(report.skippedStages)}`,
    `Resumes:     ${String(report.resumeCount)}`,
  ].join('\n')
}

// ---------------------------------------------------------------------------
// runStatusAction - testable core logic
// ---------------------------------------------------------------------------

export interface StatusActionOptions {
  cardId: string
  outputFormat: 'human' | 'json'
  projectConfigDir?: string
  globalConfigDir?: string
  now?: () => Date
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { cardId, outputFormat } = options

  const config = createConfigSystem({
    ...(options.projectConfigDir !== undefined && { projectConfigDir: options.projectConfigDir }),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
  })
  try {
    await config.load()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    if (!(err instanceof ConfigError)) logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error: ${message}\n`)
    return STATUS_EXIT_ERROR
  }
  const { global, checkpoint } = config.getConfig()
  // LOG_LEVEL in the environment wins over the configured level
  if (process.env.LOG_LEVEL === undefined) setLogLevel(global.log_level)

  const registry = new ServiceRegistry()
  try {
    const store = await createCheckpointStore(
      { storage: checkpoint.storage, checkpointDir: global.checkpoint_dir, databasePath: global.database_path },
      registry,
    )
    const manager = new CheckpointManager(cardId, store, {
      enableLlmCache: false,
      ...(options.now !== undefined && { now: options.now }),
    })
    const loaded = await manager.load()
    if (loaded === null) {
      process.stderr.write(`Error: No checkpoint found for card "${cardId}"\n`)
      return STATUS_EXIT_NOT_FOUND
    }

    const report = buildStatusReport(loaded, manager.getProgress())
    process.stdout.write((outputFormat === 'json' ? JSON.stringify(report, null, 2) : renderStatusHuman(report)) + '\n')
    return STATUS_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err, cardId }, 'Failed to read checkpoint')
    process.stderr.write(`Error: ${message}\n`)
    return STATUS_EXIT_ERROR
  } finally {
    await registry.shutdownAll()
  }
}

// ---------------------------------------------------------------------------
// registerStatusCommand
// ---------------------------------------------------------------------------

export function registerStatusCommand(program: Command): void {
  program
    .command('status <cardId>')
    .description('Show checkpoint progress for a card')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .artemis/ directory')
    .option('--global-config-dir <dir>', 'Path to global .artemis/ directory')
    .action(
      async (cardId: string, opts: { outputFormat: string; projectConfigDir?: string; globalConfigDir?: string }) => {
        process.exitCode = await runStatusAction({
          cardId,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
      },
    )
}
