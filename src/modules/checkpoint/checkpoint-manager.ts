/**
 * CheckpointManager: records per-stage progress of one card's pipeline run
 * and restores it after a crash or interruption.
 *
 * Every mutation is written through to the CheckpointStore immediately.
 * A checkpoint is resumable while its status is `active` or `paused`.
 */

import { CheckpointError } from '../../core/errors.js'
import type { CardId, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { deepClone, roundTo } from '../../utils/helpers.js'
import type { CheckpointStore } from './checkpoint-store.js'
import { LlmResponseCache } from './llm-cache.js'
import { EMPTY_PROGRESS, calculateProgressPercent, estimateRemainingTime } from './models.js'
import type {
  CheckpointProgress,
  CheckpointStatus,
  LlmResponseRecord,
  PipelineCheckpoint,
  StageCheckpoint,
  StageCheckpointStatus,
} from './models.js'

const logger = createLogger('checkpoint:manager')

const RESUMABLE: ReadonlySet<CheckpointStatus> = new Set(['active', 'paused'])

export interface CheckpointManagerOptions {
  enableLlmCache?: boolean
  now?: () => Date
}

export interface StageCheckpointDetails {
  result?: Record<string, unknown> | null
  artifacts?: string[]
  llmResponses?: LlmResponseRecord[]
  errorMessage?: string | null
  startTime?: Date
  endTime?: Date
  retryCount?: number
  metadata?: Record<string, unknown>
}

export class CheckpointManager {
  readonly cardId: CardId
  private readonly _store: CheckpointStore
  private readonly _cache: LlmResponseCache
  private readonly _now: () => Date
  private _checkpoint: PipelineCheckpoint | null = null

  constructor(cardId: CardId, store: CheckpointStore, options: CheckpointManagerOptions = {}) {
    this.cardId = cardId
    this._store = store
    this._cache = new LlmResponseCache(options.enableLlmCache ?? true)
    this._now = options.now ?? (() => new Date())
  }

  /** Copy of the current checkpoint, or null before create/resume */
  get checkpoint(): PipelineCheckpoint | null {
    return this._checkpoint === null ? null : deepClone(this._checkpoint)
  }

  get llmCache(): LlmResponseCache {
    return this._cache
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async createCheckpoint(totalStages: number, executionContext: Record<string, unknown> = {}): Promise<PipelineCheckpoint> {
    const now = this._now()
    const checkpoint: PipelineCheckpoint = {
      checkpointId: `checkpoint-${this.cardId}-${String(Math.floor(now.getTime() / 1000))}`,
      cardId: this.cardId,
      status: 'active',
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
      completedStages: [],
      failedStages: [],
      skippedStages: [],
      currentStage: null,
      stageCheckpoints: {},
      executionContext: deepClone(executionContext),
      totalStages,
      stagesCompleted: 0,
      totalDurationSeconds: 0,
      estimatedRemainingSeconds: 0,
      resumeCount: 0,
      lastResumeTime: null,
      metadata: {},
    }
    this._checkpoint = checkpoint
    await this._store.save(checkpoint)
    logger.info({ cardId: this.cardId, checkpointId: checkpoint.checkpointId, totalStages }, 'Checkpoint created')
    return deepClone(checkpoint)
  }

  async saveStageCheckpoint(
    stageName: StageName,
    status: StageCheckpointStatus,
    details: StageCheckpointDetails = {}
  ): Promise<void> {
    const checkpoint = this._require('saveStageCheckpoint')
    const now = this._now()
    const start = details.startTime ?? now
    const end = details.endTime ?? now
    const durationSeconds =
      details.startTime !== undefined && details.endTime !== undefined
        ? Math.max(0, (details.endTime.getTime() - details.startTime.getTime()) / 1000)
        : 0

    const stage: StageCheckpoint = {
      stageName,
      status,
      startTime: start.toISOString(),
      endTime: end.toISOString(),
      durationSeconds,
      result: details.result === undefined || details.result === null ? null : deepClone(details.result),
      artifacts: [...(details.artifacts ?? [])],
      llmResponses: deepClone(details.llmResponses ?? []),
      errorMessage: details.errorMessage ?? null,
      retryCount: details.retryCount ?? 0,
      metadata: deepClone(details.metadata ?? {}),
    }

    checkpoint.stageCheckpoints[stageName] = stage
    const lists: Record<StageCheckpointStatus, StageName[]> = {
      completed: checkpoint.completedStages,
      failed: checkpoint.failedStages,
      skipped: checkpoint.skippedStages,
    }
    // a stage sits in exactly one status list
    for (const [listStatus, list] of Object.entries(lists)) {
      const index = list.indexOf(stageName)
      if (listStatus === status || index === -1) continue
      list.splice(index, 1)
      if (listStatus === 'completed') checkpoint.stagesCompleted -= 1
    }
    if (!lists[status].includes(stageName)) {
      lists[status].push(stageName)
      if (status === 'completed') checkpoint.stagesCompleted += 1
    }
    checkpoint.totalDurationSeconds = roundTo(checkpoint.totalDurationSeconds + durationSeconds, 6)
    checkpoint.estimatedRemainingSeconds = estimateRemainingTime(
      checkpoint.totalDurationSeconds,
      checkpoint.stagesCompleted,
      checkpoint.totalStages
    )
    checkpoint.updatedAt = now.toISOString()

    for (const response of stage.llmResponses) {
      if (response.prompt !== undefined && response.prompt !== '') {
        this._cache.store(this.cardId, stageName, response.prompt, response)
      }
    }

    await this._store.save(checkpoint)
    logger.info(
      {
        cardId: this.cardId,
        stage: stageName,
        status,
        durationSeconds,
        progress: `${String(checkpoint.stagesCompleted)}/${String(checkpoint.totalStages)}`,
      },
      'Stage checkpoint saved'
    )
  }

  async setCurrentStage(stageName: StageName): Promise<void> {
    const checkpoint = this._require('setCurrentStage')
    checkpoint.currentStage = stageName
    checkpoint.updatedAt = this._now().toISOString()
    await this._store.save(checkpoint)
  }

  async markCompleted(): Promise<void> {
    const checkpoint = this._checkpoint
    if (checkpoint === null) return
    checkpoint.status = 'completed'
    checkpoint.currentStage = null
    checkpoint.updatedAt = this._now().toISOString()
    await this._store.save(checkpoint)
    logger.info(
      { cardId: this.cardId, totalDurationSeconds: checkpoint.totalDurationSeconds },
      'Checkpointed pipeline completed'
    )
  }

  async markFailed(reason: string): Promise<void> {
    const checkpoint = this._checkpoint
    if (checkpoint === null) return
    checkpoint.status = 'failed'
    checkpoint.metadata.failureReason = reason
    checkpoint.updatedAt = this._now().toISOString()
    await this._store.save(checkpoint)
    logger.warn({ cardId: this.cardId, reason }, 'Checkpointed pipeline failed')
  }

  // -------------------------------------------------------------------------
  // Restoration
  // -------------------------------------------------------------------------

  async canResume(): Promise<boolean> {
    const stored = await this._store.load(this.cardId)
    return stored !== null && RESUMABLE.has(stored.status) && stored.cardId === this.cardId
  }

  /** Load the stored checkpoint for inspection; its status is left as stored */
  async load(): Promise<PipelineCheckpoint | null> {
    const stored = await this._store.load(this.cardId)
    if (stored === null) return null
    this._checkpoint = stored
    return deepClone(stored)
  }

  /** Load the stored checkpoint, mark it resumed and refill the LLM cache */
  async resume(): Promise<PipelineCheckpoint | null> {
    const stored = await this._store.load(this.cardId)
    if (stored === null || !RESUMABLE.has(stored.status)) {
      logger.info({ cardId: this.cardId }, 'No checkpoint to resume from')
      return null
    }

    const now = this._now().toISOString()
    stored.status = 'resumed'
    stored.resumeCount += 1
    stored.lastResumeTime = now
    stored.updatedAt = now
    await this._store.save(stored)

    this._checkpoint = stored
    const restored = this._cache.restoreFromCheckpoint(stored)
    logger.info(
      {
        cardId: this.cardId,
        checkpointId: stored.checkpointId,
        completedStages: stored.completedStages.length,
        resumeCount: stored.resumeCount,
        cachedResponses: restored,
      },
      'Resumed from checkpoint'
    )
    return deepClone(stored)
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** First stage of `allStages` not yet completed; null when all are */
  /** Result data of every completed stage, for seeding a resumed run */
  getCompletedStageResults(): Map<StageName, Record<string, unknown>> {
    const checkpoint = this._checkpoint
    const results = new Map<StageName, Record<string, unknown>>()
    if (checkpoint === null) return results
    for (const name of checkpoint.completedStages) {
      results.set(name, deepClone(checkpoint.stageCheckpoints[name]?.result ?? {}))
    }
    return results
  }

  getNextStage(allStages: readonly StageName[]): StageName | null {
    const checkpoint = this._checkpoint
    if (checkpoint === null) return allStages[0] ?? null
    return allStages.find((stage) => !checkpoint.completedStages.includes(stage)) ?? null
  }

  getProgress(): CheckpointProgress {
    const checkpoint = this._checkpoint
    if (checkpoint === null) return { ...EMPTY_PROGRESS }
    const elapsedSeconds = (this._now().getTime() - new Date(checkpoint.createdAt).getTime()) / 1000
    return {
      progressPercent: calculateProgressPercent(checkpoint.stagesCompleted, checkpoint.totalStages),
      stagesCompleted: checkpoint.stagesCompleted,
      totalStages: checkpoint.totalStages,
      currentStage: checkpoint.currentStage,
      elapsedSeconds: roundTo(Math.max(0, elapsedSeconds), 2),
      estimatedRemainingSeconds: estimateRemainingTime(
        checkpoint.totalDurationSeconds,
        checkpoint.stagesCompleted,
        checkpoint.totalStages
      ),
    }
  }

  getCachedLlmResponse(stageName: StageName, prompt: string): LlmResponseRecord | undefined {
    const cached = this._cache.get(this.cardId, stageName, prompt)
    if (cached !== undefined) logger.debug({ cardId: this.cardId, stage: stageName }, 'LLM cache hit')
    return cached
  }

  /** Delete the stored checkpoint; true when one existed */
  async clearCheckpoint(): Promise<boolean> {
    const deleted = await this._store.delete(this.cardId)
    if (deleted) {
      this._checkpoint = null
      this._cache.clear()
      logger.info({ cardId: this.cardId }, 'Checkpoint cleared')
    }
    return deleted
  }

  private _require(operation: string): PipelineCheckpoint {
    if (this._checkpoint === null) {
      throw new CheckpointError(`No checkpoint created. Call createCheckpoint() before ${operation}()`, {
        cardId: this.cardId,
        operation,
      })
    }
    return this._checkpoint
  }
}
