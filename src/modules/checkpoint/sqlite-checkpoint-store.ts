/**
 * SqliteCheckpointStore: checkpoints in the pipeline_checkpoints and
 * stage_checkpoints tables (migration 001).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  deleteCheckpoint,
  getPipelineCheckpointRow,
  getStageCheckpointRows,
  listCheckpointCardIds,
  replaceCheckpoint,
} from '../../persistence/queries/checkpoints.js'
import type { PipelineCheckpointRow, StageCheckpointRow } from '../../persistence/queries/checkpoints.js'
import { parseCheckpoint } from './checkpoint-store.js'
import type { CheckpointStore } from './checkpoint-store.js'
import type { PipelineCheckpoint, StageCheckpoint } from './models.js'

const logger = createLogger('checkpoint:sqlite-store')

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toPipelineRow(cp: PipelineCheckpoint): PipelineCheckpointRow {
  return {
    card_id: cp.cardId,
    checkpoint_id: cp.checkpointId,
    status: cp.status,
    created_at: cp.createdAt,
    updated_at: cp.updatedAt,
    completed_stages: JSON.stringify(cp.completedStages),
    failed_stages: JSON.stringify(cp.failedStages),
    skipped_stages: JSON.stringify(cp.skippedStages),
    current_stage: cp.currentStage,
    execution_context: JSON.stringify(cp.executionContext),
    total_stages: cp.totalStages,
    stages_completed: cp.stagesCompleted,
    total_duration_seconds: cp.totalDurationSeconds,
    estimated_remaining_seconds: cp.estimatedRemainingSeconds,
    resume_count: cp.resumeCount,
    last_resume_time: cp.lastResumeTime,
    metadata: JSON.stringify(cp.metadata),
  }
}

function toStageRow(cardId: CardId, stage: StageCheckpoint, position: number): StageCheckpointRow {
  return {
    card_id: cardId,
    stage_name: stage.stageName,
    position,
    status: stage.status,
    start_time: stage.startTime,
    end_time: stage.endTime,
    duration_seconds: stage.durationSeconds,
    result: stage.result === null ? null : JSON.stringify(stage.result),
    artifacts: JSON.stringify(stage.artifacts),
    llm_responses: JSON.stringify(stage.llmResponses),
    error_message: stage.errorMessage,
    retry_count: stage.retryCount,
    metadata: JSON.stringify(stage.metadata),
  }
}

/** Decode rows into an unvalidated checkpoint-shaped object; throws on bad JSON */
function fromRows(row: PipelineCheckpointRow, stageRows: readonly StageCheckpointRow[]): unknown {
  const stageCheckpoints: Record<string, unknown> = {}
  for (const s of stageRows) {
    stageCheckpoints[s.stage_name] = {
      stageName: s.stage_name,
      status: s.status,
      startTime: s.start_time,
      endTime: s.end_time,
      durationSeconds: s.duration_seconds,
      result: s.result === null ? null : JSON.parse(s.result),
      artifacts: JSON.parse(s.artifacts),
      llmResponses: JSON.parse(s.llm_responses),
      errorMessage: s.error_message,
      retryCount: s.retry_count,
      metadata: JSON.parse(s.metadata),
    }
  }
  return {
    checkpointId: row.checkpoint_id,
    cardId: row.card_id,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedStages: JSON.parse(row.completed_stages),
    failedStages: JSON.parse(row.failed_stages),
    skippedStages: JSON.parse(row.skipped_stages),
    currentStage: row.current_stage,
    stageCheckpoints,
    executionContext: JSON.parse(row.execution_context),
    totalStages: row.total_stages,
    stagesCompleted: row.stages_completed,
    totalDurationSeconds: row.total_duration_seconds,
    estimatedRemainingSeconds: row.estimated_remaining_seconds,
    resumeCount: row.resume_count,
    lastResumeTime: row.last_resume_time,
    metadata: JSON.parse(row.metadata),
  }
}

// ---------------------------------------------------------------------------
// SqliteCheckpointStore
// ---------------------------------------------------------------------------

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly _db: BetterSqlite3Database

  /** The database must already be migrated */
  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  async save(checkpoint: PipelineCheckpoint): Promise<void> {
    const stages = Object.values(checkpoint.stageCheckpoints).map((stage, i) =>
      toStageRow(checkpoint.cardId, stage, i)
    )
    replaceCheckpoint(this._db, toPipelineRow(checkpoint), stages)
  }

  async load(cardId: CardId): Promise<PipelineCheckpoint | null> {
    const row = getPipelineCheckpointRow(this._db, cardId)
    if (row === undefined) return null

    let raw: unknown
    try {
      raw = fromRows(row, getStageCheckpointRows(this._db, cardId))
    } catch (err) {
      logger.warn({ cardId, err }, 'Checkpoint row holds invalid JSON')
      return null
    }
    return parseCheckpoint(raw, cardId, 'sqlite')
  }

  async exists(cardId: CardId): Promise<boolean> {
    return getPipelineCheckpointRow(this._db, cardId) !== undefined
  }

  async delete(cardId: CardId): Promise<boolean> {
    return deleteCheckpoint(this._db, cardId)
  }

  async listAll(): Promise<CardId[]> {
    return listCheckpointCardIds(this._db)
  }
}
