/**
 * Checkpoint query functions for the SQLite persistence layer.
 *
 * Rows mirror the migration 001 tables; JSON columns are passed through as
 * text and decoded by the caller.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface PipelineCheckpointRow {
  card_id: string
  checkpoint_id: string
  status: string
  created_at: string
  updated_at: string
  completed_stages: string
  failed_stages: string
  skipped_stages: string
  current_stage: string | null
  execution_context: string
  total_stages: number
  stages_completed: number
  total_duration_seconds: number
  estimated_remaining_seconds: number
  resume_count: number
  last_resume_time: string | null
  metadata: string
}

export interface StageCheckpointRow {
  card_id: string
  stage_name: string
  position: number
  status: string
  start_time: string
  end_time: string | null
  duration_seconds: number
  result: string | null
  artifacts: string
  llm_responses: string
  error_message: string | null
  retry_count: number
  metadata: string
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Replace the checkpoint of a card (pipeline row and all stage rows) in one
 * transaction.
 */
export function replaceCheckpoint(
  db: BetterSqlite3Database,
  pipeline: PipelineCheckpointRow,
  stages: readonly StageCheckpointRow[]
): void {
  const upsert = db.prepare(`
    INSERT INTO pipeline_checkpoints (
      card_id, checkpoint_id, status, created_at, updated_at,
      completed_stages, failed_stages, skipped_stages, current_stage, execution_context,
      total_stages, stages_completed, total_duration_seconds, estimated_remaining_seconds,
      resume_count, last_resume_time, metadata
    ) VALUES (
      @card_id, @checkpoint_id, @status, @created_at, @updated_at,
      @completed_stages, @failed_stages, @skipped_stages, @current_stage, @execution_context,
      @total_stages, @stages_completed, @total_duration_seconds, @estimated_remaining_seconds,
      @resume_count, @last_resume_time, @metadata
    )
    ON CONFLICT(card_id) DO UPDATE SET
      checkpoint_id = excluded.checkpoint_id,
      status = excluded.status,
      created_at = excluded.created_at,
      updated_at = excluded.updated_at,
      completed_stages = excluded.completed_stages,
      failed_stages = excluded.failed_stages,
      skipped_stages = excluded.skipped_stages,
      current_stage = excluded.current_stage,
      execution_context = excluded.execution_context,
      total_stages = excluded.total_stages,
      stages_completed = excluded.stages_completed,
      total_duration_seconds = excluded.total_duration_seconds,
      estimated_remaining_seconds = excluded.estimated_remaining_seconds,
      resume_count = excluded.resume_count,
      last_resume_time = excluded.last_resume_time,
      metadata = excluded.metadata
  `)
  const clearStages = db.prepare('DELETE FROM stage_checkpoints WHERE card_id = ?')
  const insertStage = db.prepare(`
    INSERT INTO stage_checkpoints (
      card_id, stage_name, position, status, start_time, end_time, duration_seconds,
      result, artifacts, llm_responses, error_message, retry_count, metadata
    ) VALUES (
      @card_id, @stage_name, @position, @status, @start_time, @end_time, @duration_seconds,
      @result, @artifacts, @llm_responses, @error_message, @retry_count, @metadata
    )
  `)

  const write = db.transaction(() => {
    upsert.run(pipeline)
    clearStages.run(pipeline.card_id)
    for (const stage of stages) insertStage.run(stage)
  })
  write()
}

/**
 * Delete the checkpoint of a card and its stage rows.
 * @returns true when a pipeline row was deleted
 */
export function deleteCheckpoint(db: BetterSqlite3Database, cardId: string): boolean {
  const clearStages = db.prepare('DELETE FROM stage_checkpoints WHERE card_id = ?')
  const deletePipeline = db.prepare('DELETE FROM pipeline_checkpoints WHERE card_id = ?')
  const remove = db.transaction((id: string): boolean => {
    clearStages.run(id)
    return deletePipeline.run(id).changes > 0
  })
  return remove(cardId)
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export function getPipelineCheckpointRow(
  db: BetterSqlite3Database,
  cardId: string
): PipelineCheckpointRow | undefined {
  const stmt = db.prepare('SELECT * FROM pipeline_checkpoints WHERE card_id = ? LIMIT 1')
  return stmt.get(cardId) as PipelineCheckpointRow | undefined
}

export function getStageCheckpointRows(db: BetterSqlite3Database, cardId: string): StageCheckpointRow[] {
  const stmt = db.prepare('SELECT * FROM stage_checkpoints WHERE card_id = ? ORDER BY position ASC')
  return stmt.all(cardId) as StageCheckpointRow[]
}

export function listCheckpointCardIds(db: BetterSqlite3Database): string[] {
  const stmt = db.prepare('SELECT card_id FROM pipeline_checkpoints ORDER BY card_id ASC')
  return (stmt.all() as { card_id: string }[]).map((row) => row.card_id)
}
