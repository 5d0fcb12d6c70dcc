/**
 * Migration 001: checkpoint schema.
 *
 *  - pipeline_checkpoints: one row per card
 *  - stage_checkpoints: one row per (card, stage), removed with its card
 *
 * List and object columns hold JSON text.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const checkpointSchemaMigration: Migration = {
  version: 1,
  name: '001-checkpoint-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS pipeline_checkpoints (
        card_id                     TEXT PRIMARY KEY,
        checkpoint_id               TEXT NOT NULL,
        status                      TEXT NOT NULL,
        created_at                  TEXT NOT NULL,
        updated_at                  TEXT NOT NULL,
        completed_stages            TEXT NOT NULL DEFAULT '[]',
        failed_stages               TEXT NOT NULL DEFAULT '[]',
        skipped_stages              TEXT NOT NULL DEFAULT '[]',
        current_stage               TEXT,
        execution_context           TEXT NOT NULL DEFAULT '{}',
        total_stages                INTEGER NOT NULL DEFAULT 0,
        stages_completed            INTEGER NOT NULL DEFAULT 0,
        total_duration_seconds      REAL NOT NULL DEFAULT 0.0,
        estimated_remaining_seconds REAL NOT NULL DEFAULT 0.0,
        resume_count                INTEGER NOT NULL DEFAULT 0,
        last_resume_time            TEXT,
        metadata                    TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS stage_checkpoints (
        card_id          TEXT NOT NULL REFERENCES pipeline_checkpoints(card_id) ON DELETE CASCADE,
        stage_name       TEXT NOT NULL,
        position         INTEGER NOT NULL,
        status           TEXT NOT NULL,
        start_time       TEXT NOT NULL,
        end_time         TEXT,
        duration_seconds REAL NOT NULL DEFAULT 0.0,
        result           TEXT,
        artifacts        TEXT NOT NULL DEFAULT '[]',
        llm_responses    TEXT NOT NULL DEFAULT '[]',
        error_message    TEXT,
        retry_count      INTEGER NOT NULL DEFAULT 0,
        metadata         TEXT NOT NULL DEFAULT '{}',
        PRIMARY KEY (card_id, stage_name)
      );

      CREATE INDEX IF NOT EXISTS idx_pipeline_checkpoints_status ON pipeline_checkpoints(status);
    `)
  },
}
