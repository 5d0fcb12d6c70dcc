/**
 * Checkpoint data model.
 *
 * Checkpoints are persisted as JSON (file store) or rows (SQLite store) and
 * always re-validated with these schemas on load; a record that fails
 * validation is treated as corrupt.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const CheckpointStatusSchema = z.enum(['active', 'paused', 'completed', 'failed', 'resumed'])
export type CheckpointStatus = z.infer<typeof CheckpointStatusSchema>

/** Status recorded for a single stage */
export const StageCheckpointStatusSchema = z.enum(['completed', 'failed', 'skipped'])
export type StageCheckpointStatus = z.infer<typeof StageCheckpointStatusSchema>

/** One recorded LLM exchange; `prompt` keys the response cache */
export const LlmResponseRecordSchema = z
  .object({
    prompt: z.string().optional(),
  })
  .catchall(z.unknown())

export type LlmResponseRecord = z.infer<typeof LlmResponseRecordSchema>

export const StageCheckpointSchema = z.object({
  stageName: z.string().min(1),
  status: StageCheckpointStatusSchema,
  startTime: z.string(),
  endTime: z.string().nullable(),
  durationSeconds: z.number().nonnegative(),
  result: z.record(z.string(), z.unknown()).nullable(),
  artifacts: z.array(z.string()),
  llmResponses: z.array(LlmResponseRecordSchema),
  errorMessage: z.string().nullable(),
  retryCount: z.number().int().nonnegative(),
  metadata: z.record(z.string(), z.unknown()),
})

export type StageCheckpoint = z.infer<typeof StageCheckpointSchema>

export const PipelineCheckpointSchema = z.object({
  checkpointId: z.string().min(1),
  cardId: z.string().min(1),
  status: CheckpointStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  completedStages: z.array(z.string()),
  failedStages: z.array(z.string()),
  skippedStages: z.array(z.string()),
  currentStage: z.string().nullable(),
  stageCheckpoints: z.record(z.string(), StageCheckpointSchema),
  executionContext: z.record(z.string(), z.unknown()),
  totalStages: z.number().int().nonnegative(),
  stagesCompleted: z.number().int().nonnegative(),
  totalDurationSeconds: z.number().nonnegative(),
  estimatedRemainingSeconds: z.number().nonnegative(),
  resumeCount: z.number().int().nonnegative(),
  lastResumeTime: z.string().nullable(),
  metadata: z.record(z.string(), z.unknown()),
})

export type PipelineCheckpoint = z.infer<typeof PipelineCheckpointSchema>

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export interface CheckpointProgress {
  progressPercent: number
  stagesCompleted: number
  totalStages: number
  currentStage: string | null
  elapsedSeconds: number
  estimatedRemainingSeconds: number
}

export const EMPTY_PROGRESS: Readonly<CheckpointProgress> = Object.freeze({
  progressPercent: 0,
  stagesCompleted: 0,
  totalStages: 0,
  currentStage: null,
  elapsedSeconds: 0,
  estimatedRemainingSeconds: 0,
})

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/** Completed share of the pipeline, 0–100 with two decimals */
export function calculateProgressPercent(stagesCompleted: number, totalStages: number): number {
  if (totalStages === 0) return 0
  return round2((stagesCompleted / totalStages) * 100)
}

/** Average completed-stage duration × stages left, two decimals */
export function estimateRemainingTime(
  totalDurationSeconds: number,
  stagesCompleted: number,
  totalStages: number
): number {
  if (stagesCompleted === 0) return 0
  const average = totalDurationSeconds / stagesCompleted
  return round2(average * Math.max(0, totalStages - stagesCompleted))
}
