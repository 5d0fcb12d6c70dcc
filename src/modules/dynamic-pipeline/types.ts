/**
 * Shared types for the dynamic pipeline: the stage contract, stage results
 * and the pipeline lifecycle state.
 */

import type { PipelineContext, StageName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Pipeline lifecycle state
// ---------------------------------------------------------------------------

/**
 * Lifecycle of one pipeline instance.
 *
 *   created → ready → running ⇄ paused
 *                     running → completed | failed
 */
export type PipelineState =
  | 'created'
  | 'ready'
  | 'running'
  | 'paused'
  | 'completed'
  | 'failed'

// ---------------------------------------------------------------------------
// StageResult
// ---------------------------------------------------------------------------

/** Outcome of one stage execution (after retries) */
export interface StageResult {
  readonly stageName: StageName
  readonly success: boolean
  readonly error?: Error
  /** Number of retries performed (attempts - 1) */
  readonly retryCount: number
  /** Wall-clock duration of the final attempt, in seconds */
  readonly duration: number
  readonly skipped: boolean
  readonly data: Readonly<Record<string, unknown>>
}

/** A successful, non-skipped result */
export function stageSucceeded(
  stageName: StageName,
  data: Record<string, unknown> = {}
): StageResult {
  return Object.freeze({ stageName, success: true, retryCount: 0, duration: 0, skipped: false, data })
}

/** A failed result carrying the causing error */
export function stageFailed(
  stageName: StageName,
  error: Error,
  fields: { retryCount?: number; duration?: number; data?: Record<string, unknown> } = {}
): StageResult {
  return Object.freeze({
    stageName,
    success: false,
    error,
    retryCount: fields.retryCount ?? 0,
    duration: fields.duration ?? 0,
    skipped: false,
    data: fields.data ?? {},
  })
}

/** A skipped result; skipping is not a failure */
export function stageSkipped(stageName: StageName, reason: string): StageResult {
  return Object.freeze({
    stageName,
    success: true,
    retryCount: 0,
    duration: 0,
    skipped: true,
    data: { reason },
  })
}

/** Copy of `result` with execution bookkeeping stamped on */
export function withExecutionStats(
  result: StageResult,
  stats: { retryCount: number; duration: number }
): StageResult {
  return Object.freeze({ ...result, retryCount: stats.retryCount, duration: stats.duration })
}

/** True when the stage ran and succeeded */
export function isStageSuccessful(result: StageResult): boolean {
  return result.success && !result.skipped
}

// ---------------------------------------------------------------------------
// PipelineStage contract
// ---------------------------------------------------------------------------

/**
 * A unit of pipeline work. Concrete stage bodies live outside the engine
 * and only need to satisfy this contract.
 */
export interface PipelineStage {
  readonly name: StageName
  /** Names of stages that must finish successfully before this one */
  getDependencies(): StageName[]
  /** Conditional-execution predicate; false skips the stage */
  shouldExecute(context: PipelineContext): boolean
  /** Run the stage. Throwing signals a (possibly transient) failure. */
  execute(context: PipelineContext): Promise<StageResult>
}
