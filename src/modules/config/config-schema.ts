/**
 * Zod validation schemas for the Artemis configuration system.
 *
 * Sections:
 *  - global: logging and on-disk locations
 *  - retry: default stage retry policy
 *  - parallel: parallel stage execution
 *  - two_pass: two-pass pipeline tuning
 *  - state_machine: recovery workflow and snapshot settings
 *  - checkpoint: checkpoint storage backend
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory for `{cardId}_state.json` snapshots */
    state_dir: z.string().min(1),
    /** Directory for `{cardId}.json` checkpoints (file storage) */
    checkpoint_dir: z.string().min(1),
    /** SQLite file for checkpoints (sqlite storage) */
    database_path: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Pipeline execution
// ---------------------------------------------------------------------------

export const RetrySettingsSchema = z
  .object({
    max_retries: z.number().int().min(0),
    initial_delay_seconds: z.number().min(0),
    backoff_multiplier: z.number().min(1),
    max_delay_seconds: z.number().min(0),
  })
  .strict()

export type RetrySettings = z.infer<typeof RetrySettingsSchema>

export const ParallelSettingsSchema = z
  .object({
    enabled: z.boolean(),
    max_workers: z.number().int().min(1).max(64),
  })
  .strict()

export type ParallelSettings = z.infer<typeof ParallelSettingsSchema>

export const TwoPassSettingsSchema = z
  .object({
    auto_rollback: z.boolean(),
    /** Quality delta below which the second pass is rolled back */
    rollback_threshold: z.number().min(-1).max(1),
    max_retries: z.number().int().min(0),
    /** Router intensity, 0.0 – 1.0 */
    intensity: z.number().min(0).max(1),
    quality_threshold: z.number().min(0).max(1),
    first_pass_timeout_seconds: z.number().positive(),
    second_pass_timeout_seconds: z.number().positive(),
  })
  .strict()

export type TwoPassSettings = z.infer<typeof TwoPassSettingsSchema>

// ---------------------------------------------------------------------------
// State machine and checkpoints
// ---------------------------------------------------------------------------

export const StateMachineSettingsSchema = z
  .object({
    /** Seconds between workflow action attempts grow as factor ** attempt */
    workflow_backoff_factor: z.number().min(1),
    persist_snapshots: z.boolean(),
  })
  .strict()

export type StateMachineSettings = z.infer<typeof StateMachineSettingsSchema>

export const CheckpointStorageSchema = z.enum(['file', 'sqlite'])
export type CheckpointStorage = z.infer<typeof CheckpointStorageSchema>

export const CheckpointSettingsSchema = z
  .object({
    storage: CheckpointStorageSchema,
    enable_llm_cache: z.boolean(),
  })
  .strict()

export type CheckpointSettings = z.infer<typeof CheckpointSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** Config format versions this release can read */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const ArtemisConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    retry: RetrySettingsSchema,
    parallel: ParallelSettingsSchema,
    two_pass: TwoPassSettingsSchema,
    state_machine: StateMachineSettingsSchema,
    checkpoint: CheckpointSettingsSchema,
  })
  .strict()

export type ArtemisConfig = z.infer<typeof ArtemisConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer of the hierarchy, before merging)
// ---------------------------------------------------------------------------

export const PartialArtemisConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    retry: RetrySettingsSchema.partial().optional(),
    parallel: ParallelSettingsSchema.partial().optional(),
    two_pass: TwoPassSettingsSchema.partial().optional(),
    state_machine: StateMachineSettingsSchema.partial().optional(),
    checkpoint: CheckpointSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialArtemisConfig = z.infer<typeof PartialArtemisConfigSchema>
