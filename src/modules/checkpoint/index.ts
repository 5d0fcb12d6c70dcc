/**
 * Checkpoint module: crash recovery for pipeline runs.
 */

export {
  CheckpointStatusSchema,
  StageCheckpointStatusSchema,
  LlmResponseRecordSchema,
  StageCheckpointSchema,
  PipelineCheckpointSchema,
  EMPTY_PROGRESS,
  calculateProgressPercent,
  estimateRemainingTime,
} from './models.js'
export type {
  CheckpointStatus,
  StageCheckpointStatus,
  LlmResponseRecord,
  StageCheckpoint,
  PipelineCheckpoint,
  CheckpointProgress,
} from './models.js'

export { parseCheckpoint } from './checkpoint-store.js'
export type { CheckpointStore } from './checkpoint-store.js'
export { FileCheckpointStore } from './file-checkpoint-store.js'
export { SqliteCheckpointStore } from './sqlite-checkpoint-store.js'
export { LlmResponseCache, llmCacheKey } from './llm-cache.js'
export type { LlmCacheStats } from './llm-cache.js'
export { CheckpointManager } from './checkpoint-manager.js'
export type { CheckpointManagerOptions, StageCheckpointDetails } from './checkpoint-manager.js'
export { createCheckpointStore, DATABASE_SERVICE_NAME } from './store-factory.js'
export type { CheckpointStoreSettings } from './store-factory.js'
