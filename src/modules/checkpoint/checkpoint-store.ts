/**
 * CheckpointStore: persistence contract for pipeline checkpoints, one per
 * card.
 */

import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { PipelineCheckpointSchema } from './models.js'
import type { PipelineCheckpoint } from './models.js'

const logger = createLogger('checkpoint:store')

export interface CheckpointStore {
  save(checkpoint: PipelineCheckpoint): Promise<void>
  /** null when missing or corrupt */
  load(cardId: CardId): Promise<PipelineCheckpoint | null>
  exists(cardId: CardId): Promise<boolean>
  /** true when something was deleted */
  delete(cardId: CardId): Promise<boolean>
  /** Card ids with a stored checkpoint, sorted */
  listAll(): Promise<CardId[]>
}

/**
 * Validate raw persisted data. Returns null (and logs) when the data does
 * not describe a checkpoint for `cardId`.
 */
export function parseCheckpoint(raw: unknown, cardId: CardId, source: string): PipelineCheckpoint | null {
  const parsed = PipelineCheckpointSchema.safeParse(raw)
  if (!parsed.success) {
    logger.warn({ cardId, source, issues: parsed.error.issues.length }, 'Corrupt checkpoint ignored')
    return null
  }
  if (parsed.data.cardId !== cardId) {
    logger.warn({ cardId, storedCardId: parsed.data.cardId, source }, 'Checkpoint belongs to another card')
    return null
  }
  return parsed.data
}
