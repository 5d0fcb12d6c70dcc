/**
 * LlmResponseCache: in-memory cache of LLM responses recorded in stage
 * checkpoints, so a resumed run can reuse them instead of asking again.
 *
 * Key: `${cardId}:${stageName}:${sha256(prompt) first 16 hex chars}`
 */

import { createHash } from 'node:crypto'
import type { CardId, StageName } from '../../core/types.js'
import type { LlmResponseRecord, PipelineCheckpoint } from './models.js'

export function llmCacheKey(cardId: CardId, stageName: StageName, prompt: string): string {
  const digest = createHash('sha256').update(prompt, 'utf8').digest('hex').slice(0, 16)
  return `${cardId}:${stageName}:${digest}`
}

export interface LlmCacheStats {
  enabled: boolean
  cachedResponses: number
  cacheKeys: string[]
}

export class LlmResponseCache {
  readonly enabled: boolean
  private readonly _entries = new Map<string, LlmResponseRecord>()

  constructor(enabled = true) {
    this.enabled = enabled
  }

  store(cardId: CardId, stageName: StageName, prompt: string, response: LlmResponseRecord): void {
    if (!this.enabled) return
    this._entries.set(llmCacheKey(cardId, stageName, prompt), response)
  }

  get(cardId: CardId, stageName: StageName, prompt: string): LlmResponseRecord | undefined {
    if (!this.enabled) return undefined
    return this._entries.get(llmCacheKey(cardId, stageName, prompt))
  }

  /** Cache every prompted response of every stage in the checkpoint */
  restoreFromCheckpoint(checkpoint: PipelineCheckpoint): number {
    if (!this.enabled) return 0
    let restored = 0
    for (const [stageName, stage] of Object.entries(checkpoint.stageCheckpoints)) {
      for (const response of stage.llmResponses) {
        if (response.prompt === undefined || response.prompt === '') continue
        this.store(checkpoint.cardId, stageName, response.prompt, response)
        restored += 1
      }
    }
    return restored
  }

  clear(): void {
    this._entries.clear()
  }

  getStats(): LlmCacheStats {
    return { enabled: this.enabled, cachedResponses: this._entries.size, cacheKeys: [...this._entries.keys()] }
  }
}
