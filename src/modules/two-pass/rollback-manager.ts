/**
 * RollbackManager: keeps pass mementos and restores one when the second
 * pass degrades quality beyond the configured threshold.
 */

import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { PipelineObservable } from '../dynamic-pipeline/index.js'
import type { PassDelta, PassMemento } from './models.js'

const logger = createLogger('two-pass:rollback')

export interface RollbackRecord {
  passName: string
  reason: string
  qualityScore: number
  timestamp: string
}

export interface RollbackManagerOptions {
  observable?: PipelineObservable
  cardId?: CardId
}

export class RollbackManager {
  private readonly _mementos = new Map<string, PassMemento>()
  private readonly _history: RollbackRecord[] = []
  private readonly _observable: PipelineObservable | undefined
  private readonly _cardId: CardId

  constructor(options: RollbackManagerOptions = {}) {
    this._observable = options.observable
    this._cardId = options.cardId ?? 'two-pass'
  }

  /** Store a private copy, keyed by pass name (latest wins) */
  saveMemento(memento: PassMemento): void {
    this._mementos.set(memento.passName, memento.createCopy())
  }

  getMemento(passName: string): PassMemento | undefined {
    return this._mementos.get(passName)?.createCopy()
  }

  /** True when quality dropped by more than the threshold allows */
  shouldRollback(delta: PassDelta, threshold: number): boolean {
    return delta.qualityDelta < threshold
  }

  /** Record the rollback and return a restored deep copy of the memento */
  rollbackToMemento(memento: PassMemento, reason: string, cardId: CardId = this._cardId): PassMemento {
    const record: RollbackRecord = {
      passName: memento.passName,
      reason,
      qualityScore: memento.qualityScore,
      timestamp: new Date().toISOString(),
    }
    this._history.push(record)
    logger.warn({ ...record, cardId }, 'Rolled back to pass memento')
    this._observable?.emit('pass:rolled-back', cardId, {
      data: { passName: memento.passName, reason, qualityScore: memento.qualityScore },
    })
    return memento.createCopy()
  }

  getRollbackHistory(): RollbackRecord[] {
    return this._history.map((record) => ({ ...record }))
  }
}
