/**
 * PassComparator: compares two pass results and reports quality movement.
 */

import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { PipelineObservable } from '../dynamic-pipeline/index.js'
import { computePassDelta } from './models.js'
import type { PassDelta, PassResult } from './models.js'

const logger = createLogger('two-pass:comparator')

export interface PassComparatorOptions {
  observable?: PipelineObservable
  cardId?: CardId
}

export class PassComparator {
  private readonly _observable: PipelineObservable | undefined
  private readonly _cardId: CardId
  private readonly _history: PassDelta[] = []

  constructor(options: PassComparatorOptions = {}) {
    this._observable = options.observable
    this._cardId = options.cardId ?? 'two-pass'
  }

  compare(first: PassResult, second: PassResult, cardId: CardId = this._cardId): PassDelta {
    const delta = computePassDelta(first, second)
    this._history.push(delta)

    logger.debug(
      {
        firstPass: first.passName,
        secondPass: second.passName,
        qualityDelta: delta.qualityDelta,
        newArtifacts: delta.newArtifacts.length,
        modifiedArtifacts: delta.modifiedArtifacts.length,
      },
      'Passes compared'
    )

    if (delta.qualityDelta !== 0) {
      this._observable?.emit(delta.qualityImproved ? 'pass:quality-improved' : 'pass:quality-degraded', cardId, {
        data: {
          firstQuality: first.qualityScore,
          secondQuality: second.qualityScore,
          qualityDelta: delta.qualityDelta,
        },
      })
    }
    return delta
  }

  getComparisonHistory(): PassDelta[] {
    return [...this._history]
  }
}
