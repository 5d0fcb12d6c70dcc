/**
 * TwoPassExecutor: runs first pass, memento, second pass, compare and
 * (optionally) rollback.
 *
 *   first pass (retry) → memento saved → context copy seeded from memento
 *     → second pass (retry) → delta → rollback if delta < threshold
 *
 * A first pass that exhausts its retries fails the whole run with
 * PassExecutionError. A second pass that does so is scored 0 and goes
 * through the normal comparison, so rollback applies.
 */

import { PassExecutionError } from '../../core/errors.js'
import type { CardId, PipelineContext } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { deepClone } from '../../utils/helpers.js'
import { PipelineObservable } from '../dynamic-pipeline/index.js'
import { createPassResult } from './models.js'
import type { PassDelta, PassResult } from './models.js'
import { PassComparator } from './pass-comparator.js'
import { RollbackManager } from './rollback-manager.js'
import type { RollbackRecord } from './rollback-manager.js'
import { RetryStrategy } from './retry-strategy.js'
import type { PassStrategy } from './strategies/base-strategy.js'

const logger = createLogger('two-pass:executor')

export interface TwoPassExecutorOptions {
  firstPass: PassStrategy
  secondPass: PassStrategy
  comparator?: PassComparator
  rollbackManager?: RollbackManager
  retryStrategy?: RetryStrategy
  observable?: PipelineObservable
  autoRollback?: boolean
  /** Roll back when qualityDelta is below this (default −0.1) */
  rollbackThreshold?: number
}

export interface TwoPassOutcome {
  finalResult: PassResult
  firstResult: PassResult
  secondResult: PassResult
  delta: PassDelta
  rolledBack: boolean
}

export interface TwoPassExecutionRecord {
  timestamp: string
  /** Seconds */
  executionTime: number
  firstPassQuality: number
  secondPassQuality: number
  qualityDelta: number
  finalPass: string
  rolledBack: boolean
}

export class TwoPassExecutor {
  readonly autoRollback: boolean
  readonly rollbackThreshold: number
  private readonly _firstPass: PassStrategy
  private readonly _secondPass: PassStrategy
  private readonly _comparator: PassComparator
  private readonly _rollbackManager: RollbackManager
  private readonly _retry: RetryStrategy
  private readonly _observable: PipelineObservable
  private readonly _history: TwoPassExecutionRecord[] = []

  constructor(options: TwoPassExecutorOptions) {
    this._firstPass = options.firstPass
    this._secondPass = options.secondPass
    this._observable = options.observable ?? new PipelineObservable()
    this._comparator = options.comparator ?? new PassComparator({ observable: this._observable })
    this._rollbackManager = options.rollbackManager ?? new RollbackManager({ observable: this._observable })
    this._retry = options.retryStrategy ?? new RetryStrategy()
    this.autoRollback = options.autoRollback ?? true
    this.rollbackThreshold = options.rollbackThreshold ?? -0.1
  }

  async execute(context: PipelineContext, cardId: CardId = 'two-pass'): Promise<TwoPassOutcome> {
    const startedAt = new Date()
    const startedMs = performance.now()

    // 1. First pass: a terminal failure fails the run
    this._observable.emit('pass:first-started', cardId, { data: { pass: this._firstPass.name } })
    const firstResult = await this._retry.execute(() => this._firstPass.execute(context), this._firstPass.name)
    this._observable.emit('pass:first-completed', cardId, {
      data: { qualityScore: firstResult.qualityScore, learnings: firstResult.learnings.length },
    })

    // 2. Memento
    const memento = this._firstPass.createMemento(firstResult, context)
    this._rollbackManager.saveMemento(memento)
    this._observable.emit('pass:memento-created', cardId, {
      data: { passName: memento.passName, qualityScore: memento.qualityScore },
    })

    // 3. Second pass on a seeded copy of the context
    const secondContext = deepClone(context)
    this._secondPass.applyMemento(memento, secondContext)
    this._observable.emit('pass:memento-applied', cardId, {
      data: { learningsApplied: memento.learnings.length },
    })
    this._observable.emit('pass:second-started', cardId, { data: { pass: this._secondPass.name } })
    const secondResult = await this._runSecondPass(secondContext, cardId)
    this._observable.emit('pass:second-completed', cardId, {
      data: { qualityScore: secondResult.qualityScore, success: secondResult.success },
    })

    // 4. Compare
    const delta = this._comparator.compare(firstResult, secondResult, cardId)

    // 5. Decide
    let finalResult = secondResult
    let rolledBack = false
    if (this.autoRollback && this._rollbackManager.shouldRollback(delta, this.rollbackThreshold)) {
      const reason = `Quality degraded by ${(Math.abs(delta.qualityDelta) * 100).toFixed(2)}%`
      this._rollbackManager.rollbackToMemento(memento, reason, cardId)
      finalResult = firstResult
      rolledBack = true
    }

    this._history.push({
      timestamp: startedAt.toISOString(),
      executionTime: (performance.now() - startedMs) / 1000,
      firstPassQuality: firstResult.qualityScore,
      secondPassQuality: secondResult.qualityScore,
      qualityDelta: delta.qualityDelta,
      finalPass: finalResult.passName,
      rolledBack,
    })

    logger.info(
      { cardId, qualityDelta: delta.qualityDelta, finalPass: finalResult.passName, rolledBack },
      'Two-pass execution finished'
    )
    return { finalResult, firstResult, secondResult, delta, rolledBack }
  }

  getExecutionHistory(): TwoPassExecutionRecord[] {
    return this._history.map((record) => ({ ...record }))
  }

  getRollbackHistory(): RollbackRecord[] {
    return this._rollbackManager.getRollbackHistory()
  }

  private async _runSecondPass(context: PipelineContext, cardId: CardId): Promise<PassResult> {
    try {
      return await this._retry.execute(() => this._secondPass.execute(context), this._secondPass.name)
    } catch (err) {
      if (!(err instanceof PassExecutionError)) throw err
      logger.warn({ cardId, err }, 'Second pass failed; scoring it as 0')
      return createPassResult({
        passName: this._secondPass.name,
        success: false,
        qualityScore: 0,
        errors: [err.message],
        metadata: { failed: true },
      })
    }
  }
}
