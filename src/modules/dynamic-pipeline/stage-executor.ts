/**
 * StageExecutor: runs a single stage with skip logic and retry/backoff.
 *
 * Attempt loop (attempt is 0-based, at most maxRetries + 1 attempts):
 *   stage:started → execute → stage:completed
 *                           ↘ throw → shouldRetry? → stage:retrying → sleep → next attempt
 *                                                  ↘ stage:failed
 *
 * Stage exceptions never propagate: they become a failed StageResult.
 */

import type { CardId, PipelineContext } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { sleepSeconds, toError } from '../../utils/helpers.js'
import { PipelineObservable } from './observable.js'
import { RetryPolicy } from './retry-policy.js'
import type { PipelineStage, StageResult } from './types.js'
import { stageFailed, stageSkipped, withExecutionStats } from './types.js'

const logger = createLogger('pipeline:stage-executor')

export interface StageExecutorOptions {
  observable?: PipelineObservable
  retryPolicy?: RetryPolicy
  /** Backoff sleep in seconds; injectable for tests */
  sleep?: (seconds: number) => Promise<void>
}

export class StageExecutor {
  readonly observable: PipelineObservable
  readonly retryPolicy: RetryPolicy
  private readonly _sleep: (seconds: number) => Promise<void>

  constructor(options: StageExecutorOptions = {}) {
    this.observable = options.observable ?? new PipelineObservable()
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy()
    this._sleep = options.sleep ?? sleepSeconds
  }

  async executeStage(stage: PipelineStage, context: PipelineContext, cardId: CardId): Promise<StageResult> {
    const stageName = stage.name

    if (!this._shouldExecute(stage, context, cardId)) {
      logger.debug({ stageName, cardId }, 'Stage skipped by condition')
      this.observable.emit('stage:skipped', cardId, {
        stageName,
        data: { reason: 'conditional_execution' },
      })
      return stageSkipped(stageName, 'conditional_execution')
    }

    let attempt = 0
    let lastError: Error = new Error(`Stage ${stageName} did not run`)
    let lastDuration = 0

    while (attempt <= this.retryPolicy.maxRetries) {
      this.observable.emit('stage:started', cardId, { stageName, data: { attempt } })
      const startedAt = performance.now()

      try {
        const raw = await stage.execute(context)
        const duration = (performance.now() - startedAt) / 1000
        const result = withExecutionStats(raw, { retryCount: attempt, duration })

        if (result.success) {
          logger.debug({ stageName, cardId, attempt, duration }, 'Stage completed')
          this.observable.emit('stage:completed', cardId, {
            stageName,
            data: { duration, retryCount: attempt },
          })
        } else {
          // Reported failure: the stage chose not to throw, so it is final
          logger.warn({ stageName, cardId, attempt }, 'Stage reported failure')
          this.observable.emit('stage:failed', cardId, {
            stageName,
            data: { attempts: attempt + 1 },
            error: result.error,
          })
        }
        return result
      } catch (err) {
        lastError = toError(err)
        lastDuration = (performance.now() - startedAt) / 1000

        if (!this.retryPolicy.shouldRetry(lastError, attempt)) {
          break
        }

        const delay = this.retryPolicy.getDelay(attempt)
        logger.warn({ stageName, cardId, attempt, delay, error: lastError.message }, 'Stage failed; retrying')
        this.observable.emit('stage:retrying', cardId, {
          stageName,
          data: { attempt: attempt + 1, delay },
          error: lastError,
        })
        await this._sleep(delay)
        attempt += 1
      }
    }

    logger.error({ stageName, cardId, attempts: attempt + 1, error: lastError.message }, 'Stage failed')
    this.observable.emit('stage:failed', cardId, {
      stageName,
      data: { attempts: attempt + 1 },
      error: lastError,
    })
    return stageFailed(stageName, lastError, { retryCount: attempt, duration: lastDuration })
  }

  /** A predicate that throws counts as "run the stage" so its failure is retried and reported */
  private _shouldExecute(stage: PipelineStage, context: PipelineContext, cardId: CardId): boolean {
    try {
      return stage.shouldExecute(context)
    } catch (err) {
      logger.warn({ stageName: stage.name, cardId, err: toError(err) }, 'shouldExecute threw; running stage')
      return true
    }
  }
}
