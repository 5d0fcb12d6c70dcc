/**
 * TwoPassPipeline: facade over TwoPassExecutor.
 *
 * Each run asks TwoPassGuidance for a pass plan, applies the recommended
 * timeouts to both passes and then runs the executor.
 */

import type { CardId, PipelineContext } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { PipelineObservable } from '../dynamic-pipeline/index.js'
import { TwoPassGuidance } from './ai-guidance.js'
import type { PassStrategyPlan, QualityAssessmentService, TwoPassGuidanceConfig } from './ai-guidance.js'
import type { RollbackRecord } from './rollback-manager.js'
import { RetryStrategy } from './retry-strategy.js'
import type { PassStrategy } from './strategies/base-strategy.js'
import { TimedPassStrategy } from './timed-pass-strategy.js'
import { TwoPassExecutor } from './two-pass-executor.js'
import type { TwoPassExecutionRecord, TwoPassOutcome } from './two-pass-executor.js'

const logger = createLogger('two-pass:pipeline')

/** The `two_pass` configuration section */
export interface TwoPassConfigSection {
  auto_rollback?: boolean
  rollback_threshold?: number
  max_retries?: number
  intensity?: number
  quality_threshold?: number
  first_pass_timeout_seconds?: number
  second_pass_timeout_seconds?: number
}

export interface TwoPassPipelineOptions {
  firstPass: PassStrategy
  secondPass: PassStrategy
  observable?: PipelineObservable
  config?: TwoPassConfigSection
  aiService?: QualityAssessmentService
  /** Router guidance text and focus lists */
  guidance?: Partial<Pick<TwoPassGuidanceConfig, 'guidance' | 'firstPassGuidance' | 'secondPassGuidance'>>
  /** Seconds between pass retries, before backoff */
  retryInitialDelay?: number
  sleep?: (seconds: number) => Promise<void>
}

export interface TwoPassPipelineOutcome extends TwoPassOutcome {
  plan: PassStrategyPlan
}

export class TwoPassPipeline {
  readonly observable: PipelineObservable
  readonly guidance: TwoPassGuidance
  private readonly _firstPass: TimedPassStrategy
  private readonly _secondPass: TimedPassStrategy
  private readonly _executor: TwoPassExecutor

  constructor(options: TwoPassPipelineOptions) {
    const config = options.config ?? {}
    this.observable = options.observable ?? new PipelineObservable()
    this.guidance = new TwoPassGuidance(
      {
        ...options.guidance,
        ...(config.intensity !== undefined ? { intensity: config.intensity } : {}),
        ...(config.quality_threshold !== undefined ? { qualityThreshold: config.quality_threshold } : {}),
        ...(config.first_pass_timeout_seconds !== undefined
          ? { firstPassTimeout: config.first_pass_timeout_seconds }
          : {}),
        ...(config.second_pass_timeout_seconds !== undefined
          ? { secondPassTimeout: config.second_pass_timeout_seconds }
          : {}),
      },
      options.aiService
    )

    this._firstPass = new TimedPassStrategy(options.firstPass, this.guidance.config.firstPassTimeout)
    this._secondPass = new TimedPassStrategy(options.secondPass, this.guidance.config.secondPassTimeout)
    this._executor = new TwoPassExecutor({
      firstPass: this._firstPass,
      secondPass: this._secondPass,
      observable: this.observable,
      retryStrategy: new RetryStrategy({
        ...(config.max_retries !== undefined ? { maxRetries: config.max_retries } : {}),
        ...(options.retryInitialDelay !== undefined ? { initialDelay: options.retryInitialDelay } : {}),
        ...(options.sleep !== undefined ? { sleep: options.sleep } : {}),
      }),
      ...(config.auto_rollback !== undefined ? { autoRollback: config.auto_rollback } : {}),
      ...(config.rollback_threshold !== undefined ? { rollbackThreshold: config.rollback_threshold } : {}),
    })
  }

  async execute(context: PipelineContext, cardId: CardId = 'two-pass'): Promise<TwoPassPipelineOutcome> {
    const requirements = typeof context.requirements === 'string' ? context.requirements : ''
    const plan = await this.guidance.optimizePassStrategy(requirements)

    this._firstPass.timeoutSeconds = plan.recommendedTimeouts.firstPass
    this._secondPass.timeoutSeconds = plan.recommendedTimeouts.secondPass
    logger.debug(
      { cardId, source: plan.source, timeouts: plan.recommendedTimeouts },
      'Pass plan applied'
    )

    const outcome = await this._executor.execute(context, cardId)
    return { ...outcome, plan }
  }

  getExecutionHistory(): TwoPassExecutionRecord[] {
    return this._executor.getExecutionHistory()
  }

  getRollbackHistory(): RollbackRecord[] {
    return this._executor.getRollbackHistory()
  }
}
