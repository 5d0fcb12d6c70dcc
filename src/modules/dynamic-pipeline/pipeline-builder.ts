/**
 * DynamicPipelineBuilder: fluent construction of a DynamicPipeline.
 *
 * @example
 * const pipeline = new DynamicPipelineBuilder()
 *   .withName('feature-checkout')
 *   .addStages([requirements, development, unitTests])
 *   .withStrategy(new ComplexityBasedSelector('moderate'))
 *   .withRetryPolicy(new RetryPolicy({ maxRetries: 2 }))
 *   .withParallelism(true, 4)
 *   .build()
 *
 * build() validates, in order: at least one stage, unique stage names, and
 * dependencies that name registered stages. Each violation throws
 * PipelineConfigError and nothing is constructed.
 */

import { PipelineConfigError } from '../../core/errors.js'
import type { CardId, PipelineContext, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { DynamicPipeline } from './dynamic-pipeline.js'
import { PipelineObservable } from './observable.js'
import type { PipelineObserver } from './observable.js'
import { ParallelStageExecutor } from './parallel-stage-executor.js'
import type { StageComplexityClassifier } from './pipeline-optimizer.js'
import { RetryPolicy } from './retry-policy.js'
import type { RetryConfigSection } from './retry-policy.js'
import type { StageSelectionStrategy } from './selection-strategies.js'
import { StageExecutor } from './stage-executor.js'
import type { PipelineStage } from './types.js'

const logger = createLogger('pipeline:builder')

export const DEFAULT_PIPELINE_NAME = 'unnamed-pipeline'

/** Config sections the builder understands */
export interface PipelineConfigSections {
  retry?: RetryConfigSection
  parallel?: { enabled: boolean; max_workers: number }
}

export class DynamicPipelineBuilder {
  private _name: string | undefined
  private readonly _stages: PipelineStage[] = []
  private _strategy: StageSelectionStrategy | undefined
  private _retryPolicy: RetryPolicy = new RetryPolicy()
  private _observable: PipelineObservable = new PipelineObservable()
  private readonly _observers: PipelineObserver[] = []
  private _parallelEnabled = false
  private _maxWorkers = 4
  private _context: PipelineContext = {}
  private _sleep: ((seconds: number) => Promise<void>) | undefined
  private _classifier: StageComplexityClassifier | undefined
  private readonly _completed = new Map<CardId, ReadonlyMap<StageName, Record<string, unknown>>>()

  withName(name: string): this {
    this._name = name
    return this
  }

  addStage(stage: PipelineStage): this {
    this._stages.push(stage)
    return this
  }

  addStages(stages: readonly PipelineStage[]): this {
    this._stages.push(...stages)
    return this
  }

  withStrategy(strategy: StageSelectionStrategy): this {
    this._strategy = strategy
    return this
  }

  withRetryPolicy(policy: RetryPolicy): this {
    this._retryPolicy = policy
    return this
  }

  withObservable(observable: PipelineObservable): this {
    this._observable = observable
    return this
  }

  /** Attach an observer to whichever observable the pipeline ends up with */
  withObserver(observer: PipelineObserver): this {
    this._observers.push(observer)
    return this
  }

  withParallelism(enabled: boolean, maxWorkers = 4): this {
    this._parallelEnabled = enabled
    this._maxWorkers = maxWorkers
    return this
  }

  withContext(context: PipelineContext): this {
    this._context = { ...context }
    return this
  }

  /**
   * Stages `cardId` already completed, keyed by name with their result data.
   * The card's next run starts after them.
   */
  withCompletedResults(cardId: CardId, completed: ReadonlyMap<StageName, Record<string, unknown>>): this {
    this._completed.set(cardId, new Map(completed))
    return this
  }

  withComplexityClassifier(classifier: StageComplexityClassifier): this {
    this._classifier = classifier
    return this
  }

  /** Backoff sleep used by the stage executor (seconds) */
  withSleep(sleep: (seconds: number) => Promise<void>): this {
    this._sleep = sleep
    return this
  }

  /** Apply retry and parallelism defaults from loaded configuration */
  withConfig(config: PipelineConfigSections): this {
    if (config.retry !== undefined) {
      this._retryPolicy = RetryPolicy.fromConfig(config.retry)
    }
    if (config.parallel !== undefined) {
      this._parallelEnabled = config.parallel.enabled
      this._maxWorkers = config.parallel.max_workers
    }
    return this
  }

  build(): DynamicPipeline {
    this._validate()

    for (const observer of this._observers) {
      this._observable.attach(observer)
    }

    const executor = new StageExecutor({
      observable: this._observable,
      retryPolicy: this._retryPolicy,
      ...(this._sleep !== undefined ? { sleep: this._sleep } : {}),
    })
    const parallelExecutor = this._parallelEnabled
      ? new ParallelStageExecutor({ stageExecutor: executor, maxWorkers: this._maxWorkers })
      : undefined

    const pipeline = new DynamicPipeline({
      name: this._name ?? DEFAULT_PIPELINE_NAME,
      stages: this._stages,
      ...(this._strategy !== undefined ? { strategy: this._strategy } : {}),
      executor,
      ...(parallelExecutor !== undefined ? { parallelExecutor } : {}),
      observable: this._observable,
      context: this._context,
      ...(this._classifier !== undefined ? { classifier: this._classifier } : {}),
    })
    for (const [cardId, completed] of this._completed) {
      pipeline.seedResults(cardId, completed)
    }

    logger.info(
      { pipeline: pipeline.name, stages: this._stages.length, parallel: this._parallelEnabled },
      'Pipeline built'
    )
    return pipeline
  }

  private _validate(): void {
    if (this._stages.length === 0) {
      throw new PipelineConfigError('Pipeline must have at least one stage', { name: this._name })
    }

    const names = this._stages.map((s) => s.name)
    const duplicates = [...new Set(names.filter((name, i) => names.indexOf(name) !== i))]
    if (duplicates.length > 0) {
      throw new PipelineConfigError(`Pipeline has duplicate stage names: ${duplicates.join(', ')}`, {
        duplicates,
      })
    }

    const known = new Set(names)
    const invalid: string[] = []
    for (const stage of this._stages) {
      for (const dep of stage.getDependencies()) {
        if (!known.has(dep)) invalid.push(`${stage.name} -> ${dep}`)
      }
    }
    if (invalid.length > 0) {
      throw new PipelineConfigError(`Pipeline has invalid dependencies: ${invalid.join(', ')}`, {
        invalidDependencies: invalid,
      })
    }
  }
}
