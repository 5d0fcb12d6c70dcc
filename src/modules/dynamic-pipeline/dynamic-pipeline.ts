/**
 * DynamicPipeline: a built, ready-to-run pipeline.
 *
 * Created by DynamicPipelineBuilder. Construction applies the selection
 * strategy and moves the lifecycle to `ready`; `execute()` runs the selected
 * stages once, after which `reset()` allows another run.
 *
 * Every run starts from the builder's context. Successful stage results are
 * cached per card, so a re-run (or a run seeded from a checkpoint) only
 * executes what that card has not finished yet.
 */

import { PipelineConfigError } from '../../core/errors.js'
import type { CardId, PipelineContext, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { StageDAG } from '../stage-dag/index.js'
import { LifecycleManager } from './lifecycle-manager.js'
import { PipelineObservable } from './observable.js'
import { ParallelStageExecutor, buildStageGraph } from './parallel-stage-executor.js'
import { PipelineOptimizer, readRouterHints } from './pipeline-optimizer.js'
import type {
  ParallelizationAssessment,
  StageComplexityClassifier,
  StageExecutionPlan,
} from './pipeline-optimizer.js'
import type { StageSelectionStrategy } from './selection-strategies.js'
import { StageExecutor } from './stage-executor.js'
import type { PipelineStage, PipelineState, StageResult } from './types.js'
import { stageSucceeded } from './types.js'

const logger = createLogger('pipeline:dynamic')

export interface DynamicPipelineOptions {
  name: string
  stages: readonly PipelineStage[]
  strategy?: StageSelectionStrategy
  executor: StageExecutor
  parallelExecutor?: ParallelStageExecutor
  observable: PipelineObservable
  context?: PipelineContext
  /** Complexity backend for optimizeStageExecution / assessParallelization */
  classifier?: StageComplexityClassifier
}

export class DynamicPipeline {
  readonly name: string
  private readonly _available: PipelineStage[]
  private _selected: PipelineStage[]
  private readonly _executor: StageExecutor
  private readonly _parallelExecutor: ParallelStageExecutor | undefined
  private readonly _observable: PipelineObservable
  private readonly _lifecycle: LifecycleManager
  private readonly _initialContext: PipelineContext
  private _context: PipelineContext
  private _results = new Map<StageName, StageResult>()
  private readonly _resultCache = new Map<CardId, Map<StageName, StageResult>>()
  private readonly _optimizer: PipelineOptimizer

  constructor(options: DynamicPipelineOptions) {
    this.name = options.name
    this._available = [...options.stages]
    this._executor = options.executor
    this._parallelExecutor = options.parallelExecutor
    this._observable = options.observable
    this._initialContext = { ...(options.context ?? {}) }
    this._context = { ...this._initialContext }
    this._lifecycle = new LifecycleManager({ pipelineName: this.name, observable: this._observable })
    this._optimizer = new PipelineOptimizer(readRouterHints(this._initialContext), options.classifier)

    this._selected =
      options.strategy !== undefined
        ? options.strategy.selectStages(this._available, this._context)
        : [...this._available]

    this._lifecycle.transitionToReady()
    logger.info(
      { pipeline: this.name, selected: this._selected.length, available: this._available.length },
      'Pipeline ready'
    )
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /**
   * Run the selected stages for a card.
   *
   * Stage failures are returned in the result map, never thrown. An
   * unexpected exception (for example a dependency cycle) marks the pipeline
   * failed and is rethrown.
   */
  async execute(cardId: CardId): Promise<Map<StageName, StageResult>> {
    this._lifecycle.startExecution(cardId)
    const cache = this._cacheFor(cardId)
    this._context = { ...this._initialContext, card_id: cardId }
    for (const [name, result] of cache) {
      this._context[`${name}_result`] = result.data
    }

    try {
      this._results =
        this._parallelExecutor !== undefined
          ? await this._executeParallel(this._parallelExecutor, cache, cardId)
          : await this._executeSequential(cache, cardId)

      const failures = [...this._results.values()].filter((r) => !r.success)
      if (failures.length > 0) {
        this._lifecycle.markFailed(failures)
      } else {
        this._lifecycle.markCompleted(this._results.size)
        logger.info({ pipeline: this.name, cardId, stages: this._results.size }, 'Pipeline completed')
      }
    } catch (err) {
      const error = toError(err)
      if (!this._lifecycle.isTerminal()) this._lifecycle.markError(error)
      throw error
    }
    return new Map(this._results)
  }

  private async _executeSequential(
    cache: Map<StageName, StageResult>,
    cardId: CardId
  ): Promise<Map<StageName, StageResult>> {
    const results = new Map<StageName, StageResult>()
    const byName = new Map(this._selected.map((s) => [s.name, s]))
    const order = new StageDAG(buildStageGraph(this._selected)).topologicalSort(this._selected.map((s) => s.name))

    for (const name of order) {
      const stage = byName.get(name)
      if (stage === undefined) continue

      const cached = cache.get(name)
      if (cached !== undefined) {
        logger.debug({ stageName: name, cardId }, 'Using cached stage result')
        results.set(name, cached)
        continue
      }

      await this._lifecycle.waitWhilePaused()
      const result = await this._executor.executeStage(stage, this._context, cardId)
      results.set(name, result)

      if (!result.success) {
        logger.error({ stageName: name, cardId }, 'Stage failed; stopping pipeline')
        break
      }
      this._record(cache, result)
    }
    return results
  }

  private async _executeParallel(
    executor: ParallelStageExecutor,
    cache: Map<StageName, StageResult>,
    cardId: CardId
  ): Promise<Map<StageName, StageResult>> {
    const results = new Map<StageName, StageResult>()
    for (const stage of this._selected) {
      const cached = cache.get(stage.name)
      if (cached !== undefined) results.set(stage.name, cached)
    }
    // cached stages drop out of the graph, so their dependents start as roots
    const remaining = this._selected.filter((s) => !results.has(s.name))
    const ran = await executor.executeStagesParallel(remaining, this._context, cardId, () =>
      this._lifecycle.waitWhilePaused()
    )
    for (const result of ran.values()) {
      results.set(result.stageName, result)
      if (result.success) this._record(cache, result)
    }
    return results
  }

  private _record(cache: Map<StageName, StageResult>, result: StageResult): void {
    cache.set(result.stageName, result)
    this._context[`${result.stageName}_result`] = result.data
  }

  private _cacheFor(cardId: CardId): Map<StageName, StageResult> {
    let cache = this._resultCache.get(cardId)
    if (cache === undefined) {
      cache = new Map()
      this._resultCache.set(cardId, cache)
    }
    return cache
  }

  /**
   * Record stages a card already completed (for example from a checkpoint)
   * so the next run for that card starts after them.
   */
  seedResults(cardId: CardId, completed: ReadonlyMap<StageName, Record<string, unknown>>): void {
    const cache = this._cacheFor(cardId)
    for (const [name, data] of completed) {
      cache.set(name, stageSucceeded(name, { ...data }))
    }
    logger.info({ pipeline: this.name, cardId, seeded: [...completed.keys()] }, 'Seeded completed stages')
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  pause(): void {
    this._lifecycle.pause()
  }

  resume(): void {
    this._lifecycle.resume()
  }

  /** Make a completed or failed pipeline runnable again */
  reset(): void {
    this._lifecycle.reset()
    this._results = new Map()
  }

  /** Forget cached results for every card */
  clearCache(): void {
    this._resultCache.clear()
    logger.debug({ pipeline: this.name }, 'Result cache cleared')
  }

  getState(): PipelineState {
    return this._lifecycle.state
  }

  get lifecycle(): LifecycleManager {
    return this._lifecycle
  }

  // -------------------------------------------------------------------------
  // Runtime modification
  // -------------------------------------------------------------------------

  addStageRuntime(stage: PipelineStage): void {
    this._lifecycle.validateStageModification('add stage')

    const names = new Set(this._available.map((s) => s.name))
    if (names.has(stage.name)) {
      throw new PipelineConfigError(`Stage already exists: ${stage.name}`, { stage: stage.name })
    }
    const missing = stage.getDependencies().filter((dep) => !names.has(dep))
    if (missing.length > 0) {
      throw new PipelineConfigError(`Stage ${stage.name} has unknown dependencies: ${missing.join(', ')}`, {
        stage: stage.name,
        missing,
      })
    }

    this._available.push(stage)
    this._selected.push(stage)
    logger.info({ pipeline: this.name, stageName: stage.name }, 'Stage added at runtime')
    this._observable.emit('stage:added', this._eventCardId(), { stageName: stage.name })
  }

  removeStageRuntime(stageName: StageName): void {
    this._lifecycle.validateStageModification('remove stage')

    if (!this._available.some((s) => s.name === stageName)) {
      throw new PipelineConfigError(`Unknown stage: ${stageName}`, { stage: stageName })
    }
    const dependents = this._available
      .filter((s) => s.name !== stageName && s.getDependencies().includes(stageName))
      .map((s) => s.name)
    if (dependents.length > 0) {
      throw new PipelineConfigError(`Stage ${stageName} is required by: ${dependents.join(', ')}`, {
        stage: stageName,
        dependents,
      })
    }

    const index = this._available.findIndex((s) => s.name === stageName)
    this._available.splice(index, 1)
    this._selected = this._selected.filter((s) => s.name !== stageName)
    for (const cache of this._resultCache.values()) cache.delete(stageName)
    logger.info({ pipeline: this.name, stageName }, 'Stage removed at runtime')
    this._observable.emit('stage:removed', this._eventCardId(), { stageName })
  }

  // -------------------------------------------------------------------------
  // Optimization
  // -------------------------------------------------------------------------

  /** Execution plan for the selected stages; see PipelineOptimizer */
  optimizeStageExecution(useInitialAnalysis = true): Promise<StageExecutionPlan> {
    return this._optimizer.optimizeStageExecution(this._selected, useInitialAnalysis)
  }

  assessParallelization(useInitialAnalysis = true): Promise<ParallelizationAssessment> {
    return this._optimizer.assessParallelization(this._selected, useInitialAnalysis)
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  /** Selected stages, in selection order */
  getStages(): PipelineStage[] {
    return [...this._selected]
  }

  getResults(): Map<StageName, StageResult> {
    return new Map(this._results)
  }

  getContext(): PipelineContext {
    return { ...this._context }
  }

  private _eventCardId(): CardId {
    return this._lifecycle.cardId ?? this.name
  }
}
