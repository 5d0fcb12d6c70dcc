/**
 * ParallelStageExecutor: runs independent stages concurrently while
 * respecting declared dependencies.
 *
 * Scheduling:
 *  - Stages are ordered once with StageDAG (a cycle throws before any work)
 *  - A stage becomes ready when every in-set dependency has succeeded
 *  - Ready stages launch in topological order while fewer than maxWorkers
 *    are in flight; the loop waits on Promise.race and re-evaluates
 *  - A failed stage blocks all transitive dependents, which are reported as
 *    failed with data.blockedBy; unrelated branches keep running
 *  - `waitWhilePaused` is awaited before each scheduling pass; stages already
 *    in flight finish, nothing new launches until it resolves
 */

import { PipelineConfigError } from '../../core/errors.js'
import type { CardId, PipelineContext, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { StageDAG } from '../stage-dag/index.js'
import type { DependencyGraph } from '../stage-dag/index.js'
import { StageExecutor } from './stage-executor.js'
import type { PipelineStage, StageResult } from './types.js'
import { stageFailed } from './types.js'

const logger = createLogger('pipeline:parallel-executor')

export interface ParallelStageExecutorOptions {
  stageExecutor: StageExecutor
  /** Upper bound on concurrently running stages (default 4) */
  maxWorkers?: number
}

/** Dependency graph of `stages` restricted to names present in the set */
export function buildStageGraph(stages: readonly PipelineStage[]): DependencyGraph {
  const names = new Set(stages.map((s) => s.name))
  const graph: DependencyGraph = {}
  for (const stage of stages) {
    graph[stage.name] = stage.getDependencies().filter((dep) => names.has(dep))
  }
  return graph
}

/**
 * Group stages by dependency depth: level 0 has no in-set dependencies,
 * level n depends on something in level n - 1.
 *
 * @throws {StageCycleError} when the stages contain a dependency cycle
 */
export function computeExecutionLevels(stages: readonly PipelineStage[]): StageName[][] {
  const graph = buildStageGraph(stages)
  const order = new StageDAG(graph).topologicalSort(stages.map((s) => s.name))
  const depth = new Map<StageName, number>()
  const levels: StageName[][] = []

  for (const name of order) {
    const deps = graph[name] ?? []
    const level = deps.reduce((max, dep) => Math.max(max, (depth.get(dep) ?? 0) + 1), 0)
    depth.set(name, level)
    const bucket = levels[level]
    if (bucket === undefined) {
      levels[level] = [name]
    } else {
      bucket.push(name)
    }
  }
  return levels
}

export class ParallelStageExecutor {
  readonly maxWorkers: number
  private readonly _stageExecutor: StageExecutor

  constructor(options: ParallelStageExecutorOptions) {
    const maxWorkers = options.maxWorkers ?? 4
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new PipelineConfigError(`maxWorkers must be a positive integer, got ${String(maxWorkers)}`, {
        maxWorkers,
      })
    }
    this.maxWorkers = maxWorkers
    this._stageExecutor = options.stageExecutor
  }

  async executeStagesParallel(
    stages: readonly PipelineStage[],
    context: PipelineContext,
    cardId: CardId,
    waitWhilePaused: () => Promise<void> = () => Promise.resolve()
  ): Promise<Map<StageName, StageResult>> {
    const graph = buildStageGraph(stages)
    const dag = new StageDAG(graph)
    const order = dag.topologicalSort(stages.map((s) => s.name))
    const byName = new Map(stages.map((s) => [s.name, s]))

    const results = new Map<StageName, StageResult>()
    const pending: StageName[] = [...order]
    const running = new Map<StageName, Promise<void>>()

    logger.debug({ cardId, stages: order.length, maxWorkers: this.maxWorkers }, 'Parallel execution started')

    const launch = (stage: PipelineStage): void => {
      const task: Promise<void> = this._stageExecutor
        .executeStage(stage, context, cardId)
        .then(
          (result) => {
            results.set(stage.name, result)
          },
          (err: unknown) => {
            const error = toError(err)
            logger.error({ stageName: stage.name, cardId, err: error }, 'Stage executor rejected')
            results.set(stage.name, stageFailed(stage.name, error))
          }
        )
        .finally(() => {
          running.delete(stage.name)
        })
      running.set(stage.name, task)
    }

    for (;;) {
      if (pending.length > 0) await waitWhilePaused()
      this._scheduleReady(pending, graph, byName, results, running, cardId, launch)
      if (running.size === 0) break
      await Promise.race(running.values())
    }

    logger.debug({ cardId, completed: results.size }, 'Parallel execution finished')
    return results
  }

  getExecutionLevels(stages: readonly PipelineStage[]): StageName[][] {
    return computeExecutionLevels(stages)
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private _scheduleReady(
    pending: StageName[],
    graph: DependencyGraph,
    byName: Map<StageName, PipelineStage>,
    results: Map<StageName, StageResult>,
    running: Map<StageName, Promise<void>>,
    cardId: CardId,
    launch: (stage: PipelineStage) => void
  ): void {
    // pending is in topological order, so a blocked dependency is recorded
    // before any of its dependents are examined
    let i = 0
    while (i < pending.length) {
      const name = pending[i]
      const stage = name !== undefined ? byName.get(name) : undefined
      if (name === undefined || stage === undefined) {
        pending.splice(i, 1)
        continue
      }

      const deps = graph[name] ?? []
      const blockedBy = deps.find((dep) => {
        const result = results.get(dep)
        return result !== undefined && !result.success
      })

      if (blockedBy !== undefined) {
        pending.splice(i, 1)
        const error = new Error(`Blocked by failed dependency: ${blockedBy}`)
        logger.warn({ stageName: name, cardId, blockedBy }, 'Stage blocked by failed dependency')
        this._stageExecutor.observable.emit('stage:failed', cardId, {
          stageName: name,
          data: { blockedBy },
          error,
        })
        results.set(name, stageFailed(name, error, { data: { blockedBy } }))
        continue
      }

      const ready = deps.every((dep) => results.get(dep)?.success === true)
      if (ready && running.size < this.maxWorkers) {
        pending.splice(i, 1)
        launch(stage)
        continue
      }
      i += 1
    }
  }
}
