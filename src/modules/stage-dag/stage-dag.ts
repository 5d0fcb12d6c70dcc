/**
 * StageDAG: stage dependency graph with topological ordering and
 * critical-path computation.
 *
 * Provides:
 *  - topologicalSort: Kahn's algorithm restricted to a stage subset, FIFO
 *    tie-break in input order
 *  - criticalPath: CPM forward/backward pass over the same subset
 *  - Cycle reporting via StageCycleError (a configuration error)
 *
 * Results are pure functions of (stage list, graph, durations) and are
 * memoised per stage list.
 */

import { StageCycleError } from '../../core/errors.js'
import type { StageName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Stage name → names of the stages it depends on */
export type DependencyGraph = Record<StageName, readonly StageName[]>

/** Stage name → estimated duration (any consistent unit) */
export type DurationTable = Record<StageName, number>

export interface CriticalPathResult {
  /** Stages with zero slack, in topological order */
  path: StageName[]
  /** Length of the longest dependency chain by summed durations */
  totalDuration: number
}

/** Duration used for stages missing from the duration table */
export const DEFAULT_STAGE_DURATION = 1

// ---------------------------------------------------------------------------
// StageDAG
// ---------------------------------------------------------------------------

export class StageDAG {
  private readonly _dependencies: Map<StageName, readonly StageName[]>
  private readonly _dependents: Map<StageName, StageName[]>
  private readonly _durations: Map<StageName, number>
  private readonly _sortCache = new Map<string, StageName[]>()
  private readonly _pathCache = new Map<string, CriticalPathResult>()

  constructor(graph: DependencyGraph, durations: DurationTable = {}) {
    this._dependencies = new Map(Object.entries(graph))
    this._durations = new Map(Object.entries(durations))
    this._dependents = new Map()

    for (const [stage, deps] of this._dependencies) {
      if (!this._dependents.has(stage)) this._dependents.set(stage, [])
      for (const dep of deps) {
        const list = this._dependents.get(dep)
        if (list === undefined) {
          this._dependents.set(dep, [stage])
        } else {
          list.push(stage)
        }
      }
    }
  }

  /** Declared dependencies of a stage (empty when unknown) */
  getDependencies(stage: StageName): StageName[] {
    return [...(this._dependencies.get(stage) ?? [])]
  }

  /** Stages that declare a dependency on `stage`, in registration order */
  getDependents(stage: StageName): StageName[] {
    return [...(this._dependents.get(stage) ?? [])]
  }

  /** Duration of a stage, falling back to DEFAULT_STAGE_DURATION */
  getDuration(stage: StageName): number {
    return this._durations.get(stage) ?? DEFAULT_STAGE_DURATION
  }

  /**
   * Order `stages` so that every stage comes after all of its in-set
   * dependencies. Dependencies outside the set are ignored.
   *
   * @throws {StageCycleError} when the subset contains a dependency cycle
   */
  topologicalSort(stages: Iterable<StageName>): StageName[] {
    const input = uniqueInOrder(stages)
    const key = cacheKey(input)
    const cached = this._sortCache.get(key)
    if (cached !== undefined) return [...cached]

    const inSet = new Set(input)
    const inDegree = new Map<StageName, number>()
    for (const stage of input) {
      const deps = (this._dependencies.get(stage) ?? []).filter((d) => inSet.has(d))
      inDegree.set(stage, deps.length)
    }

    const queue: StageName[] = input.filter((stage) => inDegree.get(stage) === 0)
    const ordered: StageName[] = []

    while (queue.length > 0) {
      const stage = queue.shift()
      if (stage === undefined) break
      ordered.push(stage)

      for (const dependent of this._dependents.get(stage) ?? []) {
        if (!inSet.has(dependent)) continue
        const remaining = (inDegree.get(dependent) ?? 0) - 1
        inDegree.set(dependent, remaining)
        if (remaining === 0) queue.push(dependent)
      }
    }

    if (ordered.length < input.length) {
      const placed = new Set(ordered)
      const unordered = input.filter((stage) => !placed.has(stage))
      throw new StageCycleError(this._findCycle(unordered) ?? unordered)
    }

    this._sortCache.set(key, ordered)
    return [...ordered]
  }

  /**
   * Critical Path Method over `stages`.
   *
   * earliestStart(s) = max over in-set deps d of earliestStart(d) + duration(d)
   * latestStart(s)   = min over in-set dependents t of latestStart(t) - duration(s),
   *                    or totalDuration - duration(s) when s has no in-set dependents
   *
   * @throws {StageCycleError} when the subset contains a dependency cycle
   */
  criticalPath(stages: Iterable<StageName>): CriticalPathResult {
    const order = this.topologicalSort(stages)
    const key = cacheKey(order)
    const cached = this._pathCache.get(key)
    if (cached !== undefined) return { path: [...cached.path], totalDuration: cached.totalDuration }

    if (order.length === 0) return { path: [], totalDuration: 0 }

    const inSet = new Set(order)
    const earliest = new Map<StageName, number>()
    for (const stage of order) {
      let start = 0
      for (const dep of this._dependencies.get(stage) ?? []) {
        if (!inSet.has(dep)) continue
        start = Math.max(start, (earliest.get(dep) ?? 0) + this.getDuration(dep))
      }
      earliest.set(stage, start)
    }

    const totalDuration = Math.max(
      ...order.map((stage) => (earliest.get(stage) ?? 0) + this.getDuration(stage))
    )

    const latest = new Map<StageName, number>()
    for (const stage of [...order].reverse()) {
      const duration = this.getDuration(stage)
      const dependents = (this._dependents.get(stage) ?? []).filter((d) => inSet.has(d))
      if (dependents.length === 0) {
        latest.set(stage, totalDuration - duration)
        continue
      }
      let start = Number.POSITIVE_INFINITY
      for (const dependent of dependents) {
        start = Math.min(start, (latest.get(dependent) ?? totalDuration) - duration)
      }
      latest.set(stage, start)
    }

    const path = order.filter((stage) => nearlyEqual(earliest.get(stage), latest.get(stage)))
    const result: CriticalPathResult = { path, totalDuration }
    this._pathCache.set(key, result)
    return { path: [...path], totalDuration }
  }

  /** Drop memoised results */
  clearCache(): void {
    this._sortCache.clear()
    this._pathCache.clear()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * DFS over the stages Kahn's algorithm could not place, returning one
   * cycle path such as ['a', 'b', 'a'].
   */
  private _findCycle(candidates: StageName[]): StageName[] | null {
    const inSet = new Set(candidates)
    const visited = new Set<StageName>()
    const inStack = new Set<StageName>()

    const dfs = (stage: StageName, path: StageName[]): StageName[] | null => {
      visited.add(stage)
      inStack.add(stage)
      for (const dep of this._dependencies.get(stage) ?? []) {
        if (!inSet.has(dep)) continue
        if (inStack.has(dep)) {
          return [...path.slice(path.indexOf(dep)), dep]
        }
        if (!visited.has(dep)) {
          const cycle = dfs(dep, [...path, dep])
          if (cycle !== null) return cycle
        }
      }
      inStack.delete(stage)
      return null
    }

    for (const stage of candidates) {
      if (visited.has(stage)) continue
      const cycle = dfs(stage, [stage])
      if (cycle !== null) return cycle
    }
    return null
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

function uniqueInOrder(stages: Iterable<StageName>): StageName[] {
  return [...new Set(stages)]
}

/** Memo key: order-preserving so the FIFO tie-break stays tied to input order */
function cacheKey(stages: StageName[]): string {
  return JSON.stringify(stages)
}

function nearlyEqual(a: number | undefined, b: number | undefined): boolean {
  if (a === undefined || b === undefined) return false
  return Math.abs(a - b) < 1e-9
}

/**
 * Build a StageDAG from stage descriptors.
 *
 * @example
 * const dag = createStageDAG(stages.map((s) => ({ name: s.name, dependencies: s.getDependencies() })))
 */
export function createStageDAG(
  stages: Iterable<{ name: StageName; dependencies: readonly StageName[]; duration?: number }>
): StageDAG {
  const graph: Record<StageName, readonly StageName[]> = {}
  const durations: DurationTable = {}
  for (const stage of stages) {
    graph[stage.name] = stage.dependencies
    if (stage.duration !== undefined) durations[stage.name] = stage.duration
  }
  return new StageDAG(graph, durations)
}
