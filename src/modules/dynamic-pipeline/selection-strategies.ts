/**
 * Stage selection strategies: decide which of the registered stages a
 * pipeline run includes.
 *
 * Name matching is substring-based and case-insensitive, so a stage called
 * `backend_unit_tests` matches the `unit_tests` pattern.
 */

import type { PipelineContext, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { StageDAG } from '../stage-dag/index.js'
import { buildStageGraph } from './parallel-stage-executor.js'
import type { PipelineStage } from './types.js'

const logger = createLogger('pipeline:selection')

export interface StageSelectionStrategy {
  readonly name: string
  selectStages(available: readonly PipelineStage[], context: PipelineContext): PipelineStage[]
}

function nameMatches(stage: PipelineStage, patterns: readonly string[]): boolean {
  const lower = stage.name.toLowerCase()
  return patterns.some((pattern) => lower.includes(pattern))
}

// ---------------------------------------------------------------------------
// ComplexityBasedSelector
// ---------------------------------------------------------------------------

export type ProjectComplexity = 'simple' | 'moderate' | 'complex' | 'enterprise'

const PROJECT_COMPLEXITIES: readonly ProjectComplexity[] = ['simple', 'moderate', 'complex', 'enterprise']

/** Stage-name patterns per complexity; null selects every stage */
const COMPLEXITY_PATTERNS: Record<ProjectComplexity, readonly string[] | null> = {
  simple: ['requirements', 'development', 'unit_tests', 'integration'],
  moderate: ['requirements', 'development', 'unit_tests', 'integration', 'code_review', 'validation'],
  complex: [
    'requirements',
    'architecture',
    'development',
    'code_review',
    'unit_tests',
    'integration',
    'security',
    'performance',
    'validation',
  ],
  enterprise: null,
}

export function isProjectComplexity(value: unknown): value is ProjectComplexity {
  return typeof value === 'string' && PROJECT_COMPLEXITIES.some((c) => c === value)
}

export class ComplexityBasedSelector implements StageSelectionStrategy {
  readonly name = 'complexity'
  private readonly _complexity: ProjectComplexity | undefined

  /** Without an explicit complexity, `context.complexity` is used (default moderate) */
  constructor(complexity?: ProjectComplexity) {
    this._complexity = complexity
  }

  selectStages(available: readonly PipelineStage[], context: PipelineContext): PipelineStage[] {
    const complexity = this._resolveComplexity(context)
    const patterns = COMPLEXITY_PATTERNS[complexity]
    const selected = patterns === null ? [...available] : available.filter((s) => nameMatches(s, patterns))
    logger.info({ complexity, selected: selected.length, available: available.length }, 'Stages selected by complexity')
    return selected
  }

  private _resolveComplexity(context: PipelineContext): ProjectComplexity {
    if (this._complexity !== undefined) return this._complexity
    const fromContext = context.complexity
    if (fromContext === undefined) return 'moderate'
    if (isProjectComplexity(fromContext)) return fromContext
    logger.warn({ complexity: fromContext }, 'Invalid complexity in context; defaulting to moderate')
    return 'moderate'
  }
}

// ---------------------------------------------------------------------------
// ResourceBasedSelector
// ---------------------------------------------------------------------------

export type ResourceProfile = 'low' | 'medium' | 'high'

export interface AvailableResources {
  cpuCores: number
  memoryGb: number
  timeBudgetMinutes: number
}

const EXPENSIVE_STAGE_PATTERNS = ['performance', 'load_test', 'security_scan', 'ui_test'] as const
const CRITICAL_STAGE_PATTERNS = ['requirements', 'development', 'unit_tests'] as const

export function determineResourceProfile(resources: AvailableResources): ResourceProfile {
  const { cpuCores, memoryGb, timeBudgetMinutes } = resources
  if (cpuCores <= 2 || memoryGb <= 4 || timeBudgetMinutes <= 30) return 'low'
  if (cpuCores >= 8 && memoryGb >= 16 && timeBudgetMinutes >= 120) return 'high'
  return 'medium'
}

export class ResourceBasedSelector implements StageSelectionStrategy {
  readonly name = 'resource'
  private readonly _resources: AvailableResources | undefined

  /** Without explicit resources, `cpu_cores`, `memory_gb` and `time_budget_minutes` are read from the context */
  constructor(resources?: AvailableResources) {
    this._resources = resources
  }

  selectStages(available: readonly PipelineStage[], context: PipelineContext): PipelineStage[] {
    const resources = this._resources ?? {
      cpuCores: numberOr(context.cpu_cores, 4),
      memoryGb: numberOr(context.memory_gb, 8),
      timeBudgetMinutes: numberOr(context.time_budget_minutes, 60),
    }
    const profile = determineResourceProfile(resources)

    let selected: PipelineStage[]
    switch (profile) {
      case 'high':
        selected = [...available]
        break
      case 'medium':
        selected = available.filter((s) => !nameMatches(s, EXPENSIVE_STAGE_PATTERNS))
        break
      case 'low':
        selected = available.filter((s) => nameMatches(s, CRITICAL_STAGE_PATTERNS))
        break
    }

    logger.info({ profile, ...resources, selected: selected.length }, 'Stages selected by resources')
    return selected
  }
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback
}

// ---------------------------------------------------------------------------
// ManualSelector
// ---------------------------------------------------------------------------

export class ManualSelector implements StageSelectionStrategy {
  readonly name = 'manual'
  private readonly _names: ReadonlySet<StageName>

  constructor(names: readonly StageName[]) {
    this._names = new Set(names)
  }

  selectStages(available: readonly PipelineStage[], _context: PipelineContext): PipelineStage[] {
    const selected = available.filter((s) => this._names.has(s.name))
    const availableNames = new Set(available.map((s) => s.name))
    const missing = [...this._names].filter((name) => !availableNames.has(name))
    if (missing.length > 0) {
      logger.warn({ missing }, 'Requested stages not found')
    }
    return selected
  }
}

// ---------------------------------------------------------------------------
// DependencyOrderSelector
// ---------------------------------------------------------------------------

/** Selects every stage, reordered so dependencies come first */
export class DependencyOrderSelector implements StageSelectionStrategy {
  readonly name = 'dependency-order'

  selectStages(available: readonly PipelineStage[], _context: PipelineContext): PipelineStage[] {
    const byName = new Map(available.map((s) => [s.name, s]))
    const order = new StageDAG(buildStageGraph(available)).topologicalSort(available.map((s) => s.name))
    return order.flatMap((name) => {
      const stage = byName.get(name)
      return stage === undefined ? [] : [stage]
    })
  }
}
