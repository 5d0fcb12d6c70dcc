/**
 * PipelineOptimizer: execution-plan and parallelization advice for the
 * selected stages.
 *
 * Same ladder as TwoPassGuidance, cheapest first:
 *  1. router values already in the pipeline context
 *  2. conservative defaults when no classifier is configured (or it fails)
 *  3. a complexity classification from the configured service
 *
 * Parallel groups come from dependency levels, so a group never holds a
 * stage together with one of its dependencies.
 */

import { z } from 'zod'
import type { PipelineContext, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { computeExecutionLevels } from './parallel-stage-executor.js'
import type { PipelineStage } from './types.js'

const logger = createLogger('pipeline:optimizer')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** External complexity backend; TwoPassGuidance's assessment service fits */
export interface StageComplexityClassifier {
  classifyComplexity(request: {
    requirements: string
    context: string
  }): Promise<{ complexityLevel: string; estimatedDuration?: number; analysis?: string }>
}

/** Router hints read from the initial pipeline context */
export interface RouterHints {
  intensity: number
  guidance: string
  suggestedWorkers: number
  priorityStages: StageName[]
  optionalStages: StageName[]
}

export type OptimizationSource = 'router_precomputed' | 'fallback_no_ai_service' | 'ai_optimized' | 'ai_assessed'

interface ClassifierDetail {
  complexityLevel?: string
  estimatedDuration?: number
  analysis?: string
  warning?: string
}

export interface StageExecutionPlan extends ClassifierDetail {
  executionOrder: StageName[]
  parallelGroups: StageName[][]
  maxWorkers: number
  skipOptional: StageName[]
  intensity: number
  source: OptimizationSource
}

export interface ParallelizationAssessment extends ClassifierDetail {
  recommendedWorkers: number
  canParallelize: StageName[]
  mustSerialize: StageName[]
  /** Confidence that parallel execution is safe, 0.0 – 1.0 */
  safetyScore: number
  source: OptimizationSource
  /** recommendedWorkers minus the router's suggestion */
  adjustment?: number
}

// ---------------------------------------------------------------------------
// Router hints
// ---------------------------------------------------------------------------

const stageList = z.array(z.string()).catch([]).default([])

const RouterHintsSchema = z.object({
  intensity: z.number().min(0).max(1).catch(0.5).default(0.5),
  prompt: z.string().catch('').default(''),
  suggested_max_workers: z.number().int().min(1).catch(4).default(4),
  stages_to_prioritize: stageList,
  stages_optional: stageList,
})

/** Read router hints from a context; missing or malformed keys take defaults */
export function readRouterHints(context: PipelineContext): RouterHints {
  const parsed = RouterHintsSchema.parse(context)
  return {
    intensity: parsed.intensity,
    guidance: parsed.prompt,
    suggestedWorkers: parsed.suggested_max_workers,
    priorityStages: parsed.stages_to_prioritize,
    optionalStages: parsed.stages_optional,
  }
}

// ---------------------------------------------------------------------------
// Complexity dispatch
// ---------------------------------------------------------------------------

const WORKERS_BY_COMPLEXITY = new Map<string, number>([
  ['simple', 2],
  ['moderate', 4],
  ['complex', 6],
  ['very_complex', 8],
])

const SAFETY_BY_COMPLEXITY = new Map<string, number>([
  ['simple', 0.95],
  ['moderate', 0.85],
  ['complex', 0.7],
  ['very_complex', 0.6],
])

const DEFAULT_SAFETY = 0.75

/** Heavier pipelines get fewer workers, never below 2 */
function recommendedWorkers(complexityLevel: string, suggested: number): number {
  const adjustments = new Map<string, number>([
    ['simple', 0],
    ['moderate', -1],
    ['complex', -2],
    ['very_complex', 2 - suggested],
  ])
  return Math.max(2, suggested + (adjustments.get(complexityLevel) ?? -1))
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size))
  return chunks
}

// ---------------------------------------------------------------------------
// PipelineOptimizer
// ---------------------------------------------------------------------------

export class PipelineOptimizer {
  readonly hints: RouterHints
  private readonly _classifier: StageComplexityClassifier | undefined

  constructor(hints: RouterHints, classifier?: StageComplexityClassifier) {
    this.hints = hints
    this._classifier = classifier
  }

  /**
   * @throws {StageCycleError} when a classified plan meets a dependency cycle
   */
  async optimizeStageExecution(
    stages: readonly PipelineStage[],
    useInitialAnalysis = true
  ): Promise<StageExecutionPlan> {
    const { intensity, suggestedWorkers } = this.hints
    const names = stages.map((s) => s.name)
    const skipOptional = names.filter((name) => this.hints.optionalStages.includes(name))

    if (useInitialAnalysis && intensity < 0.5) {
      return {
        executionOrder: names,
        parallelGroups: [],
        maxWorkers: suggestedWorkers,
        skipOptional,
        intensity,
        source: 'router_precomputed',
      }
    }

    const classification = await this._classify(
      stages.map((s) => `- ${s.name}: depends on ${s.getDependencies().join(', ') || 'nothing'}`).join('\n'),
      `Initial intensity: ${String(Math.round(intensity * 100))}%. ` +
        `Priority stages: ${this.hints.priorityStages.join(', ')}. ` +
        `Router guidance: ${this.hints.guidance.slice(0, 200)}...`
    )

    if (!classification.ok) {
      const ready = computeExecutionLevels(stages)[0] ?? []
      const firstGroup = ready.slice(0, suggestedWorkers)
      return {
        executionOrder: names,
        parallelGroups: firstGroup.length > 1 ? [firstGroup] : [],
        maxWorkers: suggestedWorkers,
        skipOptional,
        intensity,
        source: 'fallback_no_ai_service',
        warning: classification.warning,
      }
    }

    const { complexityLevel } = classification.value
    const maxWorkers = WORKERS_BY_COMPLEXITY.get(complexityLevel) ?? suggestedWorkers
    const levels = computeExecutionLevels(stages).map((level) => this._prioritize(level))

    return {
      executionOrder: levels.flat(),
      parallelGroups: levels.flatMap((level) => chunk(level, maxWorkers)).filter((group) => group.length > 1),
      maxWorkers,
      skipOptional,
      intensity,
      source: 'ai_optimized',
      ...classification.value,
    }
  }

  async assessParallelization(
    stages: readonly PipelineStage[],
    useInitialAnalysis = true
  ): Promise<ParallelizationAssessment> {
    const { suggestedWorkers } = this.hints
    const names = stages.map((s) => s.name)

    if (useInitialAnalysis && suggestedWorkers <= 2) {
      return {
        recommendedWorkers: suggestedWorkers,
        canParallelize: [],
        mustSerialize: names,
        safetyScore: 1,
        source: 'router_precomputed',
      }
    }

    const classification = await this._classify(
      `Parallelization assessment for stages:\n` +
        stages.map((s) => `- ${s.name}: deps=${s.getDependencies().join(', ')}`).join('\n'),
      `Suggested workers: ${String(suggestedWorkers)}. Assess parallelization safety and dependencies.`
    )

    if (!classification.ok) {
      return {
        recommendedWorkers: suggestedWorkers,
        canParallelize: [],
        mustSerialize: names,
        safetyScore: 0.8,
        source: 'fallback_no_ai_service',
        warning: `${classification.warning}, conservative parallelization`,
      }
    }

    const { complexityLevel } = classification.value
    const workers = recommendedWorkers(complexityLevel, suggestedWorkers)
    return {
      recommendedWorkers: workers,
      canParallelize: stages.filter((s) => s.getDependencies().length === 0).map((s) => s.name),
      mustSerialize: stages.filter((s) => s.getDependencies().length > 0).map((s) => s.name),
      safetyScore: SAFETY_BY_COMPLEXITY.get(complexityLevel) ?? DEFAULT_SAFETY,
      source: 'ai_assessed',
      adjustment: workers - suggestedWorkers,
      ...classification.value,
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async _classify(
    requirements: string,
    context: string
  ): Promise<
    | { ok: true; value: Required<Pick<ClassifierDetail, 'complexityLevel'>> & ClassifierDetail }
    | { ok: false; warning: string }
  > {
    if (this._classifier === undefined) return { ok: false, warning: 'No AI service available' }
    try {
      const result = await this._classifier.classifyComplexity({ requirements, context })
      return {
        ok: true,
        value: {
          complexityLevel: result.complexityLevel,
          ...(result.estimatedDuration !== undefined ? { estimatedDuration: result.estimatedDuration } : {}),
          ...(result.analysis !== undefined ? { analysis: result.analysis } : {}),
        },
      }
    } catch (err) {
      const error = toError(err)
      logger.warn({ err: error }, 'Complexity classification failed; using fallback')
      return { ok: false, warning: `AI service failed: ${error.message}` }
    }
  }

  /** Priority stages first, optional stages last, input order otherwise */
  private _prioritize(level: readonly StageName[]): StageName[] {
    const { priorityStages, optionalStages } = this.hints
    const rank = (name: StageName): number =>
      priorityStages.includes(name) ? 0 : optionalStages.includes(name) ? 2 : 1
    return [...level].sort((a, b) => rank(a) - rank(b))
  }
}
