/**
 * TwoPassGuidance: quality assessment and pass-strategy planning for the
 * two-pass pipeline.
 *
 * Cheapest source first:
 *  1. precomputed values derived from the router intensity
 *  2. conservative defaults when no assessment service is configured
 *  3. a QualityAssessmentService call
 */

import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'

const logger = createLogger('two-pass:guidance')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TwoPassGuidanceConfig {
  /** Router intensity, 0.0 – 1.0 */
  intensity: number
  /** Free-form router guidance passed to the service */
  guidance: string
  qualityThreshold: number
  /** Seconds */
  firstPassTimeout: number
  /** Seconds */
  secondPassTimeout: number
  firstPassGuidance: string[]
  secondPassGuidance: string[]
}

export const DEFAULT_GUIDANCE_CONFIG: TwoPassGuidanceConfig = {
  intensity: 0.5,
  guidance: '',
  qualityThreshold: 0.7,
  firstPassTimeout: 30,
  secondPassTimeout: 120,
  firstPassGuidance: [],
  secondPassGuidance: [],
}

export interface QualityAssessmentRequest {
  code: string
  requirements?: string
  previousVersion?: string
}

export interface ServiceQualityAssessment {
  overallScore: number
  criteriaScores: Record<string, number>
  suggestions: string[]
  reasoning?: string
  /** Present when a previous version was supplied */
  improvement?: number
}

export interface ComplexityClassification {
  complexityLevel: string
  estimatedDuration?: number
  analysis?: string
}

/** External assessment backend (an LLM-backed service in production) */
export interface QualityAssessmentService {
  assessQuality(request: QualityAssessmentRequest): Promise<ServiceQualityAssessment>
  classifyComplexity(request: { requirements: string; context: string }): Promise<ComplexityClassification>
}

export type GuidanceSource = 'router_precomputed' | 'fallback_no_ai_service' | 'ai_assessed' | 'ai_optimized'

export interface QualityAssessment {
  overallScore: number
  criteriaScores: Record<string, number>
  improvement: number
  meetsThreshold: boolean
  source: GuidanceSource
  suggestions: string[]
  reasoning?: string
}

export interface PassStrategyPlan {
  firstPassFocus: string[]
  secondPassFocus: string[]
  /** Seconds */
  recommendedTimeouts: { firstPass: number; secondPass: number }
  parallelization: boolean
  rollbackLikelihood: number
  source: GuidanceSource
  intensity: number
  complexityLevel?: string
  estimatedDuration?: number
}

// ---------------------------------------------------------------------------
// Complexity dispatch
// ---------------------------------------------------------------------------

interface ComplexityStrategy {
  firstFocus: string[]
  secondFocus: string[]
  timeoutFactors: readonly [number, number]
  parallel: boolean
  rollback: number
}

const MODERATE_STRATEGY: ComplexityStrategy = {
  firstFocus: ['Thorough analysis', 'Risk assessment', 'Architecture planning'],
  secondFocus: ['Structured implementation', 'Integration', 'Comprehensive testing'],
  timeoutFactors: [1, 1],
  parallel: false,
  rollback: 0.15,
}

/** Keyed by the service's complexity level; anything else gets MODERATE_STRATEGY */
const COMPLEXITY_STRATEGIES: ReadonlyMap<string, ComplexityStrategy> = new Map<string, ComplexityStrategy>([
  [
    'simple',
    {
      firstFocus: ['Quick validation', 'Schema check', 'Dependency scan'],
      secondFocus: ['Direct implementation', 'Simple testing'],
      timeoutFactors: [0.8, 0.8],
      parallel: false,
      rollback: 0.05,
    },
  ],
  ['moderate', MODERATE_STRATEGY],
  [
    'complex',
    {
      firstFocus: ['Deep analysis', 'Multiple risk scenarios', 'Detailed architecture', 'Prototyping'],
      secondFocus: [
        'Incremental implementation',
        'Continuous validation',
        'Extensive testing',
        'Performance optimization',
      ],
      timeoutFactors: [1.2, 1.3],
      parallel: true,
      rollback: 0.3,
    },
  ],
  [
    'very_complex',
    {
      firstFocus: [
        'Comprehensive analysis',
        'Multiple prototypes',
        'Risk mitigation plans',
        'Architecture validation',
      ],
      secondFocus: ['Phased implementation', 'Continuous feedback', 'Iterative refinement', 'Full test coverage'],
      timeoutFactors: [1.5, 1.5],
      parallel: true,
      rollback: 0.45,
    },
  ],
])

function mergeUnique(base: readonly string[], extra: readonly string[]): string[] {
  return [...new Set([...base, ...extra])]
}

// ---------------------------------------------------------------------------
// TwoPassGuidance
// ---------------------------------------------------------------------------

export class TwoPassGuidance {
  readonly config: TwoPassGuidanceConfig
  private readonly _service: QualityAssessmentService | undefined

  constructor(config: Partial<TwoPassGuidanceConfig> = {}, service?: QualityAssessmentService) {
    this.config = { ...DEFAULT_GUIDANCE_CONFIG, ...config }
    this._service = service
  }

  async assessPassQuality(request: QualityAssessmentRequest): Promise<QualityAssessment> {
    const { intensity, qualityThreshold } = this.config

    if (intensity < 0.4) {
      const score = Math.min(1, 0.5 + intensity * 0.5)
      return {
        overallScore: score,
        criteriaScores: { correctness: score, completeness: score, maintainability: score },
        improvement: 0,
        meetsThreshold: score >= qualityThreshold,
        source: 'router_precomputed',
        suggestions: [],
      }
    }

    if (this._service === undefined) {
      return {
        overallScore: qualityThreshold,
        criteriaScores: {
          correctness: qualityThreshold,
          completeness: qualityThreshold,
          maintainability: qualityThreshold,
        },
        improvement: 0,
        meetsThreshold: true,
        source: 'fallback_no_ai_service',
        suggestions: [],
      }
    }

    const assessed = await this._service.assessQuality(request)
    return {
      overallScore: assessed.overallScore,
      criteriaScores: assessed.criteriaScores,
      improvement: request.previousVersion !== undefined ? (assessed.improvement ?? 0) : 0,
      meetsThreshold: assessed.overallScore >= qualityThreshold,
      source: 'ai_assessed',
      suggestions: assessed.suggestions,
      ...(assessed.reasoning !== undefined ? { reasoning: assessed.reasoning } : {}),
    }
  }

  async optimizePassStrategy(requirements: string): Promise<PassStrategyPlan> {
    const cfg = this.config
    const configuredTimeouts = { firstPass: cfg.firstPassTimeout, secondPass: cfg.secondPassTimeout }

    if (cfg.intensity < 0.5) {
      return {
        firstPassFocus:
          cfg.firstPassGuidance.length > 0
            ? [...cfg.firstPassGuidance]
            : ['Validate requirements', 'Check for obvious issues', 'Quick feasibility check'],
        secondPassFocus:
          cfg.secondPassGuidance.length > 0
            ? [...cfg.secondPassGuidance]
            : ['Implement core functionality', 'Apply first pass learnings'],
        recommendedTimeouts: configuredTimeouts,
        parallelization: false,
        rollbackLikelihood: 0.1,
        source: 'router_precomputed',
        intensity: cfg.intensity,
      }
    }

    if (this._service === undefined) return this._fallbackPlan()

    let classification: ComplexityClassification
    try {
      classification = await this._service.classifyComplexity({
        requirements,
        context:
          `Two-pass pipeline optimization. Initial intensity: ${String(Math.round(cfg.intensity * 100))}%. ` +
          `Router guidance: ${cfg.guidance.slice(0, 200)}...`,
      })
    } catch (err) {
      logger.warn({ err: toError(err) }, 'Complexity classification failed; using fallback strategy')
      return this._fallbackPlan()
    }

    let strategy = COMPLEXITY_STRATEGIES.get(classification.complexityLevel)
    if (strategy === undefined) {
      logger.warn({ complexityLevel: classification.complexityLevel }, 'Unknown complexity level; using moderate')
      strategy = MODERATE_STRATEGY
    }

    return {
      firstPassFocus: mergeUnique(strategy.firstFocus, cfg.firstPassGuidance),
      secondPassFocus: mergeUnique(strategy.secondFocus, cfg.secondPassGuidance),
      recommendedTimeouts: {
        firstPass: Math.trunc(cfg.firstPassTimeout * strategy.timeoutFactors[0]),
        secondPass: Math.trunc(cfg.secondPassTimeout * strategy.timeoutFactors[1]),
      },
      parallelization: strategy.parallel,
      rollbackLikelihood: strategy.rollback,
      source: 'ai_optimized',
      intensity: cfg.intensity,
      complexityLevel: classification.complexityLevel,
      ...(classification.estimatedDuration !== undefined
        ? { estimatedDuration: classification.estimatedDuration }
        : {}),
    }
  }

  /** Conservative plan used when no service is configured or the service fails */
  private _fallbackPlan(): PassStrategyPlan {
    const cfg = this.config
    return {
      firstPassFocus:
        cfg.firstPassGuidance.length > 0
          ? [...cfg.firstPassGuidance]
          : ['Analyze requirements', 'Identify risks', 'Create execution plan'],
      secondPassFocus:
        cfg.secondPassGuidance.length > 0
          ? [...cfg.secondPassGuidance]
          : ['Full implementation', 'Apply optimizations', 'Integrate learnings'],
      recommendedTimeouts: { firstPass: cfg.firstPassTimeout, secondPass: cfg.secondPassTimeout },
      parallelization: cfg.intensity > 0.7,
      rollbackLikelihood: 0.3,
      source: 'fallback_no_ai_service',
      intensity: cfg.intensity,
    }
  }
}
