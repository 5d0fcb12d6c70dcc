/**
 * SecondPassStrategy: the refined pass that applies first-pass learnings.
 *
 * Each learning carried in the context becomes a refinement, classified by
 * keyword. Quality = passed / (passed + failed) plus 0.02 per refinement
 * (bonus capped at 0.1, score capped at 1), or 0.6 when nothing was checked.
 */

import type { PipelineContext } from '../../../core/types.js'
import { createPassResult } from '../models.js'
import type { PassResult } from '../models.js'
import { BasePassStrategy, elapsedSeconds } from './base-strategy.js'
import type { PassChecks, PassRunOutput } from './base-strategy.js'

export const SECOND_PASS_NAME = 'SecondPass'

export type RefinementType = 'validation' | 'performance' | 'quality'

export interface Refinement {
  type: RefinementType
  learning: string
}

/** Keyword → refinement type; first match wins, default quality */
const LEARNING_KEYWORDS: ReadonlyArray<readonly [string, RefinementType]> = [
  ['validation', 'validation'],
  ['validated', 'validation'],
  ['performance', 'performance'],
  ['faster', 'performance'],
  ['quality', 'quality'],
  ['improved', 'quality'],
]

export function classifyLearning(learning: string): RefinementType {
  const lower = learning.toLowerCase()
  return LEARNING_KEYWORDS.find(([keyword]) => lower.includes(keyword))?.[1] ?? 'quality'
}

export function secondPassQuality(checks: PassChecks | undefined, refinementCount: number): number {
  if (checks === undefined) return 0.6
  const total = checks.passed + checks.failed
  if (total === 0) return 0.6
  const bonus = Math.min(0.1, refinementCount * 0.02)
  return Math.min(1, checks.passed / total + bonus)
}

export type SecondPassRun = (context: PipelineContext, refinements: readonly Refinement[]) => Promise<PassRunOutput>

export class SecondPassStrategy extends BasePassStrategy {
  readonly name: string = SECOND_PASS_NAME
  private readonly _run: SecondPassRun

  constructor(run: SecondPassRun) {
    super()
    this._run = run
  }

  async execute(context: PipelineContext): Promise<PassResult> {
    const startedAt = performance.now()
    const prior = Array.isArray(context.learnings)
      ? context.learnings.filter((l): l is string => typeof l === 'string')
      : []
    const refinements = prior.map((learning) => ({ type: classifyLearning(learning), learning }))

    const output = await this._run(context, refinements)
    const qualityScore = secondPassQuality(output.checks, refinements.length)
    const previous = typeof context.previous_quality_score === 'number' ? context.previous_quality_score : 0

    return createPassResult({
      passName: this.name,
      success: output.success ?? true,
      artifacts: output.artifacts ?? {},
      qualityScore,
      executionTime: elapsedSeconds(startedAt),
      learnings: output.learnings ?? [],
      insights: output.insights ?? {},
      warnings: output.warnings ?? [],
      errors: output.errors ?? [],
      metadata: {
        passType: 'refined_implementation',
        refinements,
        qualityImproved: qualityScore > previous,
        qualityDelta: qualityScore - previous,
      },
    })
  }
}
