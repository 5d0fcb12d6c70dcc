/**
 * Unit tests for TwoPassGuidance quality assessment and pass planning.
 */

import { describe, it, expect, vi } from 'vitest'
import { TwoPassGuidance } from '../ai-guidance.js'
import type { QualityAssessmentService } from '../ai-guidance.js'

function fakeService(complexityLevel = 'moderate'): QualityAssessmentService {
  return {
    assessQuality: vi.fn(async () => ({
      overallScore: 0.9,
      criteriaScores: { correctness: 0.95 },
      suggestions: ['Add tests'],
      improvement: 0.2,
    })),
    classifyComplexity: vi.fn(async () => ({ complexityLevel, estimatedDuration: 40 })),
  }
}

describe('TwoPassGuidance.assessPassQuality', () => {
  it('uses the router intensity below 0.4', async () => {
    const service = fakeService()
    const guidance = new TwoPassGuidance({ intensity: 0.2 }, service)

    const assessment = await guidance.assessPassQuality({ code: 'x' })

    expect(assessment.source).toBe('router_precomputed')
    expect(assessment.overallScore).toBeCloseTo(0.6)
    expect(assessment.meetsThreshold).toBe(false)
    expect(service.assessQuality).not.toHaveBeenCalled()
  })

  it('falls back to the threshold without a service', async () => {
    const assessment = await new TwoPassGuidance({ intensity: 0.5 }).assessPassQuality({ code: 'x' })

    expect(assessment).toMatchObject({
      source: 'fallback_no_ai_service',
      overallScore: 0.7,
      meetsThreshold: true,
    })
  })

  it('asks the service otherwise', async () => {
    const service = fakeService()
    const guidance = new TwoPassGuidance({ intensity: 0.6, qualityThreshold: 0.95 }, service)

    const fresh = await guidance.assessPassQuality({ code: 'x' })
    const revised = await guidance.assessPassQuality({ code: 'y', previousVersion: 'x' })

    expect(fresh).toMatchObject({ source: 'ai_assessed', overallScore: 0.9, meetsThreshold: false, improvement: 0 })
    expect(fresh.suggestions).toEqual(['Add tests'])
    expect(revised.improvement).toBe(0.2)
  })
})

describe('TwoPassGuidance.optimizePassStrategy', () => {
  it('returns the precomputed plan below intensity 0.5', async () => {
    const plan = await new TwoPassGuidance({ intensity: 0.3 }, fakeService()).optimizePassStrategy('req')

    expect(plan.source).toBe('router_precomputed')
    expect(plan.recommendedTimeouts).toEqual({ firstPass: 30, secondPass: 120 })
    expect(plan.rollbackLikelihood).toBe(0.1)
    expect(plan.parallelization).toBe(false)
    expect(plan.firstPassFocus).toEqual(['Validate requirements', 'Check for obvious issues', 'Quick feasibility check'])
  })

  it('prefers configured focus lists in the precomputed plan', async () => {
    const plan = await new TwoPassGuidance({ intensity: 0.3, firstPassGuidance: ['Read the ticket'] }).optimizePassStrategy(
      'req'
    )

    expect(plan.firstPassFocus).toEqual(['Read the ticket'])
  })

  it('falls back without a service', async () => {
    const plan = await new TwoPassGuidance({ intensity: 0.8 }).optimizePassStrategy('req')

    expect(plan.source).toBe('fallback_no_ai_service')
    expect(plan.parallelization).toBe(true)
    expect(plan.rollbackLikelihood).toBe(0.3)
  })

  it('falls back when the classifier fails', async () => {
    const service = fakeService()
    vi.mocked(service.classifyComplexity).mockRejectedValueOnce(new Error('service down'))

    const plan = await new TwoPassGuidance({ intensity: 0.8 }, service).optimizePassStrategy('req')

    expect(plan.source).toBe('fallback_no_ai_service')
    expect(plan.firstPassFocus).toEqual(['Analyze requirements', 'Identify risks', 'Create execution plan'])
    expect(plan.recommendedTimeouts).toEqual({ firstPass: 30, secondPass: 120 })
  })

  it('does not parallelize the fallback at intensity 0.7', async () => {
    const plan = await new TwoPassGuidance({ intensity: 0.7 }).optimizePassStrategy('req')

    expect(plan.parallelization).toBe(false)
  })

  it.each([
    ['simple', { firstPass: 24, secondPass: 96 }, false, 0.05],
    ['moderate', { firstPass: 30, secondPass: 120 }, false, 0.15],
    ['complex', { firstPass: 36, secondPass: 156 }, true, 0.3],
    ['very_complex', { firstPass: 45, secondPass: 180 }, true, 0.45],
    ['unheard_of', { firstPass: 30, secondPass: 120 }, false, 0.15],
    ['toString', { firstPass: 30, secondPass: 120 }, false, 0.15],
  ])('plans a %s classification', async (level, timeouts, parallel, rollback) => {
    const plan = await new TwoPassGuidance({ intensity: 0.6 }, fakeService(level)).optimizePassStrategy('req')

    expect(plan.source).toBe('ai_optimized')
    expect(plan.complexityLevel).toBe(level)
    expect(plan.recommendedTimeouts).toEqual(timeouts)
    expect(plan.parallelization).toBe(parallel)
    expect(plan.rollbackLikelihood).toBe(rollback)
    expect(plan.estimatedDuration).toBe(40)
  })

  it('merges configured guidance into the focus lists without duplicates', async () => {
    const guidance = new TwoPassGuidance(
      { intensity: 0.9, firstPassGuidance: ['Deep analysis', 'Check licences'], secondPassGuidance: ['Pair review'] },
      fakeService('complex')
    )

    const plan = await guidance.optimizePassStrategy('req')

    expect(plan.firstPassFocus).toEqual([
      'Deep analysis',
      'Multiple risk scenarios',
      'Detailed architecture',
      'Prototyping',
      'Check licences',
    ])
    expect(plan.secondPassFocus.at(-1)).toBe('Pair review')
  })

  it('passes the requirements and intensity to the classifier', async () => {
    const service = fakeService()
    await new TwoPassGuidance({ intensity: 0.65, guidance: 'focus on auth' }, service).optimizePassStrategy(
      'Build login'
    )

    expect(service.classifyComplexity).toHaveBeenCalledWith({
      requirements: 'Build login',
      context: 'Two-pass pipeline optimization. Initial intensity: 65%. Router guidance: focus on auth...',
    })
  })
})
