/**
 * Unit tests for PipelineOptimizer and router hint parsing.
 */

import { describe, it, expect, vi } from 'vitest'
import { PipelineOptimizer, readRouterHints } from '../pipeline-optimizer.js'
import type { RouterHints, StageComplexityClassifier } from '../pipeline-optimizer.js'
import { DynamicPipelineBuilder } from '../pipeline-builder.js'
import { createStage } from '../stage.js'
import type { PipelineStage } from '../types.js'

function stage(name: string, dependencies: string[] = []): PipelineStage {
  return createStage({ name, dependencies, run: async () => ({}) })
}

// plan, lint and docs are independent; build needs plan; test needs build and lint
const STAGES: PipelineStage[] = [
  stage('plan'),
  stage('lint'),
  stage('docs'),
  stage('build', ['plan']),
  stage('test', ['build', 'lint']),
]
const NAMES = ['plan', 'lint', 'docs', 'build', 'test']

function hints(overrides: Partial<RouterHints> = {}): RouterHints {
  return { ...readRouterHints({}), ...overrides }
}

function fakeClassifier(complexityLevel: string): StageComplexityClassifier {
  return {
    classifyComplexity: vi.fn(async () => ({ complexityLevel, estimatedDuration: 40 })),
  }
}

describe('readRouterHints', () => {
  it('defaults every missing key', () => {
    expect(readRouterHints({})).toEqual({
      intensity: 0.5,
      guidance: '',
      suggestedWorkers: 4,
      priorityStages: [],
      optionalStages: [],
    })
  })

  it('maps router keys and replaces malformed values with defaults', () => {
    expect(
      readRouterHints({
        intensity: 'high',
        prompt: 'Keep it small',
        suggested_max_workers: 0,
        stages_to_prioritize: ['build'],
        stages_optional: 'docs',
      })
    ).toEqual({
      intensity: 0.5,
      guidance: 'Keep it small',
      suggestedWorkers: 4,
      priorityStages: ['build'],
      optionalStages: [],
    })
  })
})

describe('PipelineOptimizer.optimizeStageExecution', () => {
  it('keeps the given order at low intensity without asking the classifier', async () => {
    const classifier = fakeClassifier('complex')
    const optimizer = new PipelineOptimizer(hints({ intensity: 0.3, optionalStages: ['docs'] }), classifier)

    expect(await optimizer.optimizeStageExecution(STAGES)).toEqual({
      executionOrder: NAMES,
      parallelGroups: [],
      maxWorkers: 4,
      skipOptional: ['docs'],
      intensity: 0.3,
      source: 'router_precomputed',
    })
    expect(classifier.classifyComplexity).not.toHaveBeenCalled()
  })

  it('groups the first ready stages without a classifier', async () => {
    const optimizer = new PipelineOptimizer(hints({ suggestedWorkers: 2 }))

    expect(await optimizer.optimizeStageExecution(STAGES)).toEqual({
      executionOrder: NAMES,
      parallelGroups: [['plan', 'lint']],
      maxWorkers: 2,
      skipOptional: [],
      intensity: 0.5,
      source: 'fallback_no_ai_service',
      warning: 'No AI service available',
    })
  })

  it('orders each dependency level by priority and chunks it by the worker count', async () => {
    const classifier = fakeClassifier('simple')
    const optimizer = new PipelineOptimizer(
      hints({ intensity: 0.8, priorityStages: ['docs'], optionalStages: ['lint'] }),
      classifier
    )

    expect(await optimizer.optimizeStageExecution(STAGES)).toEqual({
      executionOrder: ['docs', 'plan', 'lint', 'build', 'test'],
      parallelGroups: [['docs', 'plan']],
      maxWorkers: 2,
      skipOptional: ['lint'],
      intensity: 0.8,
      source: 'ai_optimized',
      complexityLevel: 'simple',
      estimatedDuration: 40,
    })
    expect(classifier.classifyComplexity).toHaveBeenCalledWith(
      expect.objectContaining({ requirements: expect.stringContaining('- build: depends on plan') })
    )
  })

  it('falls back when the classifier fails', async () => {
    const classifier = fakeClassifier('simple')
    vi.mocked(classifier.classifyComplexity).mockRejectedValueOnce(new Error('service down'))
    const optimizer = new PipelineOptimizer(hints({ intensity: 0.9 }), classifier)

    const plan = await optimizer.optimizeStageExecution(STAGES)

    expect(plan.source).toBe('fallback_no_ai_service')
    expect(plan.warning).toBe('AI service failed: service down')
    expect(plan.parallelGroups).toEqual([['plan', 'lint', 'docs']])
  })
})

describe('PipelineOptimizer.assessParallelization', () => {
  it('serializes everything when the router suggests two workers or fewer', async () => {
    const classifier = fakeClassifier('simple')
    const optimizer = new PipelineOptimizer(hints({ suggestedWorkers: 2 }), classifier)

    expect(await optimizer.assessParallelization(STAGES)).toEqual({
      recommendedWorkers: 2,
      canParallelize: [],
      mustSerialize: NAMES,
      safetyScore: 1,
      source: 'router_precomputed',
    })
    expect(classifier.classifyComplexity).not.toHaveBeenCalled()
  })

  it('stays conservative without a classifier', async () => {
    const optimizer = new PipelineOptimizer(hints({ suggestedWorkers: 6 }))

    expect(await optimizer.assessParallelization(STAGES)).toEqual({
      recommendedWorkers: 6,
      canParallelize: [],
      mustSerialize: NAMES,
      safetyScore: 0.8,
      source: 'fallback_no_ai_service',
      warning: 'No AI service available, conservative parallelization',
    })
  })

  it.each([
    ['simple', 6, 0.95],
    ['moderate', 5, 0.85],
    ['complex', 4, 0.7],
    ['very_complex', 2, 0.6],
    ['unknown', 5, 0.75],
    ['toString', 5, 0.75],
  ])('recommends workers for %s complexity', async (level, workers, safety) => {
    const optimizer = new PipelineOptimizer(hints({ suggestedWorkers: 6 }), fakeClassifier(level))

    const assessment = await optimizer.assessParallelization(STAGES)

    expect(assessment.recommendedWorkers).toBe(workers)
    expect(assessment.adjustment).toBe(workers - 6)
    expect(assessment.safetyScore).toBe(safety)
    expect(assessment.canParallelize).toEqual(['plan', 'lint', 'docs'])
    expect(assessment.mustSerialize).toEqual(['build', 'test'])
    expect(assessment.source).toBe('ai_assessed')
  })

  it('asks the classifier when initial analysis is turned off', async () => {
    const classifier = fakeClassifier('moderate')
    const optimizer = new PipelineOptimizer(hints({ suggestedWorkers: 2 }), classifier)

    const assessment = await optimizer.assessParallelization(STAGES, false)

    expect(assessment.recommendedWorkers).toBe(2)
    expect(assessment.adjustment).toBe(0)
    expect(classifier.classifyComplexity).toHaveBeenCalledTimes(1)
  })
})

describe('DynamicPipeline optimization', () => {
  it('plans the selected stages with hints from the pipeline context', async () => {
    const pipeline = new DynamicPipelineBuilder()
      .withName('optimized')
      .addStage(stage('plan'))
      .addStage(stage('build', ['plan']))
      .withContext({ intensity: 0.9, suggested_max_workers: 3 })
      .withComplexityClassifier(fakeClassifier('complex'))
      .build()

    const plan = await pipeline.optimizeStageExecution()
    expect(plan.executionOrder).toEqual(['plan', 'build'])
    expect(plan.parallelGroups).toEqual([])
    expect(plan.maxWorkers).toBe(6)
    expect(plan.source).toBe('ai_optimized')

    const assessment = await pipeline.assessParallelization()
    expect(assessment.recommendedWorkers).toBe(2)
    expect(assessment.safetyScore).toBe(0.7)
  })
})
