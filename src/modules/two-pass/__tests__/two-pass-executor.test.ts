/**
 * Unit tests for TwoPassExecutor.
 *
 * Covers:
 *  - event order for a run that keeps the second pass
 *  - rollback when the second pass degrades quality
 *  - autoRollback disabled
 *  - first pass terminal failure
 *  - second pass terminal failure scored as 0
 *  - context isolation between passes, including non-data entries
 */

import { describe, it, expect, vi } from 'vitest'
import { PassExecutionError } from '../../../core/errors.js'
import type { PipelineContext } from '../../../core/types.js'
import { PipelineObservable } from '../../dynamic-pipeline/index.js'
import type { PipelineEvent } from '../../dynamic-pipeline/index.js'
import { RetryStrategy } from '../retry-strategy.js'
import { FirstPassStrategy } from '../strategies/first-pass-strategy.js'
import { SecondPassStrategy } from '../strategies/second-pass-strategy.js'
import { TwoPassExecutor } from '../two-pass-executor.js'
import type { TwoPassExecutorOptions } from '../two-pass-executor.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const noSleep = async (): Promise<void> => {}

/** First pass scoring 0.5 with two learnings */
function halfFirstPass(): FirstPassStrategy {
  return new FirstPassStrategy(async () => ({ artifacts: { plan: 'v1' }, checks: { passed: 1, failed: 1 } }))
}

function setup(secondChecks: { passed: number; failed: number }, overrides: Partial<TwoPassExecutorOptions> = {}) {
  const observable = new PipelineObservable()
  const events: PipelineEvent[] = []
  observable.attach({ onEvent: (event) => events.push(event) })
  const executor = new TwoPassExecutor({
    firstPass: halfFirstPass(),
    secondPass: new SecondPassStrategy(async () => ({ artifacts: { plan: 'v2' }, checks: secondChecks })),
    observable,
    retryStrategy: new RetryStrategy({ maxRetries: 1, sleep: noSleep }),
    ...overrides,
  })
  return { executor, events }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('TwoPassExecutor', () => {
  it('keeps the second pass when quality improves', async () => {
    // first: 1/2 = 0.5; second: 3/4 + 2 refinements * 0.02 = 0.79
    const { executor, events } = setup({ passed: 3, failed: 1 })

    const outcome = await executor.execute({}, 'card-1')

    expect(outcome.rolledBack).toBe(false)
    expect(outcome.finalResult.passName).toBe('SecondPass')
    expect(outcome.firstResult.qualityScore).toBe(0.5)
    expect(outcome.secondResult.qualityScore).toBeCloseTo(0.79)
    expect(outcome.delta.modifiedArtifacts).toEqual(['plan'])
    expect(events.map((e) => e.eventType)).toEqual([
      'pass:first-started',
      'pass:first-completed',
      'pass:memento-created',
      'pass:memento-applied',
      'pass:second-started',
      'pass:second-completed',
      'pass:quality-improved',
    ])
    expect(events.every((e) => e.cardId === 'card-1')).toBe(true)
  })

  it('rolls back to the first pass when quality drops below the threshold', async () => {
    // second: 0/4 + 0.04 = 0.04; delta = -0.46
    const { executor, events } = setup({ passed: 0, failed: 4 })

    const outcome = await executor.execute({}, 'card-2')

    expect(outcome.rolledBack).toBe(true)
    expect(outcome.finalResult).toBe(outcome.firstResult)
    expect(events.map((e) => e.eventType).slice(-2)).toEqual(['pass:quality-degraded', 'pass:rolled-back'])
    expect(executor.getRollbackHistory()[0]?.reason).toBe('Quality degraded by 46.00%')
  })

  it('keeps a degraded second pass when autoRollback is off', async () => {
    const { executor } = setup({ passed: 0, failed: 4 }, { autoRollback: false })

    const outcome = await executor.execute({})

    expect(outcome.rolledBack).toBe(false)
    expect(outcome.finalResult.passName).toBe('SecondPass')
    expect(executor.getRollbackHistory()).toEqual([])
  })

  it('keeps a small degradation within the threshold', async () => {
    // second: 9/20 + 0.04 = 0.49; delta = -0.01
    const { executor } = setup({ passed: 9, failed: 11 })

    const outcome = await executor.execute({})

    expect(outcome.delta.qualityDelta).toBeCloseTo(-0.01)
    expect(outcome.rolledBack).toBe(false)
  })

  it('fails the run when the first pass exhausts its retries', async () => {
    const run = vi.fn(async () => {
      throw new Error('analysis crashed')
    })
    const { executor, events } = setup({ passed: 1, failed: 0 }, { firstPass: new FirstPassStrategy(run) })

    await expect(executor.execute({})).rejects.toThrow(PassExecutionError)
    expect(run).toHaveBeenCalledTimes(2)
    expect(events.map((e) => e.eventType)).toEqual(['pass:first-started'])
  })

  it('scores a second pass that exhausts its retries as 0 and rolls back', async () => {
    const { executor } = setup(
      { passed: 1, failed: 0 },
      { secondPass: new SecondPassStrategy(async () => ({ success: false })) }
    )

    const outcome = await executor.execute({})

    expect(outcome.secondResult.success).toBe(false)
    expect(outcome.secondResult.qualityScore).toBe(0)
    expect(outcome.secondResult.metadata).toEqual({ failed: true })
    expect(outcome.secondResult.errors).toEqual(['SecondPass failed after 2 attempts'])
    expect(outcome.rolledBack).toBe(true)
  })

  it('runs the second pass on a seeded copy of the context', async () => {
    let secondContext: PipelineContext = {}
    const { executor } = setup(
      { passed: 1, failed: 0 },
      {
        secondPass: new SecondPassStrategy(async (context) => {
          secondContext = context
          return { checks: { passed: 1, failed: 0 } }
        }),
      }
    )
    const context: PipelineContext = { card_id: 'card-9' }

    await executor.execute(context)

    expect(context).toEqual({ card_id: 'card-9' })
    expect(secondContext.card_id).toBe('card-9')
    expect(secondContext.previous_quality_score).toBe(0.5)
    expect(secondContext.previous_artifacts).toEqual({ plan: 'v1' })
    expect(secondContext.learnings).toEqual([
      'Validated 1 inputs successfully',
      'Found 1 validation failures to address',
    ])
  })

  it('shares function-valued context entries with the second pass', async () => {
    let secondContext: PipelineContext = {}
    const notify = vi.fn()
    const { executor } = setup(
      { passed: 1, failed: 0 },
      {
        secondPass: new SecondPassStrategy(async (context) => {
          secondContext = context
          return { checks: { passed: 1, failed: 0 } }
        }),
      }
    )
    const context: PipelineContext = { requirements: 'x', notify, options: { retries: [1, 2] } }

    const outcome = await executor.execute(context, 'card-5')

    expect(outcome.finalResult.passName).toBe('SecondPass')
    expect(secondContext.notify).toBe(notify)
    expect(secondContext.options).toEqual({ retries: [1, 2] })
    expect(secondContext.options).not.toBe(context.options)
  })

  it('records every run in the execution history', async () => {
    const { executor } = setup({ passed: 3, failed: 1 })

    await executor.execute({})
    await executor.execute({})

    const history = executor.getExecutionHistory()
    expect(history).toHaveLength(2)
    expect(history[0]).toMatchObject({ firstPassQuality: 0.5, finalPass: 'SecondPass', rolledBack: false })
    expect(history[0]?.qualityDelta).toBeCloseTo(0.29)
  })
})
