/**
 * Unit tests for CheckpointManager: recording stages, progress, resume and
 * the LLM response cache.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CheckpointError } from '../../../core/errors.js'
import { CheckpointManager } from '../checkpoint-manager.js'
import { FileCheckpointStore } from '../file-checkpoint-store.js'

const T0 = Date.parse('2026-01-01T00:00:00.000Z')

function at(seconds: number): Date {
  return new Date(T0 + seconds * 1000)
}

describe('CheckpointManager', () => {
  let root: string
  let store: FileCheckpointStore
  let clock: Date

  const manager = (enableLlmCache = true): CheckpointManager =>
    new CheckpointManager('card-1', store, { enableLlmCache, now: () => clock })

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'artemis-manager-'))
    store = new FileCheckpointStore(root)
    clock = at(0)
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('creates an active checkpoint and persists it', async () => {
    const created = await manager().createCheckpoint(3, { requirements: 'Add search' })

    expect(created.checkpointId).toBe('checkpoint-card-1-1767225600')
    expect(created.status).toBe('active')
    expect(created.createdAt).toBe('2026-01-01T00:00:00.000Z')
    expect(await store.load('card-1')).toEqual(created)
  })

  it('records stages and derives progress from them', async () => {
    const m = manager()
    await m.createCheckpoint(3)

    await m.saveStageCheckpoint('plan', 'completed', { startTime: at(0), endTime: at(4) })
    await m.saveStageCheckpoint('build', 'completed', { startTime: at(4), endTime: at(6) })
    await m.setCurrentStage('test')
    clock = at(10)

    expect(m.getProgress()).toEqual({
      progressPercent: 66.67,
      stagesCompleted: 2,
      totalStages: 3,
      currentStage: 'test',
      elapsedSeconds: 10,
      estimatedRemainingSeconds: 3,
    })
    const stored = await store.load('card-1')
    expect(stored?.completedStages).toEqual(['plan', 'build'])
    expect(stored?.totalDurationSeconds).toBe(6)
    expect(stored?.stageCheckpoints.plan?.durationSeconds).toBe(4)
  })

  it('counts a stage once however often it is saved', async () => {
    const m = manager()
    await m.createCheckpoint(2)
    await m.saveStageCheckpoint('plan', 'completed')
    await m.saveStageCheckpoint('plan', 'completed')
    await m.saveStageCheckpoint('lint', 'skipped')

    const cp = m.checkpoint
    expect(cp?.completedStages).toEqual(['plan'])
    expect(cp?.skippedStages).toEqual(['lint'])
    expect(cp?.stagesCompleted).toBe(1)
    expect(cp?.stageCheckpoints.plan?.durationSeconds).toBe(0)
  })

  it('moves a stage between status lists when its status changes', async () => {
    const m = manager()
    await m.createCheckpoint(2)
    await m.saveStageCheckpoint('build', 'failed', { errorMessage: 'flaky' })
    await m.saveStageCheckpoint('build', 'completed')

    expect(m.checkpoint?.failedStages).toEqual([])
    expect(m.checkpoint?.completedStages).toEqual(['build'])
    expect(m.checkpoint?.stagesCompleted).toBe(1)

    await m.saveStageCheckpoint('build', 'skipped')
    expect(m.checkpoint?.completedStages).toEqual([])
    expect(m.checkpoint?.skippedStages).toEqual(['build'])
    expect(m.checkpoint?.stagesCompleted).toBe(0)
  })

  it('returns completed stage results for seeding a resumed run', async () => {
    const m = manager()
    expect(m.getCompletedStageResults()).toEqual(new Map())

    await m.createCheckpoint(3)
    await m.saveStageCheckpoint('plan', 'completed', { result: { tasks: 3 } })
    await m.saveStageCheckpoint('lint', 'completed')
    await m.saveStageCheckpoint('build', 'failed', { errorMessage: 'broke' })

    expect(m.getCompletedStageResults()).toEqual(
      new Map<string, Record<string, unknown>>([
        ['plan', { tasks: 3 }],
        ['lint', {}],
      ])
    )
  })

  it('rejects stage saves before a checkpoint exists', async () => {
    const m = manager()

    await expect(m.saveStageCheckpoint('plan', 'completed')).rejects.toBeInstanceOf(CheckpointError)
    await expect(m.setCurrentStage('plan')).rejects.toThrow(
      'No checkpoint created. Call createCheckpoint() before setCurrentStage()'
    )
    await m.markCompleted()
    await m.markFailed('ignored')
    expect(await store.exists('card-1')).toBe(false)
  })

  it('resumes an interrupted run in a fresh manager', async () => {
    const first = manager()
    await first.createCheckpoint(3)
    await first.saveStageCheckpoint('plan', 'completed', {
      llmResponses: [{ prompt: 'Outline the work', content: 'outline' }],
    })
    await first.setCurrentStage('build')

    clock = at(60)
    const second = manager()
    expect(second.getNextStage(['plan', 'build', 'test'])).toBe('plan')
    expect(await second.canResume()).toBe(true)

    const resumed = await second.resume()

    expect(resumed?.status).toBe('resumed')
    expect(resumed?.resumeCount).toBe(1)
    expect(resumed?.lastResumeTime).toBe('2026-01-01T00:01:00.000Z')
    expect(second.getNextStage(['plan', 'build', 'test'])).toBe('build')
    expect(second.getCachedLlmResponse('plan', 'Outline the work')).toEqual({
      prompt: 'Outline the work',
      content: 'outline',
    })
    expect(second.getCachedLlmResponse('plan', 'Something else')).toBeUndefined()
    // "resumed" is not itself resumable
    expect(await second.canResume()).toBe(false)
  })

  it('does not resume finished or failed runs', async () => {
    const m = manager()
    await m.createCheckpoint(1)
    await m.markFailed('stage crashed')

    expect((await store.load('card-1'))?.metadata).toEqual({ failureReason: 'stage crashed' })
    expect(await m.canResume()).toBe(false)
    expect(await manager().resume()).toBeNull()

    await m.markCompleted()
    expect(m.checkpoint?.status).toBe('completed')
    expect(await m.canResume()).toBe(false)
  })

  it('loads a stored checkpoint for inspection without resuming it', async () => {
    const first = manager()
    await first.createCheckpoint(4)
    await first.saveStageCheckpoint('plan', 'completed', { startTime: at(0), endTime: at(8) })
    await first.markFailed('stage crashed')
    clock = at(20)

    const inspector = manager()
    const loaded = await inspector.load()

    expect(loaded?.status).toBe('failed')
    expect(inspector.getProgress()).toEqual({
      progressPercent: 25,
      stagesCompleted: 1,
      totalStages: 4,
      currentStage: null,
      elapsedSeconds: 20,
      estimatedRemainingSeconds: 24,
    })
    expect((await store.load('card-1'))?.resumeCount).toBe(0)
  })

  it('loads nothing when no checkpoint is stored', async () => {
    const m = manager()
    expect(await m.load()).toBeNull()
    expect(m.checkpoint).toBeNull()
  })

  it('cannot resume from a corrupt checkpoint file', async () => {
    await writeFile(join(root, 'card-1.json'), '{"cardId": "card-1"', 'utf-8')

    expect(await manager().canResume()).toBe(false)
    expect(await manager().resume()).toBeNull()
  })

  it('skips the LLM cache when disabled', async () => {
    const m = manager(false)
    await m.createCheckpoint(1)
    await m.saveStageCheckpoint('plan', 'completed', { llmResponses: [{ prompt: 'p', content: 'c' }] })

    expect(m.getCachedLlmResponse('plan', 'p')).toBeUndefined()
    expect(m.llmCache.getStats().cachedResponses).toBe(0)
  })

  it('clears the stored checkpoint and its cache', async () => {
    const m = manager()
    await m.createCheckpoint(2)
    await m.saveStageCheckpoint('plan', 'completed', { llmResponses: [{ prompt: 'p' }] })

    expect(await m.clearCheckpoint()).toBe(true)
    expect(m.checkpoint).toBeNull()
    expect(m.getNextStage(['plan', 'build'])).toBe('plan')
    expect(m.getProgress().progressPercent).toBe(0)
    expect(m.llmCache.getStats().cachedResponses).toBe(0)
    expect(await m.clearCheckpoint()).toBe(false)
  })
})
