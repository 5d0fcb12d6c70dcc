/**
 * Integration: a configured pipeline driven through the state machine, with
 * every finished stage checkpointed and a failed run resumed by a fresh
 * state machine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, writeFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createConfigSystem } from '../../src/modules/config/index.js'
import { DynamicPipelineBuilder, createStage } from '../../src/modules/dynamic-pipeline/index.js'
import type { PipelineEvent, StageResult } from '../../src/modules/dynamic-pipeline/index.js'
import { ArtemisStateMachine, StateSnapshotStore, createStateMachine } from '../../src/modules/state-machine/index.js'
import { FileCheckpointStore } from '../../src/modules/checkpoint/index.js'
import { ServiceRegistry } from '../../src/core/di.js'
import type { ArtemisConfig } from '../../src/modules/config/index.js'

const STAGE_ORDER = ['plan', 'design', 'build', 'test']

let testDir: string
let config: ArtemisConfig

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'artemis-integration-'))
  const projectConfigDir = join(testDir, '.artemis')
  await mkdir(projectConfigDir, { recursive: true })
  await writeFile(
    join(projectConfigDir, 'config.yaml'),
    [
      'global:',
      `  state_dir: ${JSON.stringify(join(testDir, 'state'))}`,
      `  checkpoint_dir: ${JSON.stringify(join(testDir, 'checkpoints'))}`,
      'retry:',
      '  max_retries: 0',
      '',
    ].join('\n'),
    'utf-8'
  )

  const system = createConfigSystem({ projectConfigDir, globalConfigDir: join(testDir, 'global') }, {})
  await system.load()
  config = system.getConfig()
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function buildPipeline(
  failing: ReadonlySet<string>,
  events: string[] = [],
  completed: ReadonlyMap<string, Record<string, unknown>> = new Map()
) {
  const stage = (name: string, dependencies: string[] = []) =>
    createStage({
      name,
      dependencies,
      run: async () => {
        if (failing.has(name)) throw new Error(`${name} broke`)
        return { stage: name }
      },
    })

  return new DynamicPipelineBuilder()
    .withName('delivery')
    .withConfig({ retry: config.retry, parallel: config.parallel })
    .withObserver({ onEvent: (event: PipelineEvent) => events.push(`${event.eventType}:${event.stageName ?? ''}`) })
    .addStages([stage('plan'), stage('design', ['plan']), stage('build', ['plan']), stage('test', ['design', 'build'])])
    .withCompletedResults('card-8', completed)
    .build()
}

/** Drive the state machine through one stage result and checkpoint it */
async function recordStage(machine: ArtemisStateMachine, result: StageResult): Promise<void> {
  machine.transition('stage_running', 'stage_start', undefined, { stage: result.stageName })
  if (result.success) {
    machine.updateStageState(result.stageName, 'completed')
    machine.transition('stage_completed', 'stage_complete')
    await machine.saveStageCheckpoint(result.stageName, 'completed', { result: { ...result.data } })
    machine.transition('running', 'resume')
  } else {
    machine.updateStageState(result.stageName, 'failed')
    machine.transition('stage_failed', 'stage_fail')
    await machine.saveStageCheckpoint(result.stageName, 'failed', {
      errorMessage: result.error?.message ?? null,
      retryCount: result.retryCount,
    })
  }
}

describe('pipeline with state machine and checkpoints', () => {
  it('checkpoints every stage of a successful run', async () => {
    const registry = new ServiceRegistry()
    const machine = await createStateMachine('card-7', config, registry)
    const events: string[] = []
    const pipeline = buildPipeline(new Set(), events)

    expect(machine.transition('initializing', 'start')).toBe(true)
    await machine.createCheckpoint(pipeline.getStages().length)
    expect(machine.transition('running', 'start')).toBe(true)

    const results = await pipeline.execute('card-7')
    for (const result of results.values()) {
      await recordStage(machine, result)
    }
    expect(machine.transition('completed', 'complete')).toBe(true)

    expect([...results.keys()]).toEqual(STAGE_ORDER)
    expect(pipeline.getState()).toBe('completed')
    expect(pipeline.getContext().build_result).toEqual({ stage: 'build' })
    expect(events.filter((e) => e.startsWith('stage:completed'))).toEqual(
      STAGE_ORDER.map((name) => `stage:completed:${name}`)
    )

    expect(machine.state).toBe('completed')
    expect(machine.getCheckpointProgress()).toMatchObject({ progressPercent: 100, stagesCompleted: 4, totalStages: 4 })
    await machine.flush()
    await registry.shutdownAll()

    const snapshot = await new StateSnapshotStore(config.global.state_dir).load('card-7')
    expect(snapshot?.state).toBe('completed')
    expect(snapshot?.stages.test?.state).toBe('completed')

    const stored = await new FileCheckpointStore(config.global.checkpoint_dir).load('card-7')
    expect(stored?.completedStages).toEqual(STAGE_ORDER)
    expect(stored?.stageCheckpoints.design?.result).toEqual({ stage: 'design' })
  })

  it('resumes a failed run from the first unfinished stage', async () => {
    const store = new FileCheckpointStore(config.global.checkpoint_dir)
    const first = new ArtemisStateMachine({ cardId: 'card-8', checkpointStore: store })
    const pipeline = buildPipeline(new Set(['build']))

    first.transition('initializing', 'start')
    await first.createCheckpoint(4)
    first.transition('running', 'start')

    const results = await pipeline.execute('card-8')
    for (const result of results.values()) {
      await recordStage(first, result)
    }
    expect(first.transition('failed', 'fail', 'build broke')).toBe(true)

    expect([...results.keys()]).toEqual(['plan', 'design', 'build'])
    expect(results.get('build')?.error?.message).toBe('build broke')
    expect(pipeline.getState()).toBe('failed')

    const second = new ArtemisStateMachine({ cardId: 'card-8', checkpointStore: store })
    expect(await second.canResume()).toBe(true)

    const resumed = await second.resumeFromCheckpoint()
    expect(resumed).toMatchObject({
      status: 'resumed',
      resumeCount: 1,
      completedStages: ['plan', 'design'],
      failedStages: ['build'],
      stagesCompleted: 2,
    })
    expect(resumed?.stageCheckpoints.build?.errorMessage).toBe('build broke')
    expect(second.checkpointManager?.getNextStage(STAGE_ORDER)).toBe('build')
    expect(await second.canResume()).toBe(false)

    const events: string[] = []
    const rerun = buildPipeline(new Set(), events, second.checkpointManager?.getCompletedStageResults())
    const rerunResults = await rerun.execute('card-8')

    expect(events.filter((e) => e.startsWith('stage:started'))).toEqual(['stage:started:build', 'stage:started:test'])
    expect(rerunResults.size).toBe(4)
    expect(rerunResults.get('design')?.data).toEqual({ stage: 'design' })
    expect(rerun.getContext().plan_result).toEqual({ stage: 'plan' })
    expect(rerun.getState()).toBe('completed')
  })
})
