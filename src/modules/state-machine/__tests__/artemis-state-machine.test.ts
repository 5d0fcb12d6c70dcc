/**
 * Unit tests for ArtemisStateMachine: transitions, stage tracking, issues and
 * health, workflow execution, the state stack, checkpoints and snapshots.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CheckpointError } from '../../../core/errors.js'
import { FileCheckpointStore } from '../../checkpoint/file-checkpoint-store.js'
import { ArtemisStateMachine, computeHealthStatus } from '../artemis-state-machine.js'
import type { ArtemisStateMachineOptions } from '../artemis-state-machine.js'
import type { LlmClient } from '../llm-workflow-generator.js'
import { StateSnapshotStore } from '../state-snapshot-store.js'
import type { HealthTransition, StateTransition, Workflow } from '../types.js'

const T0 = Date.parse('2026-03-01T12:00:00.000Z')
const noSleep = async (): Promise<void> => {}

function machine(options: Partial<ArtemisStateMachineOptions> = {}): ArtemisStateMachine {
  return new ArtemisStateMachine({ cardId: 'card-7', sleep: noSleep, now: () => new Date(T0), ...options })
}

function driveToStageFailed(sm: ArtemisStateMachine): void {
  sm.transition('initializing', 'start')
  sm.transition('running', 'start')
  sm.transition('stage_running', 'stage_start')
  sm.transition('stage_failed', 'stage_fail')
}

describe('computeHealthStatus', () => {
  it('maps active issue counts to health', () => {
    expect(computeHealthStatus(0)).toBe('healthy')
    expect(computeHealthStatus(2)).toBe('degraded')
    expect(computeHealthStatus(3)).toBe('critical')
  })
})

describe('ArtemisStateMachine', () => {
  describe('transitions', () => {
    it('records frozen transitions and counts them', () => {
      const sm = machine()
      const seen: StateTransition[] = []
      sm.events.on('state:transition', ({ transition }) => seen.push(transition))

      expect(sm.transition('initializing', 'start', 'card picked up', { worker: 1 })).toBe(true)

      expect(sm.state).toBe('initializing')
      expect(sm.stats.totalTransitions).toBe(1)
      const [recorded] = sm.stateHistory
      expect(recorded).toEqual({
        fromState: 'idle',
        toState: 'initializing',
        event: 'start',
        timestamp: '2026-03-01T12:00:00.000Z',
        reason: 'card picked up',
        metadata: { worker: 1 },
      })
      expect(Object.isFrozen(recorded)).toBe(true)
      expect(seen).toEqual([recorded])
    })

    it('refuses illegal edges without changing state', () => {
      const sm = machine()
      expect(sm.transition('completed', 'complete')).toBe(false)
      expect(sm.state).toBe('idle')
      expect(sm.stateHistory).toEqual([])
      expect(sm.stats.totalTransitions).toBe(0)
    })

    it('allows self-transitions', () => {
      const sm = machine()
      expect(sm.transition('idle', 'resume')).toBe(true)
      expect(sm.stateHistory).toHaveLength(1)
    })
  })

  describe('stage states', () => {
    it('tracks start, end and duration per stage', () => {
      let now = T0
      const sm = machine({ now: () => new Date(now) })

      sm.updateStageState('build', 'running', { worker: 'w1' })
      now += 2500
      sm.updateStageState('build', 'completed', { artifacts: 2 })

      expect(sm.activeStage).toBe('build')
      expect(sm.stageStates.build).toEqual({
        stageName: 'build',
        state: 'completed',
        startTime: '2026-03-01T12:00:00.000Z',
        endTime: '2026-03-01T12:00:02.500Z',
        durationSeconds: 2.5,
        metadata: { worker: 'w1', artifacts: 2 },
      })
    })

    it('lists open circuit breakers in the snapshot', () => {
      const sm = machine()
      sm.updateStageState('review', 'circuit_open')
      sm.updateStageState('build', 'running')

      const snapshot = sm.getSnapshot()
      expect(snapshot.circuitBreakersOpen).toEqual(['review'])
      expect(snapshot.activeStage).toBe('build')
    })
  })

  describe('issues and health', () => {
    it('derives health from active issues without touching the primary state', () => {
      const sm = machine()
      const changes: HealthTransition[] = []
      sm.events.on('state:health', ({ change }) => changes.push(change))

      sm.registerIssue('timeout')
      sm.registerIssue('disk_full')
      sm.registerIssue('rag_error')
      sm.resolveIssue('rag_error')
      sm.resolveIssue('disk_full')
      sm.resolveIssue('timeout')

      expect(sm.state).toBe('idle')
      expect(changes.map((c) => [c.to, c.event, c.activeIssueCount])).toEqual([
        ['degraded', 'health_degraded', 1],
        ['critical', 'health_critical', 3],
        ['degraded', 'health_degraded', 2],
        ['healthy', 'health_restored', 0],
      ])
      expect(sm.healthHistory).toEqual(changes)
      expect(sm.resolvedIssues).toEqual(['rag_error', 'disk_full', 'timeout'])
      expect(sm.stats.issuesResolved).toBe(3)
    })

    it('ignores resolving an issue that is not active', () => {
      const sm = machine()
      sm.resolveIssue('timeout')
      expect(sm.stats.issuesResolved).toBe(0)
      expect(sm.resolvedIssues).toEqual([])
    })

    it('keeps an issue registered twice only once', () => {
      const sm = machine()
      sm.registerIssue('timeout')
      sm.registerIssue('timeout')
      expect(sm.activeIssues).toEqual(['timeout'])
      expect(sm.healthStatus).toBe('degraded')
    })
  })

  describe('workflows', () => {
    const recovery = (handler: () => boolean): Workflow => ({
      name: 'Compile Fix',
      issueType: 'compilation_error',
      actions: [{ actionName: 'recompile', handler, retryOnFailure: true, maxRetries: 2 }],
      successState: 'running',
      failureState: 'failed',
      rollbackOnFailure: false,
    })

    it('resolves the issue and moves to the success state', async () => {
      const sm = machine({ workflows: [recovery(() => true)] })
      driveToStageFailed(sm)
      sm.transition('recovering', 'recovery_start')
      sm.registerIssue('compilation_error')

      expect(await sm.executeWorkflow('compilation_error', { stage_name: 'build' })).toBe(true)

      expect(sm.state).toBe('running')
      expect(sm.stateHistory.at(-1)?.reason).toBe('Workflow Compile Fix completed successfully')
      expect(sm.activeIssues).toEqual([])
      expect(sm.stats).toMatchObject({ workflowExecutions: 1, successfulRecoveries: 1, failedRecoveries: 0, issuesResolved: 1 })
      expect(sm.workflowHistory[0]?.actionsTaken).toEqual(['recompile'])
    })

    it('leaves the issue active and moves to the failure state', async () => {
      const handler = vi.fn(() => false)
      const sm = machine({ workflows: [recovery(handler)] })
      driveToStageFailed(sm)
      sm.registerIssue('compilation_error')

      expect(await sm.executeWorkflow('compilation_error')).toBe(false)

      expect(handler).toHaveBeenCalledTimes(2)
      expect(sm.state).toBe('failed')
      expect(sm.stateHistory.at(-1)?.reason).toBe('Workflow Compile Fix failed at action recompile')
      expect(sm.activeIssues).toEqual(['compilation_error'])
      expect(sm.stats).toMatchObject({ workflowExecutions: 1, successfulRecoveries: 0, failedRecoveries: 1 })
    })

    it('registers the default infrastructure workflows', () => {
      const sm = machine()
      expect(sm.getWorkflow('network_error')?.failureState).toBe('degraded')
      expect(sm.getWorkflow('timeout')?.actions.map((a) => a.actionName)).toEqual([
        'increase_timeout',
        'kill_hanging_process',
      ])
      expect(sm.getWorkflow('compilation_error')).toBeUndefined()
    })

    it('fails a default workflow whose actions are not registered', async () => {
      const sm = machine()
      expect(await sm.executeWorkflow('disk_full')).toBe(false)
      expect(sm.workflowHistory[0]?.actionsTaken).toEqual(['cleanup_temp_files'])
    })

    it('returns false without a workflow or an LLM client', async () => {
      const sm = machine()
      expect(await sm.executeWorkflow('invalid_card')).toBe(false)
      expect(sm.stats.workflowExecutions).toBe(0)
    })

    it('falls back to a generated workflow and keeps it registered', async () => {
      const complete = vi.fn(async () => ({
        content: '{"workflow_name": "Card Repair", "actions": [{"action_name": "fallback_to_default"}], "success_state": "RUNNING"}',
      }))
      const llmClient: LlmClient = { complete }
      const sm = machine({ llmClient })
      sm.transition('initializing', 'start')
      sm.registerIssue('invalid_card')

      expect(await sm.executeWorkflow('invalid_card', { missing_key: 'priority' })).toBe(true)
      expect(sm.state).toBe('running')
      expect(sm.getWorkflow('invalid_card')?.name).toBe('Card Repair')

      await sm.executeWorkflow('invalid_card', { missing_key: 'priority' })
      expect(complete).toHaveBeenCalledOnce()
    })
  })

  describe('state stack', () => {
    it('rolls back to a pushed state and transitions to it', () => {
      const sm = machine()
      sm.transition('initializing', 'start')
      sm.transition('running', 'start')
      sm.pushState('running', { checkpoint: 1 })
      sm.pushState('stage_running', { stage: 'build' })
      sm.pushState('stage_failed', { stage: 'build' })
      sm.transition('stage_running', 'stage_start')
      sm.transition('stage_failed', 'stage_fail')
      sm.transition('recovering', 'recovery_start')

      expect(sm.rollbackToState('running')).toBe(true)

      expect(sm.getStateDepth()).toBe(1)
      expect(sm.peekState()?.context).toEqual({ checkpoint: 1 })
      expect(sm.state).toBe('running')
      expect(sm.stateHistory.at(-1)).toMatchObject({ event: 'rollback_complete', reason: 'Rolled back 2 states' })
    })

    it('returns false and keeps the stack when the target is absent', () => {
      const sm = machine()
      sm.pushState('running')
      expect(sm.rollbackToState('paused')).toBe(false)
      expect(sm.getStateDepth()).toBe(1)
      expect(sm.popState()?.state).toBe('running')
    })
  })

  describe('checkpoints and snapshots', () => {
    let root: string

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'artemis-state-'))
    })

    afterEach(async () => {
      await rm(root, { recursive: true, force: true })
    })

    it('throws on checkpoint writes without a store and reports nothing to resume', async () => {
      const sm = machine()
      await expect(sm.createCheckpoint(3)).rejects.toBeInstanceOf(CheckpointError)
      expect(await sm.canResume()).toBe(false)
      expect(await sm.resumeFromCheckpoint()).toBeNull()
      expect(sm.getCheckpointProgress().progressPercent).toBe(0)
    })

    it('delegates checkpoints and resumes in a new instance', async () => {
      const checkpointStore = new FileCheckpointStore(join(root, 'checkpoints'))
      const sm = machine({ checkpointStore })
      sm.transition('initializing', 'start')

      const created = await sm.createCheckpoint(4)
      await sm.saveStageCheckpoint('plan', 'completed')

      expect(created.executionContext).toEqual({ cardId: 'card-7', currentState: 'initializing' })
      expect(sm.getCheckpointProgress().progressPercent).toBe(25)

      const restarted = machine({ checkpointStore })
      expect(await restarted.canResume()).toBe(true)
      expect((await restarted.resumeFromCheckpoint())?.completedStages).toEqual(['plan'])
      expect(restarted.checkpointManager?.getNextStage(['plan', 'build'])).toBe('build')
    })

    it('persists a snapshot after changes', async () => {
      const snapshotStore = new StateSnapshotStore(join(root, 'state'))
      const sm = machine({ snapshotStore })

      sm.transition('initializing', 'start')
      sm.updateStageState('plan', 'running')
      sm.registerIssue('llm_rate_limit')
      await sm.flush()

      const saved = await snapshotStore.load('card-7')
      expect(saved).toEqual({
        cardId: 'card-7',
        state: 'initializing',
        timestamp: '2026-03-01T12:00:00.000Z',
        stages: {
          plan: {
            stageName: 'plan',
            state: 'running',
            startTime: '2026-03-01T12:00:00.000Z',
            endTime: null,
            durationSeconds: null,
            metadata: {},
          },
        },
        activeStage: 'plan',
        healthStatus: 'degraded',
        circuitBreakersOpen: [],
        activeIssues: ['llm_rate_limit'],
      })
      expect(snapshotStore.pathFor('card-7')).toBe(join(root, 'state', 'card-7_state.json'))
    })
  })
})
