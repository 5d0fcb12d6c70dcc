/**
 * ArtemisStateMachine: composite state of one card's run across all of its
 * stages.
 *
 * Tracks:
 *  - the primary state, with a frozen transition history
 *  - per-stage state and the active stage
 *  - active issues and the health derived from them (kept apart from the
 *    primary state)
 *  - recovery workflows, registered or generated by an LLM
 *  - a pushdown stack of nested state contexts
 *  - checkpoints, through CheckpointManager
 *
 * `transition()` never throws for an illegal edge: it logs, returns false and
 * leaves the state as it was.
 */

import { CheckpointError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { CardId, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { deepClone, toError } from '../../utils/helpers.js'
import { CheckpointManager } from '../checkpoint/checkpoint-manager.js'
import type { StageCheckpointDetails } from '../checkpoint/checkpoint-manager.js'
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js'
import { EMPTY_PROGRESS } from '../checkpoint/models.js'
import type { CheckpointProgress, PipelineCheckpoint, StageCheckpointStatus } from '../checkpoint/models.js'
import { buildDefaultWorkflows } from './default-workflows.js'
import { LlmWorkflowGenerator } from './llm-workflow-generator.js'
import type { LlmClient } from './llm-workflow-generator.js'
import { PushdownAutomaton } from './pushdown-automaton.js'
import { createRecoveryActionRegistry } from './recovery-actions.js'
import type { RecoveryActionRegistry } from './recovery-actions.js'
import type { StateSnapshotStore } from './state-snapshot-store.js'
import { isValidTransition } from './transition-rules.js'
import type {
  ArtemisState,
  HealthStatus,
  HealthTransition,
  IssueType,
  PipelineSnapshot,
  StackEntry,
  StageState,
  StageStateInfo,
  StateEventType,
  StateMachineEvents,
  StateMachineStats,
  StateTransition,
  Workflow,
  WorkflowContext,
  WorkflowExecution,
} from './types.js'
import { WorkflowExecutor } from './workflow-executor.js'

const logger = createLogger('state-machine')

const CRITICAL_ISSUE_COUNT = 3

const HEALTH_EVENTS: Record<HealthStatus, HealthTransition['event']> = {
  healthy: 'health_restored',
  degraded: 'health_degraded',
  critical: 'health_critical',
}

const FINISHED_STAGE_STATES: ReadonlySet<StageState> = new Set(['completed', 'failed'])

export interface ArtemisStateMachineOptions {
  cardId: CardId
  /** Persist a snapshot after every change when given */
  snapshotStore?: StateSnapshotStore
  /** Enables the checkpoint operations */
  checkpointStore?: CheckpointStore
  enableLlmCache?: boolean
  llmClient?: LlmClient
  registry?: RecoveryActionRegistry
  /** Defaults to the infrastructure workflows */
  workflows?: readonly Workflow[]
  backoffFactor?: number
  sleep?: (seconds: number) => Promise<void>
  now?: () => Date
  bus?: TypedEventBus<StateMachineEvents>
}

export function computeHealthStatus(activeIssueCount: number): HealthStatus {
  if (activeIssueCount >= CRITICAL_ISSUE_COUNT) return 'critical'
  if (activeIssueCount > 0) return 'degraded'
  return 'healthy'
}

export class ArtemisStateMachine {
  readonly cardId: CardId
  private readonly _bus: TypedEventBus<StateMachineEvents>
  private readonly _now: () => Date
  private readonly _snapshotStore: StateSnapshotStore | undefined
  private readonly _checkpoints: CheckpointManager | undefined
  private readonly _registry: RecoveryActionRegistry
  private readonly _executor: WorkflowExecutor
  private readonly _generator: LlmWorkflowGenerator
  private readonly _stack: PushdownAutomaton

  private _state: ArtemisState = 'idle'
  private readonly _history: StateTransition[] = []
  private readonly _stages = new Map<StageName, StageStateInfo>()
  private _activeStage: StageName | null = null
  private readonly _activeIssues = new Set<IssueType>()
  private readonly _resolvedIssues: IssueType[] = []
  private _health: HealthStatus = 'healthy'
  private readonly _healthHistory: HealthTransition[] = []
  private readonly _workflows = new Map<IssueType, Workflow>()
  private readonly _workflowHistory: WorkflowExecution[] = []
  private readonly _stats: StateMachineStats = {
    totalTransitions: 0,
    workflowExecutions: 0,
    successfulRecoveries: 0,
    failedRecoveries: 0,
    issuesResolved: 0,
  }
  private _pendingSave: Promise<void> = Promise.resolve()

  constructor(options: ArtemisStateMachineOptions) {
    this.cardId = options.cardId
    this._bus = options.bus ?? createEventBus<StateMachineEvents>()
    this._now = options.now ?? (() => new Date())
    this._snapshotStore = options.snapshotStore
    this._checkpoints =
      options.checkpointStore === undefined
        ? undefined
        : new CheckpointManager(options.cardId, options.checkpointStore, {
            enableLlmCache: options.enableLlmCache,
            now: this._now,
          })
    this._registry = options.registry ?? createRecoveryActionRegistry()
    this._executor = new WorkflowExecutor({
      registry: this._registry,
      backoffFactor: options.backoffFactor,
      sleep: options.sleep,
      now: this._now,
    })
    this._generator = new LlmWorkflowGenerator(options.llmClient, this._registry)
    this._stack = new PushdownAutomaton(this._now)
    for (const workflow of options.workflows ?? buildDefaultWorkflows()) this.registerWorkflow(workflow)

    logger.debug({ cardId: this.cardId, workflows: this._workflows.size }, 'State machine created')
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  get state(): ArtemisState {
    return this._state
  }

  get events(): TypedEventBus<StateMachineEvents> {
    return this._bus
  }

  get stateHistory(): readonly StateTransition[] {
    return [...this._history]
  }

  get stageStates(): Record<StageName, StageStateInfo> {
    return deepClone(Object.fromEntries(this._stages))
  }

  get activeStage(): StageName | null {
    return this._activeStage
  }

  set activeStage(stage: StageName | null) {
    this._activeStage = stage
  }

  get activeIssues(): IssueType[] {
    return [...this._activeIssues]
  }

  get resolvedIssues(): IssueType[] {
    return [...this._resolvedIssues]
  }

  get healthStatus(): HealthStatus {
    return this._health
  }

  get healthHistory(): HealthTransition[] {
    return this._healthHistory.map((h) => ({ ...h }))
  }

  get workflowHistory(): WorkflowExecution[] {
    return deepClone(this._workflowHistory)
  }

  get stats(): StateMachineStats {
    return { ...this._stats }
  }

  get registry(): RecoveryActionRegistry {
    return this._registry
  }

  getWorkflow(issueType: IssueType): Workflow | undefined {
    return this._workflows.get(issueType)
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  transition(
    to: ArtemisState,
    event: StateEventType,
    reason?: string,
    metadata: Record<string, unknown> = {}
  ): boolean {
    const from = this._state
    if (!isValidTransition(from, to)) {
      logger.warn({ cardId: this.cardId, from, to, event }, 'Invalid state transition refused')
      return false
    }

    const transition: StateTransition = Object.freeze({
      fromState: from,
      toState: to,
      event,
      timestamp: this._now().toISOString(),
      ...(reason !== undefined ? { reason } : {}),
      metadata: Object.freeze({ ...metadata }),
    })
    this._state = to
    this._history.push(transition)
    this._stats.totalTransitions += 1

    logger.info({ cardId: this.cardId, from, to, event, reason }, 'State transition')
    this._bus.emit('state:transition', { cardId: this.cardId, transition })
    this._persist()
    return true
  }

  updateStageState(stageName: StageName, state: StageState, metadata: Record<string, unknown> = {}): void {
    const now = this._now()
    const existing = this._stages.get(stageName)
    const info: StageStateInfo = existing ?? {
      stageName,
      state,
      startTime: now.toISOString(),
      endTime: null,
      durationSeconds: null,
      metadata: {},
    }
    info.state = state
    Object.assign(info.metadata, metadata)

    if (FINISHED_STAGE_STATES.has(state)) {
      info.endTime = now.toISOString()
      if (info.startTime !== null) {
        info.durationSeconds = (now.getTime() - new Date(info.startTime).getTime()) / 1000
      }
    }
    if (state === 'running') this._activeStage = stageName

    this._stages.set(stageName, info)
    logger.debug({ cardId: this.cardId, stage: stageName, state }, 'Stage state updated')
    this._persist()
  }

  // -------------------------------------------------------------------------
  // Issues and health
  // -------------------------------------------------------------------------

  registerIssue(issueType: IssueType, metadata: Record<string, unknown> = {}): void {
    this._activeIssues.add(issueType)
    logger.warn({ cardId: this.cardId, issueType, ...metadata }, 'Issue registered')
    this._bus.emit('state:issue', { cardId: this.cardId, issueType, action: 'registered' })
    this._refreshHealth()
  }

  /** No-op unless the issue is active */
  resolveIssue(issueType: IssueType): void {
    if (!this._activeIssues.delete(issueType)) return
    this._resolvedIssues.push(issueType)
    this._stats.issuesResolved += 1
    logger.info({ cardId: this.cardId, issueType }, 'Issue resolved')
    this._bus.emit('state:issue', { cardId: this.cardId, issueType, action: 'resolved' })
    this._refreshHealth()
  }

  private _refreshHealth(): void {
    const next = computeHealthStatus(this._activeIssues.size)
    if (next === this._health) return

    const change: HealthTransition = {
      from: this._health,
      to: next,
      event: HEALTH_EVENTS[next],
      activeIssueCount: this._activeIssues.size,
      timestamp: this._now().toISOString(),
    }
    this._health = next
    this._healthHistory.push(change)
    const logContext = { cardId: this.cardId, from: change.from, to: next, activeIssues: change.activeIssueCount }
    if (next === 'healthy') logger.info(logContext, 'Health restored')
    else logger.warn(logContext, 'Health degraded')
    this._bus.emit('state:health', { cardId: this.cardId, change })
    this._persist()
  }

  // -------------------------------------------------------------------------
  // Workflows
  // -------------------------------------------------------------------------

  /** Register (or replace) the workflow for its issue type */
  registerWorkflow(workflow: Workflow): void {
    this._workflows.set(workflow.issueType, workflow)
  }

  /**
   * Run the recovery workflow for `issueType`: the registered one, else one
   * generated by the LLM client. Resolves false when neither exists.
   */
  async executeWorkflow(issueType: IssueType, context: WorkflowContext = {}): Promise<boolean> {
    let workflow = this._workflows.get(issueType)
    if (workflow === undefined) {
      const generated = await this._generator.generate(issueType, context)
      if (generated === null) {
        logger.warn({ cardId: this.cardId, issueType }, 'No recovery workflow available')
        return false
      }
      this.registerWorkflow(generated)
      workflow = generated
    }

    this._stats.workflowExecutions += 1
    const execution = await this._executor.run(workflow, context)
    this._workflowHistory.push(execution)
    this._bus.emit('workflow:finished', { cardId: this.cardId, execution: deepClone(execution) })

    if (execution.success) {
      this._stats.successfulRecoveries += 1
      this.resolveIssue(issueType)
      this.transition(workflow.successState, 'recovery_success', `Workflow ${workflow.name} completed successfully`)
    } else {
      this._stats.failedRecoveries += 1
      this.transition(workflow.failureState, 'recovery_fail', execution.error ?? `Workflow ${workflow.name} failed`)
    }
    return execution.success
  }

  // -------------------------------------------------------------------------
  // Pushdown stack
  // -------------------------------------------------------------------------

  pushState(state: ArtemisState, context: Record<string, unknown> = {}): void {
    this._stack.push(state, context)
  }

  popState(): StackEntry | undefined {
    return this._stack.pop()
  }

  peekState(): StackEntry | undefined {
    return this._stack.peek()
  }

  getStateDepth(): number {
    return this._stack.depth
  }

  /**
   * Pop down to the topmost `target` entry and transition to it. False when
   * `target` is not on the stack.
   */
  rollbackToState(target: ArtemisState): boolean {
    const popped = this._stack.rollbackTo(target)
    if (popped === null) return false
    this.transition(target, 'rollback_complete', `Rolled back ${String(popped.length)} states`)
    return true
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  get checkpointManager(): CheckpointManager | undefined {
    return this._checkpoints
  }

  async createCheckpoint(totalStages: number): Promise<PipelineCheckpoint> {
    return this._requireCheckpoints().createCheckpoint(totalStages, {
      cardId: this.cardId,
      currentState: this._state,
    })
  }

  async saveStageCheckpoint(
    stageName: StageName,
    status: StageCheckpointStatus,
    details: StageCheckpointDetails = {}
  ): Promise<void> {
    await this._requireCheckpoints().saveStageCheckpoint(stageName, status, details)
  }

  async canResume(): Promise<boolean> {
    return this._checkpoints === undefined ? false : this._checkpoints.canResume()
  }

  async resumeFromCheckpoint(): Promise<PipelineCheckpoint | null> {
    return this._checkpoints === undefined ? null : this._checkpoints.resume()
  }

  getCheckpointProgress(): CheckpointProgress {
    return this._checkpoints === undefined ? { ...EMPTY_PROGRESS } : this._checkpoints.getProgress()
  }

  private _requireCheckpoints(): CheckpointManager {
    if (this._checkpoints === undefined) {
      throw new CheckpointError('No checkpoint store configured for this state machine', { cardId: this.cardId })
    }
    return this._checkpoints
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  getSnapshot(): PipelineSnapshot {
    const stages = this.stageStates
    return {
      cardId: this.cardId,
      state: this._state,
      timestamp: this._now().toISOString(),
      stages,
      activeStage: this._activeStage,
      healthStatus: this._health,
      circuitBreakersOpen: Object.values(stages)
        .filter((s) => s.state === 'circuit_open')
        .map((s) => s.stageName),
      activeIssues: this.activeIssues,
    }
  }

  /** Wait for queued snapshot writes */
  async flush(): Promise<void> {
    await this._pendingSave
  }

  private _persist(): void {
    const store = this._snapshotStore
    if (store === undefined) return
    const snapshot = this.getSnapshot()
    this._pendingSave = this._pendingSave
      .then(() => store.save(snapshot))
      .catch((err: unknown) => {
        logger.error({ cardId: this.cardId, err: toError(err) }, 'Failed to persist state snapshot')
      })
  }
}
