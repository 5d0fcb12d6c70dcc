/**
 * Types for the task-level state machine: composite pipeline state, per-stage
 * state, issues, recovery workflows and snapshots.
 */

import type { CardId, StageName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Closed vocabularies
// ---------------------------------------------------------------------------

export const ARTEMIS_STATES = [
  'idle',
  'initializing',
  'running',
  'paused',
  'completed',
  'failed',
  'aborted',
  'recovering',
  'degraded',
  'rolling_back',
  'stage_running',
  'stage_completed',
  'stage_failed',
  'stage_skipped',
  'stage_retrying',
] as const

export type ArtemisState = (typeof ARTEMIS_STATES)[number]

export const STAGE_STATES = [
  'pending',
  'running',
  'completed',
  'failed',
  'retrying',
  'skipped',
  'circuit_open',
  'timed_out',
  'rolled_back',
] as const

export type StageState = (typeof STAGE_STATES)[number]

export const STATE_EVENT_TYPES = [
  'start',
  'complete',
  'fail',
  'abort',
  'pause',
  'resume',
  'stage_start',
  'stage_complete',
  'stage_fail',
  'stage_retry',
  'stage_skip',
  'recovery_start',
  'recovery_success',
  'recovery_fail',
  'rollback_start',
  'rollback_complete',
  'health_degraded',
  'health_critical',
  'health_restored',
  'circuit_open',
  'circuit_close',
] as const

export type StateEventType = (typeof STATE_EVENT_TYPES)[number]

export const ISSUE_TYPES = [
  // infrastructure
  'timeout',
  'hanging_process',
  'memory_exhausted',
  'disk_full',
  'network_error',
  // code
  'compilation_error',
  'test_failure',
  'security_vulnerability',
  'linting_error',
  // dependencies
  'missing_dependency',
  'version_conflict',
  'import_error',
  // LLM
  'llm_api_error',
  'llm_timeout',
  'llm_rate_limit',
  'invalid_llm_response',
  // stages
  'architecture_invalid',
  'code_review_failed',
  'integration_conflict',
  'validation_failed',
  // coordination
  'arbitration_deadlock',
  'developer_conflict',
  'messenger_error',
  // data
  'invalid_card',
  'corrupted_state',
  'rag_error',
  // system
  'multiple_stages_failing',
  'zombie_process',
  'file_lock',
  'permission_denied',
] as const

export type IssueType = (typeof ISSUE_TYPES)[number]

export type HealthStatus = 'healthy' | 'degraded' | 'critical'

const ARTEMIS_STATE_SET: ReadonlySet<string> = new Set(ARTEMIS_STATES)
const ISSUE_TYPE_SET: ReadonlySet<string> = new Set(ISSUE_TYPES)

export function isArtemisState(value: string): value is ArtemisState {
  return ARTEMIS_STATE_SET.has(value)
}

export function isIssueType(value: string): value is IssueType {
  return ISSUE_TYPE_SET.has(value)
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Frozen once recorded */
export interface StateTransition {
  readonly fromState: ArtemisState
  readonly toState: ArtemisState
  readonly event: StateEventType
  readonly timestamp: string
  readonly reason?: string
  readonly metadata: Readonly<Record<string, unknown>>
}

export interface StageStateInfo {
  stageName: StageName
  state: StageState
  startTime: string | null
  endTime: string | null
  durationSeconds: number | null
  metadata: Record<string, unknown>
}

export interface HealthTransition {
  from: HealthStatus
  to: HealthStatus
  event: Extract<StateEventType, 'health_degraded' | 'health_critical' | 'health_restored'>
  activeIssueCount: number
  timestamp: string
}

// ---------------------------------------------------------------------------
// Workflows
// ---------------------------------------------------------------------------

/** Mutable bag shared by the actions of one workflow run */
export type WorkflowContext = Record<string, unknown>

export type ActionHandler = (context: WorkflowContext) => boolean | Promise<boolean>
export type ActionRollbackHandler = (context: WorkflowContext) => void | Promise<void>

/**
 * One step of a recovery workflow. Without `handler` the step runs the
 * RecoveryAction registered under `actionName`.
 */
export interface WorkflowAction {
  actionName: string
  handler?: ActionHandler
  rollbackHandler?: ActionRollbackHandler
  retryOnFailure: boolean
  /** Total attempts when retryOnFailure is set */
  maxRetries: number
}

export interface Workflow {
  name: string
  issueType: IssueType
  actions: WorkflowAction[]
  successState: ArtemisState
  failureState: ArtemisState
  rollbackOnFailure: boolean
}

export interface WorkflowExecution {
  workflowName: string
  issueType: IssueType
  startTime: string
  endTime: string | null
  success: boolean
  actionsTaken: string[]
  finalState: ArtemisState | null
  error?: string
}

// ---------------------------------------------------------------------------
// Snapshots and stats
// ---------------------------------------------------------------------------

export interface PipelineSnapshot {
  cardId: CardId
  state: ArtemisState
  timestamp: string
  stages: Record<StageName, StageStateInfo>
  activeStage: StageName | null
  healthStatus: HealthStatus
  circuitBreakersOpen: StageName[]
  activeIssues: IssueType[]
}

export interface StateMachineStats {
  totalTransitions: number
  workflowExecutions: number
  successfulRecoveries: number
  failedRecoveries: number
  issuesResolved: number
}

export interface StackEntry {
  state: ArtemisState
  timestamp: string
  context: Record<string, unknown>
}

/** Events published on the state machine's bus */
export type StateMachineEvents = {
  'state:transition': { cardId: CardId; transition: StateTransition }
  'state:health': { cardId: CardId; change: HealthTransition }
  'state:issue': { cardId: CardId; issueType: IssueType; action: 'registered' | 'resolved' }
  'workflow:finished': { cardId: CardId; execution: WorkflowExecution }
}
