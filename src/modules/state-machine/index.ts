/**
 * State machine module: task-level state, issues, recovery workflows and
 * checkpoints for one card.
 */

export {
  ARTEMIS_STATES,
  STAGE_STATES,
  STATE_EVENT_TYPES,
  ISSUE_TYPES,
  isArtemisState,
  isIssueType,
} from './types.js'
export type {
  ArtemisState,
  StageState,
  StateEventType,
  IssueType,
  HealthStatus,
  StateTransition,
  StageStateInfo,
  HealthTransition,
  WorkflowContext,
  ActionHandler,
  ActionRollbackHandler,
  WorkflowAction,
  Workflow,
  WorkflowExecution,
  PipelineSnapshot,
  StateMachineStats,
  StackEntry,
  StateMachineEvents,
} from './types.js'

export { TRANSITION_RULES, isValidTransition } from './transition-rules.js'
export { PushdownAutomaton } from './pushdown-automaton.js'
export {
  RecoveryActionRegistry,
  BUILTIN_RECOVERY_ACTIONS,
  createRecoveryActionRegistry,
  retryWithBackoff,
  resetState,
  skipStage,
  useCachedResult,
  fallbackToDefault,
} from './recovery-actions.js'
export type { RecoveryAction } from './recovery-actions.js'
export { buildDefaultWorkflows } from './default-workflows.js'
export { WorkflowExecutor } from './workflow-executor.js'
export type { WorkflowExecutorOptions } from './workflow-executor.js'
export {
  LlmWorkflowGenerator,
  GeneratedWorkflowSchema,
  LLM_WORKFLOW_TEMPERATURE,
  LLM_WORKFLOW_MAX_TOKENS,
} from './llm-workflow-generator.js'
export type {
  LlmClient,
  LlmMessage,
  LlmCompletion,
  LlmCompletionRequest,
  GeneratedWorkflow,
} from './llm-workflow-generator.js'
export { StateSnapshotStore, PipelineSnapshotSchema } from './state-snapshot-store.js'
export { ArtemisStateMachine, computeHealthStatus } from './artemis-state-machine.js'
export type { ArtemisStateMachineOptions } from './artemis-state-machine.js'
export { createStateMachine } from './state-machine-factory.js'
export type { StateMachineRuntimeOptions } from './state-machine-factory.js'
