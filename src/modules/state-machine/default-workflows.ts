/**
 * Default infrastructure recovery workflows. Their actions name
 * RecoveryActions the host process registers (they kill processes, free
 * disk and the like); until it does, those steps fail.
 */

import type { Workflow, WorkflowAction } from './types.js'

function step(actionName: string, maxRetries?: number): WorkflowAction {
  return maxRetries === undefined
    ? { actionName, retryOnFailure: false, maxRetries: 1 }
    : { actionName, retryOnFailure: true, maxRetries }
}

export function buildDefaultWorkflows(): Workflow[] {
  return [
    {
      name: 'Timeout Recovery',
      issueType: 'timeout',
      actions: [step('increase_timeout'), step('kill_hanging_process', 2)],
      successState: 'running',
      failureState: 'failed',
      rollbackOnFailure: false,
    },
    {
      name: 'Hanging Process Recovery',
      issueType: 'hanging_process',
      actions: [step('kill_hanging_process', 3), step('cleanup_temp_files')],
      successState: 'running',
      failureState: 'failed',
      rollbackOnFailure: false,
    },
    {
      name: 'Memory Recovery',
      issueType: 'memory_exhausted',
      actions: [step('free_memory'), step('cleanup_temp_files')],
      successState: 'running',
      failureState: 'failed',
      rollbackOnFailure: false,
    },
    {
      name: 'Disk Space Recovery',
      issueType: 'disk_full',
      actions: [step('cleanup_temp_files'), step('check_disk_space')],
      successState: 'running',
      failureState: 'failed',
      rollbackOnFailure: false,
    },
    {
      name: 'Network Error Recovery',
      issueType: 'network_error',
      actions: [step('retry_network_request', 3)],
      successState: 'running',
      failureState: 'degraded',
      rollbackOnFailure: false,
    },
  ]
}
