/**
 * WorkflowExecutor: runs the actions of one recovery workflow in order.
 *
 * Each action gets `maxRetries` attempts when `retryOnFailure` is set, one
 * otherwise, with `backoffFactor ** attempt` seconds between attempts. A
 * handler that throws counts as a failed attempt. The first action that
 * exhausts its attempts stops the workflow; with `rollbackOnFailure` the
 * actions that did succeed are rolled back in reverse order.
 */

import { createLogger } from '../../utils/logger.js'
import { sleepSeconds, toError } from '../../utils/helpers.js'
import type { RecoveryActionRegistry } from './recovery-actions.js'
import type { ActionHandler, ActionRollbackHandler, Workflow, WorkflowAction, WorkflowContext, WorkflowExecution } from './types.js'

const logger = createLogger('state-machine:workflow')

export interface WorkflowExecutorOptions {
  registry: RecoveryActionRegistry
  backoffFactor?: number
  sleep?: (seconds: number) => Promise<void>
  now?: () => Date
}

export class WorkflowExecutor {
  private readonly _registry: RecoveryActionRegistry
  private readonly _backoffFactor: number
  private readonly _sleep: (seconds: number) => Promise<void>
  private readonly _now: () => Date

  constructor(options: WorkflowExecutorOptions) {
    this._registry = options.registry
    this._backoffFactor = options.backoffFactor ?? 2
    this._sleep = options.sleep ?? sleepSeconds
    this._now = options.now ?? (() => new Date())
  }

  async run(workflow: Workflow, context: WorkflowContext): Promise<WorkflowExecution> {
    const execution: WorkflowExecution = {
      workflowName: workflow.name,
      issueType: workflow.issueType,
      startTime: this._now().toISOString(),
      endTime: null,
      success: false,
      actionsTaken: [],
      finalState: null,
    }
    logger.info({ workflow: workflow.name, issueType: workflow.issueType }, 'Executing recovery workflow')

    const completed: WorkflowAction[] = []
    for (const action of workflow.actions) {
      const succeeded = await this._runAction(action, context)
      execution.actionsTaken.push(action.actionName)
      if (!succeeded) {
        execution.error = `Workflow ${workflow.name} failed at action ${action.actionName}`
        if (workflow.rollbackOnFailure) await this._rollback(completed, context)
        return this._finish(execution, workflow, false)
      }
      completed.push(action)
    }
    return this._finish(execution, workflow, true)
  }

  private _finish(execution: WorkflowExecution, workflow: Workflow, success: boolean): WorkflowExecution {
    execution.success = success
    execution.endTime = this._now().toISOString()
    execution.finalState = success ? workflow.successState : workflow.failureState
    if (success) {
      logger.info({ workflow: workflow.name, actions: execution.actionsTaken }, 'Recovery workflow succeeded')
    } else {
      logger.warn({ workflow: workflow.name, actions: execution.actionsTaken }, execution.error ?? 'Recovery workflow failed')
    }
    return execution
  }

  private async _runAction(action: WorkflowAction, context: WorkflowContext): Promise<boolean> {
    const handler = this._handlerFor(action)
    if (handler === undefined) {
      logger.warn({ action: action.actionName }, 'No recovery action registered under this name')
      return false
    }

    const maxAttempts = action.retryOnFailure ? Math.max(1, action.maxRetries) : 1
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        if (await handler(context)) return true
      } catch (err) {
        logger.warn({ action: action.actionName, attempt: attempt + 1, err: toError(err) }, 'Recovery action threw')
      }
      if (attempt < maxAttempts - 1) {
        const delay = this._backoffFactor ** attempt
        logger.debug({ action: action.actionName, attempt: attempt + 1, maxAttempts, delay }, 'Retrying recovery action')
        await this._sleep(delay)
      }
    }
    return false
  }

  private _handlerFor(action: WorkflowAction): ActionHandler | undefined {
    if (action.handler !== undefined) return action.handler
    const registered = this._registry.get(action.actionName)
    return registered === undefined ? undefined : (context) => registered.execute(context)
  }

  private _rollbackFor(action: WorkflowAction): ActionRollbackHandler | undefined {
    if (action.rollbackHandler !== undefined) return action.rollbackHandler
    if (action.handler !== undefined) return undefined
    const registered = this._registry.get(action.actionName)
    if (registered?.rollback === undefined) return undefined
    return (context) => registered.rollback?.(context)
  }

  private async _rollback(completed: readonly WorkflowAction[], context: WorkflowContext): Promise<void> {
    for (const action of [...completed].reverse()) {
      const rollback = this._rollbackFor(action)
      if (rollback === undefined) continue
      try {
        await rollback(context)
        logger.info({ action: action.actionName }, 'Rolled back recovery action')
      } catch (err) {
        logger.error({ action: action.actionName, err: toError(err) }, 'Recovery action rollback failed')
      }
    }
  }
}
