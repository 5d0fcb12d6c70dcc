/**
 * Recovery actions: named, reusable steps that workflows refer to by name.
 *
 * Built-ins:
 *   retry_with_backoff   bump context.retry_count (max 3) and set backoff_seconds
 *   reset_state          clear error and retry bookkeeping from the context
 *   skip_stage           succeed only for non-critical stages
 *   use_cached_result    copy context.cached_result into context.result
 *   fallback_to_default  fill context[missing_key] with a known default
 *
 * Infrastructure actions used by the default workflows (increase_timeout,
 * kill_hanging_process, free_memory, cleanup_temp_files, check_disk_space,
 * retry_network_request) touch the host and are registered by the caller.
 */

import { ArtemisError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { WorkflowContext } from './types.js'

const logger = createLogger('state-machine:actions')

export interface RecoveryAction {
  readonly name: string
  execute(context: WorkflowContext): boolean | Promise<boolean>
  /** Undo the effect of a successful execute */
  rollback?(context: WorkflowContext): void | Promise<void>
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class RecoveryActionRegistry {
  private readonly _actions = new Map<string, RecoveryAction>()

  /** @throws {ArtemisError} DUPLICATE_RECOVERY_ACTION unless `replace` is set */
  register(action: RecoveryAction, replace = false): void {
    if (!replace && this._actions.has(action.name)) {
      throw new ArtemisError(`Recovery action "${action.name}" is already registered`, 'DUPLICATE_RECOVERY_ACTION', {
        action: action.name,
      })
    }
    this._actions.set(action.name, action)
  }

  get(name: string): RecoveryAction | undefined {
    return this._actions.get(name)
  }

  has(name: string): boolean {
    return this._actions.has(name)
  }

  /** Registered names in registration order */
  get names(): string[] {
    return [...this._actions.keys()]
  }
}

// ---------------------------------------------------------------------------
// Built-in actions
// ---------------------------------------------------------------------------

const MAX_CONTEXT_RETRIES = 3

const NON_CRITICAL_STAGES: ReadonlySet<string> = new Set(['ui_ux', 'code_review', 'documentation'])

const FALLBACK_DEFAULTS: Readonly<Record<string, unknown>> = {
  approach: 'standard',
  architecture: 'modular',
  strategy: 'default',
  method: 'default',
  priority: 'medium',
  developer: 'unknown',
  status: 'pending',
  result: 'unknown',
  score: 0,
  count: 0,
  enabled: false,
}

const RESET_KEYS = ['error', 'last_error', 'retry_count', 'backoff_seconds'] as const

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback
}

export const retryWithBackoff: RecoveryAction = {
  name: 'retry_with_backoff',
  execute(context) {
    const attempts = numberOr(context.retry_count, 0)
    if (attempts >= MAX_CONTEXT_RETRIES) {
      logger.warn({ attempts }, 'Retry budget exhausted')
      return false
    }
    const next = attempts + 1
    context.retry_count = next
    context.backoff_seconds = 2 ** next
    return true
  },
  rollback(context) {
    const attempts = numberOr(context.retry_count, 0)
    if (attempts > 0) context.retry_count = attempts - 1
  },
}

export const resetState: RecoveryAction = {
  name: 'reset_state',
  execute(context) {
    for (const key of RESET_KEYS) delete context[key]
    return true
  },
}

export const skipStage: RecoveryAction = {
  name: 'skip_stage',
  execute(context) {
    const stage = typeof context.stage_name === 'string' ? context.stage_name.toLowerCase() : ''
    if (!NON_CRITICAL_STAGES.has(stage)) {
      logger.warn({ stage }, 'Refusing to skip a critical stage')
      return false
    }
    context.skipped = true
    return true
  },
  rollback(context) {
    delete context.skipped
  },
}

export const useCachedResult: RecoveryAction = {
  name: 'use_cached_result',
  execute(context) {
    if (context.cached_result === undefined || context.cached_result === null) return false
    context.result = context.cached_result
    return true
  },
  rollback(context) {
    delete context.result
  },
}

export const fallbackToDefault: RecoveryAction = {
  name: 'fallback_to_default',
  execute(context) {
    const key = context.missing_key
    if (typeof key !== 'string' || !Object.hasOwn(FALLBACK_DEFAULTS, key)) return false
    context[key] = FALLBACK_DEFAULTS[key]
    return true
  },
  rollback(context) {
    const key = context.missing_key
    if (typeof key === 'string') delete context[key]
  },
}

export const BUILTIN_RECOVERY_ACTIONS: readonly RecoveryAction[] = [
  retryWithBackoff,
  resetState,
  skipStage,
  useCachedResult,
  fallbackToDefault,
]

/** Registry holding the built-in actions */
export function createRecoveryActionRegistry(extra: readonly RecoveryAction[] = []): RecoveryActionRegistry {
  const registry = new RecoveryActionRegistry()
  for (const action of [...BUILTIN_RECOVERY_ACTIONS, ...extra]) registry.register(action)
  return registry
}
