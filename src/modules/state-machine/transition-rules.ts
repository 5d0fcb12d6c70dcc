/**
 * Allowed edges of the task-level state machine. Self-transitions are always
 * allowed; `completed` and `aborted` are final.
 */

import type { ArtemisState } from './types.js'

export const TRANSITION_RULES: Readonly<Record<ArtemisState, readonly ArtemisState[]>> = {
  idle: ['initializing', 'aborted'],
  initializing: ['running', 'failed', 'aborted'],
  running: ['stage_running', 'paused', 'completed', 'failed', 'degraded', 'aborted'],
  stage_running: ['stage_completed', 'stage_failed', 'stage_retrying', 'stage_skipped', 'running'],
  stage_completed: ['running', 'stage_running'],
  stage_skipped: ['running', 'stage_running'],
  stage_retrying: ['stage_running', 'stage_failed'],
  stage_failed: ['stage_retrying', 'recovering', 'failed', 'rolling_back'],
  recovering: ['running', 'degraded', 'failed', 'rolling_back'],
  degraded: ['running', 'completed', 'failed'],
  paused: ['running', 'aborted'],
  rolling_back: ['failed', 'aborted'],
  failed: ['recovering', 'rolling_back', 'aborted'],
  completed: [],
  aborted: [],
}

export function isValidTransition(from: ArtemisState, to: ArtemisState): boolean {
  return from === to || TRANSITION_RULES[from].includes(to)
}
