/**
 * LifecycleManager: owns the PipelineState of one pipeline instance and
 * emits the pipeline-level events.
 *
 * Transitions:
 *   created   → ready
 *   ready     → running
 *   running   → paused | completed | failed
 *   paused    → running | completed | failed
 *   completed → ready          (reset)
 *   failed    → ready          (reset)
 *
 * Any illegal request throws InvalidStateTransitionError and leaves the state
 * unchanged.
 */

import { InvalidStateTransitionError, StageModificationError } from '../../core/errors.js'
import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { PipelineObservable } from './observable.js'
import type { PipelineState, StageResult } from './types.js'

const logger = createLogger('pipeline:lifecycle')

const VALID_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  created: ['ready', 'failed'],
  ready: ['running', 'failed'],
  running: ['paused', 'completed', 'failed'],
  paused: ['running', 'completed', 'failed'],
  completed: ['ready'],
  failed: ['ready'],
}

const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set(['completed', 'failed'])

export interface LifecycleTransition {
  from: PipelineState
  to: PipelineState
  timestamp: string
  reason?: string
}

export interface LifecycleManagerOptions {
  pipelineName: string
  observable?: PipelineObservable
}

export class LifecycleManager {
  readonly pipelineName: string
  private readonly _observable: PipelineObservable
  private _state: PipelineState = 'created'
  private _cardId: CardId | undefined
  private readonly _history: LifecycleTransition[] = []
  private _resumeWaiters: Array<() => void> = []

  constructor(options: LifecycleManagerOptions) {
    this.pipelineName = options.pipelineName
    this._observable = options.observable ?? new PipelineObservable()
  }

  get state(): PipelineState {
    return this._state
  }

  /** Card of the current (or last) run */
  get cardId(): CardId | undefined {
    return this._cardId
  }

  transitionToReady(): void {
    this._requireState(['created'], 'ready')
    this._transition('ready', 'stages selected')
  }

  startExecution(cardId: CardId): void {
    this._requireState(['ready'], 'running')
    this._cardId = cardId
    this._transition('running', 'execution started')
    this._emit('pipeline:started', {})
  }

  pause(): void {
    this._requireState(['running'], 'paused')
    this._transition('paused', 'paused')
    this._emit('pipeline:paused', {})
  }

  resume(): void {
    this._requireState(['paused'], 'running')
    this._transition('running', 'resumed')
    this._emit('pipeline:resumed', {})
  }

  /**
   * Resolves once the pipeline leaves `paused`; immediately when it is not
   * paused. Executors await this before starting each stage.
   */
  waitWhilePaused(): Promise<void> {
    if (this._state !== 'paused') return Promise.resolve()
    return new Promise((resolve) => {
      this._resumeWaiters.push(resolve)
    })
  }

  /** A pause requested after the last stage started does not block completion */
  markCompleted(stageCount: number): void {
    this._requireState(['running', 'paused'], 'completed')
    this._transition('completed', 'all stages succeeded')
    this._emit('pipeline:completed', { stageCount })
  }

  /** Fail the run because one or more stages failed */
  markFailed(failures: readonly StageResult[]): void {
    this._requireState(['running', 'paused'], 'failed')
    const detail: Record<string, string> = {}
    for (const failure of failures) {
      detail[failure.stageName] = failure.error?.message ?? 'unknown error'
    }
    this._transition('failed', `${String(failures.length)} stage(s) failed`)
    logger.error({ pipeline: this.pipelineName, failures: detail }, 'Pipeline failed')
    this._emit('pipeline:failed', { failures: detail, failedCount: failures.length })
  }

  /** Fail the run because of an unexpected exception */
  markError(error: Error): void {
    if (this.isTerminal()) {
      throw new InvalidStateTransitionError(this._state, 'failed', { pipeline: this.pipelineName })
    }
    this._transition('failed', error.message)
    logger.error({ pipeline: this.pipelineName, err: error }, 'Pipeline errored')
    this._emit('pipeline:failed', {}, error)
  }

  /** Return a finished pipeline to ready for another run */
  reset(): void {
    if (!this.isTerminal()) {
      throw new InvalidStateTransitionError(this._state, 'ready', {
        pipeline: this.pipelineName,
        reason: 'only a completed or failed pipeline can be reset',
      })
    }
    this._transition('ready', 'reset')
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this._state)
  }

  canModifyStages(): boolean {
    return this._state !== 'running'
  }

  validateStageModification(operation: string): void {
    if (!this.canModifyStages()) {
      throw new StageModificationError(operation, this._state)
    }
  }

  getHistory(): LifecycleTransition[] {
    return this._history.map((entry) => ({ ...entry }))
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private _requireState(allowed: readonly PipelineState[], to: PipelineState): void {
    if (!allowed.includes(this._state) || !VALID_TRANSITIONS[this._state].includes(to)) {
      throw new InvalidStateTransitionError(this._state, to, { pipeline: this.pipelineName })
    }
  }

  private _transition(to: PipelineState, reason: string): void {
    const from = this._state
    this._state = to
    this._history.push({ from, to, timestamp: new Date().toISOString(), reason })
    logger.debug({ pipeline: this.pipelineName, from, to, reason }, 'Pipeline state changed')

    if (from === 'paused') {
      const waiters = this._resumeWaiters
      this._resumeWaiters = []
      for (const release of waiters) release()
    }
  }

  private _emit(
    eventType: 'pipeline:started' | 'pipeline:paused' | 'pipeline:resumed' | 'pipeline:completed' | 'pipeline:failed',
    data: Record<string, unknown>,
    error?: Error
  ): void {
    this._observable.emit(eventType, this._cardId ?? this.pipelineName, {
      data: { pipeline: this.pipelineName, ...data },
      ...(error !== undefined ? { error } : {}),
    })
  }
}
