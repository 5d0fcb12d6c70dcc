/**
 * TimedPassStrategy: races a wrapped pass against a per-run timeout.
 *
 * A timed-out run rejects with PassExecutionError; the retry strategy
 * counts it as a failed attempt. The wrapped pass keeps running in the
 * background, its result is discarded.
 */

import { PassExecutionError } from '../../core/errors.js'
import type { PipelineContext } from '../../core/types.js'
import { withTimeout } from '../../utils/helpers.js'
import type { PassMemento, PassResult } from './models.js'
import type { PassStrategy } from './strategies/base-strategy.js'

export class TimedPassStrategy implements PassStrategy {
  /** Seconds; 0 or less disables the timeout */
  timeoutSeconds: number
  private readonly _inner: PassStrategy

  constructor(inner: PassStrategy, timeoutSeconds: number) {
    this._inner = inner
    this.timeoutSeconds = timeoutSeconds
  }

  get name(): string {
    return this._inner.name
  }

  execute(context: PipelineContext): Promise<PassResult> {
    const run = this._inner.execute(context)
    if (this.timeoutSeconds <= 0) return run
    const seconds = this.timeoutSeconds
    return withTimeout(
      run,
      seconds * 1000,
      () =>
        new PassExecutionError(`${this.name} timed out after ${String(seconds)}s`, {
          passName: this.name,
          timeoutSeconds: seconds,
        })
    )
  }

  createMemento(result: PassResult, state: PipelineContext): PassMemento {
    return this._inner.createMemento(result, state)
  }

  applyMemento(memento: PassMemento, context: PipelineContext): void {
    this._inner.applyMemento(memento, context)
  }
}
