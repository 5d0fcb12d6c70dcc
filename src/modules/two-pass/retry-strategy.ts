/**
 * RetryStrategy: retries a pass function with exponential backoff.
 *
 * A thrown error and a result with `success: false` both count as failures.
 * After maxRetries + 1 failed attempts a PassExecutionError is thrown.
 */

import { PassExecutionError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { sleepSeconds, toError } from '../../utils/helpers.js'

const logger = createLogger('two-pass:retry')

export interface RetryStrategyOptions {
  maxRetries?: number
  /** Seconds before the first retry */
  initialDelay?: number
  backoffMultiplier?: number
  sleep?: (seconds: number) => Promise<void>
}

export class RetryStrategy {
  readonly maxRetries: number
  readonly initialDelay: number
  readonly backoffMultiplier: number
  private readonly _sleep: (seconds: number) => Promise<void>

  constructor(options: RetryStrategyOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3
    this.initialDelay = options.initialDelay ?? 0.5
    this.backoffMultiplier = options.backoffMultiplier ?? 2
    this._sleep = options.sleep ?? sleepSeconds
  }

  async execute<T extends { success: boolean }>(fn: () => Promise<T>, label: string): Promise<T> {
    let lastError: Error | undefined
    let lastResult: T | undefined

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.initialDelay * this.backoffMultiplier ** (attempt - 1)
        logger.warn({ label, attempt, delay, error: lastError?.message }, 'Retrying pass')
        await this._sleep(delay)
      }

      try {
        const result = await fn()
        if (result.success) return result
        lastResult = result
        lastError = new Error(`${label} reported failure`)
      } catch (err) {
        lastError = toError(err)
        lastResult = undefined
      }
    }

    throw new PassExecutionError(`${label} failed after ${String(this.maxRetries + 1)} attempts`, {
      label,
      attempts: this.maxRetries + 1,
      lastError: lastError?.message,
      reportedFailure: lastResult !== undefined,
    })
  }
}
