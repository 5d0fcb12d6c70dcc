/**
 * RetryPolicy: decides whether a failed stage is retried and how long to
 * wait before the next attempt.
 *
 * delay(attempt) = min(initialDelay * backoffMultiplier ^ attempt, maxDelay)   (seconds)
 */

import { PipelineConfigError } from '../../core/errors.js'

/** Constructor of an error class that is worth retrying */
export type RetryableErrorClass = abstract new (...args: never[]) => Error

export interface RetryPolicyOptions {
  /** Retries after the first attempt (default 3) */
  maxRetries?: number
  /** Delay before the first retry, in seconds (default 1.0) */
  initialDelay?: number
  /** Exponential growth factor (default 2.0) */
  backoffMultiplier?: number
  /** Upper bound for a single delay, in seconds (default 60) */
  maxDelay?: number
  /** When set, only instances of these classes are retried */
  retryableErrors?: readonly RetryableErrorClass[]
}

/** Shape of the `retry` config section */
export interface RetryConfigSection {
  max_retries: number
  initial_delay_seconds: number
  backoff_multiplier: number
  max_delay_seconds: number
}

export class RetryPolicy {
  readonly maxRetries: number
  readonly initialDelay: number
  readonly backoffMultiplier: number
  readonly maxDelay: number
  readonly retryableErrors: readonly RetryableErrorClass[] | undefined

  constructor(options: RetryPolicyOptions = {}) {
    const maxRetries = options.maxRetries ?? 3
    const initialDelay = options.initialDelay ?? 1.0
    const backoffMultiplier = options.backoffMultiplier ?? 2.0
    const maxDelay = options.maxDelay ?? 60

    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new PipelineConfigError(`maxRetries must be a non-negative integer, got ${String(maxRetries)}`, {
        maxRetries,
      })
    }
    if (initialDelay < 0 || backoffMultiplier < 0 || maxDelay < 0) {
      throw new PipelineConfigError('Retry delays and multiplier must be non-negative', {
        initialDelay,
        backoffMultiplier,
        maxDelay,
      })
    }

    this.maxRetries = maxRetries
    this.initialDelay = initialDelay
    this.backoffMultiplier = backoffMultiplier
    this.maxDelay = maxDelay
    this.retryableErrors =
      options.retryableErrors !== undefined ? Object.freeze([...options.retryableErrors]) : undefined
    Object.freeze(this)
  }

  /**
   * Whether a failure on `attempt` (0-based) should be retried.
   */
  shouldRetry(error: Error, attempt: number): boolean {
    if (attempt >= this.maxRetries) return false
    if (this.retryableErrors === undefined) return true
    return this.retryableErrors.some((errorClass) => error instanceof errorClass)
  }

  /** Seconds to wait after a failure on `attempt` (0-based) */
  getDelay(attempt: number): number {
    return Math.min(this.initialDelay * this.backoffMultiplier ** attempt, this.maxDelay)
  }

  /** Build a policy from the `retry` config section */
  static fromConfig(section: RetryConfigSection): RetryPolicy {
    return new RetryPolicy({
      maxRetries: section.max_retries,
      initialDelay: section.initial_delay_seconds,
      backoffMultiplier: section.backoff_multiplier,
      maxDelay: section.max_delay_seconds,
    })
  }

  /** A policy that never retries */
  static none(): RetryPolicy {
    return new RetryPolicy({ maxRetries: 0, initialDelay: 0 })
  }
}
