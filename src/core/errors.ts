/**
 * Error definitions for the Artemis pipeline engine.
 *
 * Structural problems (bad builder input, cycles, illegal transitions) are
 * thrown as one of these classes. Stage failures are never thrown; they are
 * reported as StageResult values.
 */

/** Base error class for all Artemis errors */
export class ArtemisError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ArtemisError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArtemisError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a pipeline or stage definition is invalid */
export class PipelineConfigError extends ArtemisError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'PIPELINE_CONFIG_ERROR') {
    super(message, code, context)
    this.name = 'PipelineConfigError'
  }
}

/** Error thrown when stage dependencies form a cycle */
export class StageCycleError extends PipelineConfigError {
  public readonly cycle: string[]

  constructor(cycle: string[]) {
    super(
      `Circular dependency detected between stages: ${cycle.join(', ')}`,
      { cycle },
      'STAGE_CYCLE_ERROR'
    )
    this.name = 'StageCycleError'
    this.cycle = cycle
  }
}

/** Error thrown when a lifecycle transition is not allowed from the current state */
export class InvalidStateTransitionError extends ArtemisError {
  constructor(from: string, to: string, context: Record<string, unknown> = {}) {
    super(`Invalid state transition: ${from} → ${to}`, 'INVALID_STATE_TRANSITION', {
      from,
      to,
      ...context,
    })
    this.name = 'InvalidStateTransitionError'
  }
}

/** Error thrown when stages are added or removed while the pipeline runs */
export class StageModificationError extends ArtemisError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while pipeline is ${state}`, 'STAGE_MODIFICATION_ERROR', {
      operation,
      state,
    })
    this.name = 'StageModificationError'
  }
}

/** Error thrown when a two-pass pass fails after all retries */
export class PassExecutionError extends ArtemisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PASS_EXECUTION_ERROR', context)
    this.name = 'PassExecutionError'
  }
}

/** Error thrown for checkpoint misuse or unreadable checkpoint data */
export class CheckpointError extends ArtemisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CHECKPOINT_ERROR', context)
    this.name = 'CheckpointError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends ArtemisError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}
