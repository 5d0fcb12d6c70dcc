/**
 * Unit tests for the Artemis error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  ArtemisError,
  PipelineConfigError,
  StageCycleError,
  InvalidStateTransitionError,
  StageModificationError,
  PassExecutionError,
  CheckpointError,
  ConfigError,
} from '../errors.js'

describe('ArtemisError', () => {
  it('carries code and context and serializes them', () => {
    const error = new ArtemisError('boom', 'SOMETHING', { stage: 'build' })
    expect(error).toBeInstanceOf(Error)
    expect(error.toJSON()).toMatchObject({
      name: 'ArtemisError',
      message: 'boom',
      code: 'SOMETHING',
      context: { stage: 'build' },
    })
  })
})

describe('subclasses', () => {
  it('reports cycles as configuration errors', () => {
    const error = new StageCycleError(['a', 'b', 'a'])
    expect(error).toBeInstanceOf(PipelineConfigError)
    expect(error.code).toBe('STAGE_CYCLE_ERROR')
    expect(error.cycle).toEqual(['a', 'b', 'a'])
    expect(error.message).toBe('Circular dependency detected between stages: a, b, a')
  })

  it('names both states of a refused transition', () => {
    const error = new InvalidStateTransitionError('completed', 'running')
    expect(error.message).toBe('Invalid state transition: completed → running')
    expect(error.context).toEqual({ from: 'completed', to: 'running' })
  })

  it('describes a stage change during a run', () => {
    const error = new StageModificationError('add stage', 'running')
    expect(error.message).toBe('Cannot add stage while pipeline is running')
    expect(error.code).toBe('STAGE_MODIFICATION_ERROR')
  })

  it.each([
    [new PipelineConfigError('x'), 'PIPELINE_CONFIG_ERROR', 'PipelineConfigError'],
    [new PassExecutionError('x'), 'PASS_EXECUTION_ERROR', 'PassExecutionError'],
    [new CheckpointError('x'), 'CHECKPOINT_ERROR', 'CheckpointError'],
    [new ConfigError('x'), 'CONFIG_ERROR', 'ConfigError'],
  ])('sets code and name on %o', (error, code, name) => {
    expect(error).toBeInstanceOf(ArtemisError)
    expect(error.code).toBe(code)
    expect(error.name).toBe(name)
  })
})
