/**
 * Pass strategy contract and the memento handling shared by both passes.
 */

import type { PipelineContext } from '../../../core/types.js'
import { createLogger } from '../../../utils/logger.js'
import { PassMemento } from '../models.js'
import type { PassResult } from '../models.js'

const logger = createLogger('two-pass:strategy')

// ---------------------------------------------------------------------------
// Pass run contract
// ---------------------------------------------------------------------------

/** Pass/fail counts the quality score is derived from */
export interface PassChecks {
  passed: number
  failed: number
}

/** What a caller-supplied pass body returns */
export interface PassRunOutput {
  success?: boolean
  artifacts?: Record<string, unknown>
  checks?: PassChecks
  learnings?: string[]
  insights?: Record<string, unknown>
  warnings?: string[]
  errors?: string[]
}

export interface PassStrategy {
  readonly name: string
  execute(context: PipelineContext): Promise<PassResult>
  createMemento(result: PassResult, state: PipelineContext): PassMemento
  applyMemento(memento: PassMemento, context: PipelineContext): void
}

// ---------------------------------------------------------------------------
// BasePassStrategy
// ---------------------------------------------------------------------------

export abstract class BasePassStrategy implements PassStrategy {
  abstract readonly name: string

  abstract execute(context: PipelineContext): Promise<PassResult>

  createMemento(result: PassResult, state: PipelineContext): PassMemento {
    return PassMemento.fromPassResult(result, state)
  }

  /** Seed `context` with what the memento's pass learned */
  applyMemento(memento: PassMemento, context: PipelineContext): void {
    const copy = memento.createCopy()
    context.learnings = copy.learnings
    context.insights = copy.insights
    context.previous_quality_score = copy.qualityScore
    context.previous_artifacts = copy.artifacts
    logger.debug(
      { from: memento.passName, to: this.name, learnings: copy.learnings.length },
      'Memento applied to context'
    )
  }
}

/** Elapsed seconds since a performance.now() reading */
export function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000
}
