/**
 * Stage helpers: an abstract base class for class-style stages and a
 * factory for function-style stages.
 */

import type { PipelineContext, StageName } from '../../core/types.js'
import type { PipelineStage, StageResult } from './types.js'
import { stageSucceeded } from './types.js'

// ---------------------------------------------------------------------------
// BasePipelineStage
// ---------------------------------------------------------------------------

export abstract class BasePipelineStage implements PipelineStage {
  readonly name: StageName
  private readonly _dependencies: readonly StageName[]

  protected constructor(name: StageName, dependencies: readonly StageName[] = []) {
    this.name = name
    this._dependencies = [...dependencies]
  }

  getDependencies(): StageName[] {
    return [...this._dependencies]
  }

  shouldExecute(_context: PipelineContext): boolean {
    return true
  }

  abstract execute(context: PipelineContext): Promise<StageResult>
}

// ---------------------------------------------------------------------------
// createStage
// ---------------------------------------------------------------------------

export interface StageDefinition {
  name: StageName
  dependencies?: readonly StageName[]
  /** Conditional-execution predicate (default: always run) */
  condition?: (context: PipelineContext) => boolean
  /**
   * Stage body. May return a full StageResult or plain data, which is wrapped
   * in a successful result.
   */
  run: (context: PipelineContext) => Promise<StageResult | Record<string, unknown> | void>
}

class FunctionStage extends BasePipelineStage {
  private readonly _definition: StageDefinition

  constructor(definition: StageDefinition) {
    super(definition.name, definition.dependencies)
    this._definition = definition
  }

  override shouldExecute(context: PipelineContext): boolean {
    return this._definition.condition?.(context) ?? true
  }

  async execute(context: PipelineContext): Promise<StageResult> {
    const output = await this._definition.run(context)
    if (output === undefined) return stageSucceeded(this.name)
    if (isStageResult(output)) return output
    return stageSucceeded(this.name, output)
  }
}

/**
 * Build a stage from a plain function.
 *
 * @example
 * const lint = createStage({
 *   name: 'lint',
 *   dependencies: ['development'],
 *   run: async (ctx) => ({ warnings: 0 }),
 * })
 */
export function createStage(definition: StageDefinition): PipelineStage {
  return new FunctionStage(definition)
}

function isStageResult(value: StageResult | Record<string, unknown>): value is StageResult {
  return (
    typeof value.stageName === 'string' &&
    typeof value.success === 'boolean' &&
    typeof value.skipped === 'boolean' &&
    typeof value.data === 'object'
  )
}
