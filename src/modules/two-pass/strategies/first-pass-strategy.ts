/**
 * FirstPassStrategy: the fast analysis pass.
 *
 * Runs the supplied body once and scores it by its checks:
 * quality = passed / (passed + failed), or 0.5 when nothing was checked.
 */

import type { PipelineContext } from '../../../core/types.js'
import { createPassResult } from '../models.js'
import type { PassResult } from '../models.js'
import { BasePassStrategy, elapsedSeconds } from './base-strategy.js'
import type { PassChecks, PassRunOutput } from './base-strategy.js'

export const FIRST_PASS_NAME = 'FirstPass'

export type FirstPassRun = (context: PipelineContext) => Promise<PassRunOutput>

export function firstPassQuality(checks: PassChecks | undefined): number {
  if (checks === undefined) return 0.5
  const total = checks.passed + checks.failed
  return total === 0 ? 0.5 : checks.passed / total
}

export class FirstPassStrategy extends BasePassStrategy {
  readonly name: string = FIRST_PASS_NAME
  private readonly _run: FirstPassRun

  constructor(run: FirstPassRun) {
    super()
    this._run = run
  }

  async execute(context: PipelineContext): Promise<PassResult> {
    const startedAt = performance.now()
    const output = await this._run(context)
    const learnings = [...(output.learnings ?? [])]

    if (output.checks !== undefined) {
      if (output.checks.passed > 0) learnings.push(`Validated ${String(output.checks.passed)} inputs successfully`)
      if (output.checks.failed > 0) {
        learnings.push(`Found ${String(output.checks.failed)} validation failures to address`)
      }
    }

    return createPassResult({
      passName: this.name,
      success: output.success ?? true,
      artifacts: output.artifacts ?? {},
      qualityScore: firstPassQuality(output.checks),
      executionTime: elapsedSeconds(startedAt),
      learnings,
      insights: output.insights ?? {},
      warnings: output.warnings ?? [],
      errors: output.errors ?? [],
      metadata: { passType: 'fast_analysis', checks: output.checks ?? null },
    })
  }
}
