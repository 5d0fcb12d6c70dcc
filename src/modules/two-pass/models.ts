/**
 * Two-pass data model: pass results, the delta between two passes and the
 * memento that captures a pass for rollback.
 */

import type { PipelineContext } from '../../core/types.js'
import { deepClone, deepEqual } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// PassResult
// ---------------------------------------------------------------------------

export interface PassResult {
  readonly passName: string
  readonly success: boolean
  readonly artifacts: Readonly<Record<string, unknown>>
  /** 0.0 – 1.0 */
  readonly qualityScore: number
  /** Seconds */
  readonly executionTime: number
  readonly learnings: readonly string[]
  readonly insights: Readonly<Record<string, unknown>>
  readonly errors: readonly string[]
  readonly warnings: readonly string[]
  readonly metadata: Readonly<Record<string, unknown>>
  /** ISO-8601 */
  readonly timestamp: string
}

export type PassResultInput = Pick<PassResult, 'passName' | 'success'> &
  Partial<Omit<PassResult, 'passName' | 'success'>>

/** Build a frozen PassResult, filling unspecified fields with empty defaults */
export function createPassResult(fields: PassResultInput): PassResult {
  return Object.freeze({
    passName: fields.passName,
    success: fields.success,
    artifacts: fields.artifacts ?? {},
    qualityScore: fields.qualityScore ?? 0,
    executionTime: fields.executionTime ?? 0,
    learnings: fields.learnings ?? [],
    insights: fields.insights ?? {},
    errors: fields.errors ?? [],
    warnings: fields.warnings ?? [],
    metadata: fields.metadata ?? {},
    timestamp: fields.timestamp ?? new Date().toISOString(),
  })
}

// ---------------------------------------------------------------------------
// PassDelta
// ---------------------------------------------------------------------------

export interface PassDelta {
  readonly firstPass: PassResult
  readonly secondPass: PassResult
  /** second − first */
  readonly qualityDelta: number
  readonly qualityImproved: boolean
  readonly newArtifacts: readonly string[]
  readonly modifiedArtifacts: readonly string[]
  readonly removedArtifacts: readonly string[]
  /** Learnings of the second pass that the first pass did not have */
  readonly newLearnings: readonly string[]
  /** second − first, seconds */
  readonly executionTimeDelta: number
}

/** Pure comparison of two pass results */
export function computePassDelta(firstPass: PassResult, secondPass: PassResult): PassDelta {
  const firstKeys = new Set(Object.keys(firstPass.artifacts))
  const secondKeys = new Set(Object.keys(secondPass.artifacts))
  const qualityDelta = secondPass.qualityScore - firstPass.qualityScore
  const firstLearnings = new Set(firstPass.learnings)

  return Object.freeze({
    firstPass,
    secondPass,
    qualityDelta,
    qualityImproved: qualityDelta > 0,
    newArtifacts: [...secondKeys].filter((k) => !firstKeys.has(k)).sort(),
    removedArtifacts: [...firstKeys].filter((k) => !secondKeys.has(k)).sort(),
    modifiedArtifacts: [...secondKeys]
      .filter((k) => firstKeys.has(k) && !deepEqual(firstPass.artifacts[k], secondPass.artifacts[k]))
      .sort(),
    newLearnings: [...new Set(secondPass.learnings)].filter((l) => !firstLearnings.has(l)),
    executionTimeDelta: secondPass.executionTime - firstPass.executionTime,
  })
}

// ---------------------------------------------------------------------------
// PassMemento
// ---------------------------------------------------------------------------

export interface PassMementoFields {
  passName: string
  state: Record<string, unknown>
  artifacts: Record<string, unknown>
  learnings: string[]
  insights: Record<string, unknown>
  qualityScore: number
  timestamp?: string
  metadata?: Record<string, unknown>
}

/**
 * Snapshot of a pass: its result content plus the context it ran with.
 * Copies are deep; mutating a copy never touches the original.
 */
export class PassMemento {
  readonly passName: string
  readonly state: Record<string, unknown>
  readonly artifacts: Record<string, unknown>
  readonly learnings: string[]
  readonly insights: Record<string, unknown>
  readonly qualityScore: number
  readonly timestamp: string
  readonly metadata: Record<string, unknown>

  constructor(fields: PassMementoFields) {
    this.passName = fields.passName
    this.state = fields.state
    this.artifacts = fields.artifacts
    this.learnings = fields.learnings
    this.insights = fields.insights
    this.qualityScore = fields.qualityScore
    this.timestamp = fields.timestamp ?? new Date().toISOString()
    this.metadata = fields.metadata ?? {}
  }

  createCopy(): PassMemento {
    return new PassMemento({
      passName: this.passName,
      state: deepClone(this.state),
      artifacts: deepClone(this.artifacts),
      learnings: [...this.learnings],
      insights: deepClone(this.insights),
      qualityScore: this.qualityScore,
      timestamp: this.timestamp,
      metadata: deepClone(this.metadata),
    })
  }

  /** Capture a result and the context it ran with (both deep-copied) */
  static fromPassResult(result: PassResult, state: PipelineContext): PassMemento {
    return new PassMemento({
      passName: result.passName,
      state: deepClone(state),
      artifacts: deepClone({ ...result.artifacts }),
      learnings: [...result.learnings],
      insights: deepClone({ ...result.insights }),
      qualityScore: result.qualityScore,
      metadata: { ...deepClone({ ...result.metadata }), sourceTimestamp: result.timestamp },
    })
  }

  toJSON(): Record<string, unknown> {
    return {
      passName: this.passName,
      qualityScore: this.qualityScore,
      learnings: this.learnings,
      artifactKeys: Object.keys(this.artifacts),
      timestamp: this.timestamp,
      metadata: this.metadata,
    }
  }
}
