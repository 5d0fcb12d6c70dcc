/**
 * Two-pass module: public API
 */

export { createPassResult, computePassDelta, PassMemento } from './models.js'
export type { PassResult, PassResultInput, PassDelta, PassMementoFields } from './models.js'

export { PassComparator } from './pass-comparator.js'
export type { PassComparatorOptions } from './pass-comparator.js'

export { RollbackManager } from './rollback-manager.js'
export type { RollbackRecord, RollbackManagerOptions } from './rollback-manager.js'

export { RetryStrategy } from './retry-strategy.js'
export type { RetryStrategyOptions } from './retry-strategy.js'

export { BasePassStrategy, elapsedSeconds } from './strategies/base-strategy.js'
export type { PassStrategy, PassChecks, PassRunOutput } from './strategies/base-strategy.js'
export { FirstPassStrategy, FIRST_PASS_NAME, firstPassQuality } from './strategies/first-pass-strategy.js'
export type { FirstPassRun } from './strategies/first-pass-strategy.js'
export {
  SecondPassStrategy,
  SECOND_PASS_NAME,
  classifyLearning,
  secondPassQuality,
} from './strategies/second-pass-strategy.js'
export type { SecondPassRun, Refinement, RefinementType } from './strategies/second-pass-strategy.js'

export { TimedPassStrategy } from './timed-pass-strategy.js'

export { TwoPassExecutor } from './two-pass-executor.js'
export type { TwoPassExecutorOptions, TwoPassOutcome, TwoPassExecutionRecord } from './two-pass-executor.js'

export { TwoPassGuidance, DEFAULT_GUIDANCE_CONFIG } from './ai-guidance.js'
export type {
  TwoPassGuidanceConfig,
  QualityAssessmentService,
  QualityAssessmentRequest,
  ServiceQualityAssessment,
  ComplexityClassification,
  QualityAssessment,
  PassStrategyPlan,
  GuidanceSource,
} from './ai-guidance.js'

export { TwoPassPipeline } from './two-pass-pipeline.js'
export type { TwoPassPipelineOptions, TwoPassPipelineOutcome, TwoPassConfigSection } from './two-pass-pipeline.js'
