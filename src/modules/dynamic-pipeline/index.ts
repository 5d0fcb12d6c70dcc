/**
 * Dynamic pipeline module: public API
 */

export type { PipelineState, StageResult, PipelineStage } from './types.js'
export {
  stageSucceeded,
  stageFailed,
  stageSkipped,
  withExecutionStats,
  isStageSuccessful,
} from './types.js'

export { BasePipelineStage, createStage } from './stage.js'
export type { StageDefinition } from './stage.js'

export { RetryPolicy } from './retry-policy.js'
export type { RetryPolicyOptions, RetryConfigSection, RetryableErrorClass } from './retry-policy.js'

export { PipelineObservable, PIPELINE_EVENT_TYPES, createPipelineEvent } from './observable.js'
export type { PipelineEvent, PipelineEventType, PipelineEvents, PipelineObserver } from './observable.js'

export { LoggingObserver, MetricsObserver, formatEvent } from './observers.js'
export type { PipelineMetricsSnapshot } from './observers.js'

export { StageExecutor } from './stage-executor.js'
export type { StageExecutorOptions } from './stage-executor.js'

export { ParallelStageExecutor, buildStageGraph, computeExecutionLevels } from './parallel-stage-executor.js'
export type { ParallelStageExecutorOptions } from './parallel-stage-executor.js'

export { LifecycleManager } from './lifecycle-manager.js'
export type { LifecycleTransition, LifecycleManagerOptions } from './lifecycle-manager.js'

export {
  ComplexityBasedSelector,
  ResourceBasedSelector,
  ManualSelector,
  DependencyOrderSelector,
  determineResourceProfile,
  isProjectComplexity,
} from './selection-strategies.js'
export type {
  StageSelectionStrategy,
  ProjectComplexity,
  ResourceProfile,
  AvailableResources,
} from './selection-strategies.js'

export { PipelineOptimizer, readRouterHints } from './pipeline-optimizer.js'
export type {
  StageComplexityClassifier,
  RouterHints,
  OptimizationSource,
  StageExecutionPlan,
  ParallelizationAssessment,
} from './pipeline-optimizer.js'

export { DynamicPipelineBuilder, DEFAULT_PIPELINE_NAME } from './pipeline-builder.js'
export type { PipelineConfigSections } from './pipeline-builder.js'

export { DynamicPipeline } from './dynamic-pipeline.js'
export type { DynamicPipelineOptions } from './dynamic-pipeline.js'
