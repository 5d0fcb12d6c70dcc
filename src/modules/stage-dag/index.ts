/**
 * Stage DAG module: public API
 */

export { StageDAG, createStageDAG, DEFAULT_STAGE_DURATION } from './stage-dag.js'
export type { DependencyGraph, DurationTable, CriticalPathResult } from './stage-dag.js'
