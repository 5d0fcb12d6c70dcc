/**
 * Core types for the Artemis pipeline engine
 * Shared type definitions used across all modules
 */

/** Identifier of the task card a pipeline run works on */
export type CardId = string

/** Stage name, unique within one pipeline */
export type StageName = string

/**
 * Mutable key/value context handed to stages and passes.
 * Stages communicate only through this mapping and their returned results.
 */
export type PipelineContext = Record<string, unknown>

/** Severity level for log sink messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'
