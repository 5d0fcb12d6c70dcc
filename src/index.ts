/**
 * Artemis - Main module exports
 * Public API surface for the pipeline engine
 */

// Core types
export * from './core/types.js'

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger, createPinoLogSink, setLogLevel } from './utils/logger.js'
export type { LoggerOptions, PipelineLogSink } from './utils/logger.js'
export { maskSecrets, deepMask } from './utils/redaction.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus, EventMap, EventHandler, Unsubscribe } from './core/event-bus.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Persistence
export { createDatabaseService } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'

// Modules
export * from './modules/stage-dag/index.js'
export * from './modules/dynamic-pipeline/index.js'
export * from './modules/two-pass/index.js'
export * from './modules/state-machine/index.js'
export * from './modules/checkpoint/index.js'
export * from './modules/config/index.js'
