/**
 * Pino loggers for the pipeline engine: JSON by default, pino-pretty under
 * development and test, credential paths redacted.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets } from './redaction.js'
import type { LogLevel } from '../core/types.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** LOG_LEVEL, else by NODE_ENV */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use)
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of CLI and production use
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
}

/** Every logger handed out by createLogger, so a configured level can reach them all */
const createdLoggers = new Set<pino.Logger>()

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const instance = pino({
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    // pino-pretty is a devDependency; transport errors surface asynchronously
    ...(pretty ? { transport: PRETTY_TRANSPORT } : {}),
  })
  createdLoggers.add(instance)
  return instance
}

/** Apply a level to every logger created so far */
export function setLogLevel(level: LogLevel): void {
  for (const instance of createdLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('artemis')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}

// ---------------------------------------------------------------------------
// Log sink
// ---------------------------------------------------------------------------

/**
 * Human-readable progress sink handed to pipeline components.
 * Never used for control flow.
 */
export interface PipelineLogSink {
  log(message: string, level?: LogLevel): void
}

/**
 * Adapt a pino logger to the PipelineLogSink contract.
 * Messages are scrubbed of recognisable API keys before they are written.
 */
export function createPinoLogSink(target: pino.Logger): PipelineLogSink {
  return {
    log(message: string, level: LogLevel = 'info'): void {
      target[level](maskSecrets(message))
    },
  }
}
