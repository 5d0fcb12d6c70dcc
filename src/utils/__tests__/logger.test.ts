/**
 * Unit tests for src/utils/logger.ts: Pino configuration, redaction and the
 * pipeline log sink.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, deepMask, maskSecrets } from '../redaction.js'
import { createLogger, childLogger, createPinoLogSink, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create a synchronous in-memory pino logger that writes JSON to a buffer.
 * Uses pino.destination({ sync: true }) pattern via the stream overload.
 */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(logger).toBeDefined()
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.error).toBe('function')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'warn'
      const logger = createLogger('test-level', { pretty: false })
      expect(logger.level).toBe('warn')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })

  it('uses info level when NODE_ENV = production', () => {
    const originalEnv = process.env.NODE_ENV
    const originalLevel = process.env.LOG_LEVEL
    try {
      process.env.NODE_ENV = 'production'
      delete process.env.LOG_LEVEL
      const logger = createLogger('test-prod', { pretty: false })
      expect(logger.level).toBe('info')
    } finally {
      process.env.NODE_ENV = originalEnv
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = originalLevel
      }
    }
  })
})

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('debug')
  })

  it('applies the level to loggers created earlier', () => {
    const first = createLogger('level-a', { level: 'info', pretty: false })
    const second = createLogger('level-b', { level: 'trace', pretty: false })

    setLogLevel('error')

    expect(first.level).toBe('error')
    expect(second.level).toBe('error')
  })
})

describe('childLogger', () => {
  it('returns a child logger with card binding', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { cardId: 'card-1' })
    expect(typeof child.info).toBe('function')
    expect(child).not.toBe(parent)
  })
})

describe('Pino redaction - PINO_REDACT_PATHS', () => {
  it('covers the LLM credential fields', () => {
    expect(PINO_REDACT_PATHS).toContain('apiKey')
    expect(PINO_REDACT_PATHS).toContain('*.api_key')
    expect(PINO_REDACT_PATHS).toContain('*.apiKey')
    expect(PINO_REDACT_PATHS).toContain('env.ARTEMIS_LLM_API_KEY')
  })

  it('redacts apiKey field in log output', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ apiKey: 'test-secret' }, 'test redaction')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0] ?? '{}') as { apiKey?: string }
    expect(parsed.apiKey).toBe('[Redacted]')
  })

  it('redacts nested api_key fields', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ llm: { api_key: 'test-secret' } }, 'should be redacted')

    const parsed = JSON.parse(getLines()[0] ?? '{}') as { llm?: { api_key?: string } }
    expect(parsed.llm?.api_key).toBe('[Redacted]')
  })
})

describe('maskSecrets', () => {
  it('masks provider-style key patterns', () => {
    expect(maskSecrets('sk-test-placeholder-placeholder-00')).toBe('***')
  })

  it('returns input unchanged when no secrets present', () => {
    expect(maskSecrets('no secrets here')).toBe('no secrets here')
  })

  it('masks secrets within a longer string', () => {
    expect(maskSecrets('Error: invalid key sk-test-placeholder-placeholder-00 for client')).toBe(
      'Error: invalid key *** for client',
    )
  })
})

describe('deepMask', () => {
  it('replaces credential fields at any depth', () => {
    expect(deepMask({ llm: { api_key: 'test-secret', model: 'm' }, list: [{ token: 't' }] })).toEqual({
      llm: { api_key: '***', model: 'm' },
      list: [{ token: '***' }],
    })
  })

  it('scrubs secrets embedded in string values', () => {
    expect(deepMask({ note: 'use sk-test-placeholder-placeholder-00 here', retries: 3, on: null })).toEqual({
      note: 'use *** here',
      retries: 3,
      on: null,
    })
  })
})

describe('createPinoLogSink', () => {
  it('writes at the requested level with secrets scrubbed', () => {
    const { logger, getLines } = createCapturingLogger('sink-test')
    const sink = createPinoLogSink(logger)

    sink.log('retrying with sk-test-placeholder-placeholder-00', 'warn')
    sink.log('stage done')

    const lines = getLines().map((line) => JSON.parse(line) as { level: string; msg: string })
    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      ['warn', 'retrying with ***'],
      ['info', 'stage done'],
    ])
  })
})
