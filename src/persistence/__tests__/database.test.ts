/**
 * Unit tests for the checkpoint DatabaseService
 */

import { describe, it, expect } from 'vitest'
import { ArtemisError } from '../../core/errors.js'
import { createDatabaseService } from '../database.js'

describe('DatabaseService', () => {
  it('opens, migrates and closes', async () => {
    const service = createDatabaseService(':memory:')
    expect(service.isOpen).toBe(false)

    await service.initialize()
    expect(service.isOpen).toBe(true)
    expect(service.appliedMigrations).toBe(1)
    const row = service.db.prepare('SELECT COUNT(*) AS n FROM pipeline_checkpoints').get() as { n: number }
    expect(row.n).toBe(0)
    expect(service.db.pragma('foreign_keys', { simple: true })).toBe(1)
    expect(service.db.pragma('busy_timeout', { simple: true })).toBe(5000)

    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })

  it('refuses access before initialize', () => {
    const service = createDatabaseService(':memory:')
    let caught: unknown
    try {
      service.db.exec('SELECT 1')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ArtemisError)
    expect(caught instanceof ArtemisError ? caught.code : undefined).toBe('DATABASE_CLOSED')
  })

  it('treats repeated initialize and shutdown as no-ops', async () => {
    const service = createDatabaseService(':memory:')
    await service.initialize()
    const first = service.db
    await service.initialize()
    expect(service.db).toBe(first)
    await service.shutdown()
    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })

  it('honours busy timeout and migrate options', async () => {
    const service = createDatabaseService(':memory:', { busyTimeoutMs: 250, migrate: false })
    await service.initialize()

    expect(service.appliedMigrations).toBe(0)
    expect(service.db.pragma('busy_timeout', { simple: true })).toBe(250)
    const tables = service.db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'").all()
    expect(tables).toEqual([])

    await service.shutdown()
  })
})
