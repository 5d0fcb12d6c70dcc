/**
 * Checkpoint database service.
 *
 * One better-sqlite3 connection per service. `initialize()` opens it with WAL
 * journaling and foreign keys and applies pending migrations; `shutdown()`
 * closes it. Both are idempotent.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { ArtemisError } from '../core/errors.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const DEFAULT_BUSY_TIMEOUT_MS = 5000

export interface DatabaseServiceOptions {
  /** How long a writer waits on a locked database (default 5000) */
  busyTimeoutMs?: number
  /** Apply pending migrations on initialize (default true) */
  migrate?: boolean
}

export interface DatabaseService extends BaseService {
  readonly path: string
  readonly isOpen: boolean
  /**
   * Raw connection for the query modules.
   * @throws {ArtemisError} DATABASE_CLOSED unless initialized
   */
  readonly db: BetterSqlite3Database
  /** Migrations applied by the last initialize() */
  readonly appliedMigrations: number
}

class SqliteDatabaseService implements DatabaseService {
  readonly path: string
  private readonly _busyTimeoutMs: number
  private readonly _migrate: boolean
  private _connection: BetterSqlite3Database | null = null
  private _applied = 0

  constructor(path: string, options: DatabaseServiceOptions) {
    this.path = path
    this._busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS
    this._migrate = options.migrate ?? true
  }

  get isOpen(): boolean {
    return this._connection !== null
  }

  get db(): BetterSqlite3Database {
    if (this._connection === null) {
      throw new ArtemisError('Checkpoint database is not open; call initialize() first', 'DATABASE_CLOSED', {
        path: this.path,
      })
    }
    return this._connection
  }

  get appliedMigrations(): number {
    return this._applied
  }

  async initialize(): Promise<void> {
    if (this._connection !== null) return

    const connection = new BetterSqlite3(this.path)
    // in-memory databases stay in "memory" mode
    const journalMode = connection.pragma('journal_mode = WAL', { simple: true })
    connection.pragma(`busy_timeout = ${String(this._busyTimeoutMs)}`)
    connection.pragma('synchronous = NORMAL')
    connection.pragma('foreign_keys = ON')
    this._connection = connection

    this._applied = this._migrate ? runMigrations(connection).length : 0
    logger.info({ path: this.path, journalMode, applied: this._applied }, 'Checkpoint database ready')
  }

  async shutdown(): Promise<void> {
    if (this._connection === null) return
    this._connection.close()
    this._connection = null
    logger.info({ path: this.path }, 'Checkpoint database closed')
  }
}

export function createDatabaseService(path: string, options: DatabaseServiceOptions = {}): DatabaseService {
  return new SqliteDatabaseService(path, options)
}
