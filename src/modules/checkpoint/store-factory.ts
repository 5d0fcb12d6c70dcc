/**
 * Build the configured CheckpointStore.
 *
 * SQLite storage registers a DatabaseService under `database` in the given
 * registry and initializes it; the caller owns `registry.shutdownAll()`.
 */

import { mkdir } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import type { ServiceRegistry } from '../../core/di.js'
import { createDatabaseService } from '../../persistence/database.js'
import type { CheckpointStore } from './checkpoint-store.js'
import { FileCheckpointStore } from './file-checkpoint-store.js'
import { SqliteCheckpointStore } from './sqlite-checkpoint-store.js'

export const DATABASE_SERVICE_NAME = 'database'

export interface CheckpointStoreSettings {
  storage: 'file' | 'sqlite'
  checkpointDir: string
  databasePath: string
}

export async function createCheckpointStore(
  settings: CheckpointStoreSettings,
  registry: ServiceRegistry
): Promise<CheckpointStore> {
  if (settings.storage === 'file') {
    return new FileCheckpointStore(resolve(settings.checkpointDir))
  }

  const databasePath = resolve(settings.databasePath)
  await mkdir(dirname(databasePath), { recursive: true })
  const database = createDatabaseService(databasePath)
  registry.register(DATABASE_SERVICE_NAME, database)
  await database.initialize()
  return new SqliteCheckpointStore(database.db)
}
