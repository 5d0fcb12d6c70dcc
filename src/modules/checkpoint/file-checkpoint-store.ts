/**
 * FileCheckpointStore: one `{cardId}.json` file per card under a directory.
 *
 * Writes go to a temp file that is renamed over the target, so a reader
 * never sees a half-written checkpoint.
 */

import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { parseCheckpoint } from './checkpoint-store.js'
import type { CheckpointStore } from './checkpoint-store.js'
import type { PipelineCheckpoint } from './models.js'

const logger = createLogger('checkpoint:file-store')

const SUFFIX = '.json'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class FileCheckpointStore implements CheckpointStore {
  readonly directory: string

  constructor(directory: string) {
    this.directory = directory
  }

  async save(checkpoint: PipelineCheckpoint): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const target = this._pathFor(checkpoint.cardId)
    const tmpPath = `${target}.tmp.${String(Date.now())}`
    try {
      await writeFile(tmpPath, JSON.stringify(checkpoint, null, 2), 'utf-8')
      await rename(tmpPath, target)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw err
    }
    logger.debug({ cardId: checkpoint.cardId, path: target }, 'Checkpoint written')
  }

  async load(cardId: CardId): Promise<PipelineCheckpoint | null> {
    const path = this._pathFor(cardId)
    let text: string
    try {
      text = await readFile(path, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      logger.warn({ cardId, path, err }, 'Checkpoint file is not valid JSON')
      return null
    }
    return parseCheckpoint(raw, cardId, path)
  }

  async exists(cardId: CardId): Promise<boolean> {
    try {
      await access(this._pathFor(cardId))
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  async delete(cardId: CardId): Promise<boolean> {
    const existed = await this.exists(cardId)
    if (existed) await rm(this._pathFor(cardId), { force: true })
    return existed
  }

  async listAll(): Promise<CardId[]> {
    let entries: string[]
    try {
      entries = await readdir(this.directory)
    } catch (err) {
      if (isNotFound(err)) return []
      throw err
    }
    return entries
      .filter((name) => name.endsWith(SUFFIX))
      .map((name) => name.slice(0, -SUFFIX.length))
      .sort()
  }

  private _pathFor(cardId: CardId): string {
    return join(this.directory, `${cardId}${SUFFIX}`)
  }
}
