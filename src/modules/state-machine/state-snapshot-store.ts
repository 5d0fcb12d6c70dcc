/**
 * StateSnapshotStore: latest PipelineSnapshot per card as
 * `{cardId}_state.json` under the state directory.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import type { CardId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { ARTEMIS_STATES, ISSUE_TYPES, STAGE_STATES } from './types.js'
import type { PipelineSnapshot } from './types.js'

const logger = createLogger('state-machine:snapshots')

const StageStateInfoSchema = z.object({
  stageName: z.string(),
  state: z.enum(STAGE_STATES),
  startTime: z.string().nullable(),
  endTime: z.string().nullable(),
  durationSeconds: z.number().nullable(),
  metadata: z.record(z.string(), z.unknown()),
})

export const PipelineSnapshotSchema = z.object({
  cardId: z.string().min(1),
  state: z.enum(ARTEMIS_STATES),
  timestamp: z.string(),
  stages: z.record(z.string(), StageStateInfoSchema),
  activeStage: z.string().nullable(),
  healthStatus: z.enum(['healthy', 'degraded', 'critical']),
  circuitBreakersOpen: z.array(z.string()),
  activeIssues: z.array(z.enum(ISSUE_TYPES)),
})

export class StateSnapshotStore {
  readonly directory: string

  constructor(directory: string) {
    this.directory = directory
  }

  pathFor(cardId: CardId): string {
    return join(this.directory, `${cardId}_state.json`)
  }

  async save(snapshot: PipelineSnapshot): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const target = this.pathFor(snapshot.cardId)
    const tmpPath = `${target}.tmp.${String(Date.now())}`
    try {
      await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8')
      await rename(tmpPath, target)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw err
    }
  }

  /** null when missing or unreadable */
  async load(cardId: CardId): Promise<PipelineSnapshot | null> {
    let text: string
    try {
      text = await readFile(this.pathFor(cardId), 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
      throw err
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      logger.warn({ cardId, err }, 'State snapshot is not valid JSON')
      return null
    }
    const parsed = PipelineSnapshotSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn({ cardId, issues: parsed.error.issues.length }, 'State snapshot ignored')
      return null
    }
    return parsed.data
  }
}
