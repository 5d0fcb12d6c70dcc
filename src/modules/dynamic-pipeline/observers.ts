/**
 * Built-in pipeline observers.
 */

import type { LogLevel, StageName } from '../../core/types.js'
import type { PipelineLogSink } from '../../utils/logger.js'
import type { PipelineEvent, PipelineEventType, PipelineObserver } from './observable.js'

// ---------------------------------------------------------------------------
// LoggingObserver
// ---------------------------------------------------------------------------

const EVENT_LEVELS: Partial<Record<PipelineEventType, LogLevel>> = {
  'stage:retrying': 'warn',
  'stage:failed': 'error',
  'pipeline:failed': 'error',
  'pass:quality-degraded': 'warn',
  'pass:rolled-back': 'warn',
}

/**
 * Writes one human-readable line per event to a log sink.
 */
export class LoggingObserver implements PipelineObserver {
  private readonly _sink: PipelineLogSink

  constructor(sink: PipelineLogSink) {
    this._sink = sink
  }

  onEvent(event: PipelineEvent): void {
    this._sink.log(formatEvent(event), EVENT_LEVELS[event.eventType] ?? 'info')
  }
}

/**
 * Render an event as `[card] type stage key=value ... error=msg`.
 */
export function formatEvent(event: PipelineEvent): string {
  const parts = [`[${event.cardId}]`, event.eventType]
  if (event.stageName !== undefined) parts.push(event.stageName)
  for (const [key, value] of Object.entries(event.data)) {
    if (value instanceof Error) continue
    parts.push(`${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
  }
  if (event.error !== undefined) parts.push(`error=${event.error.message}`)
  return parts.join(' ')
}

// ---------------------------------------------------------------------------
// MetricsObserver
// ---------------------------------------------------------------------------

export interface PipelineMetricsSnapshot {
  eventCounts: Partial<Record<PipelineEventType, number>>
  /** Duration (seconds) of each completed stage, last run wins */
  stageDurations: Record<StageName, number>
  totalRetries: number
}

/**
 * Counts events per type and records stage durations.
 */
export class MetricsObserver implements PipelineObserver {
  private readonly _counts = new Map<PipelineEventType, number>()
  private readonly _durations = new Map<StageName, number>()
  private _retries = 0

  onEvent(event: PipelineEvent): void {
    this._counts.set(event.eventType, (this._counts.get(event.eventType) ?? 0) + 1)
    if (event.eventType === 'stage:retrying') this._retries += 1
    if (event.eventType === 'stage:completed' && event.stageName !== undefined) {
      const duration = event.data.duration
      if (typeof duration === 'number') this._durations.set(event.stageName, duration)
    }
  }

  count(eventType: PipelineEventType): number {
    return this._counts.get(eventType) ?? 0
  }

  getSnapshot(): PipelineMetricsSnapshot {
    return {
      eventCounts: Object.fromEntries(this._counts),
      stageDurations: Object.fromEntries(this._durations),
      totalRetries: this._retries,
    }
  }

  reset(): void {
    this._counts.clear()
    this._durations.clear()
    this._retries = 0
  }
}
