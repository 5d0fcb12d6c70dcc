/**
 * PipelineObservable: broadcasts lifecycle and stage events to observers.
 *
 * Two subscription styles:
 *  - attach(observer): observer.onEvent receives every event
 *  - on(type, handler): typed handler for one event type (TypedEventBus)
 *
 * Notification is synchronous and fire-and-forget. An observer that throws is
 * logged and skipped; the emitting executor never sees the exception.
 */

import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus, Unsubscribe } from '../../core/event-bus.js'
import type { CardId, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'

const logger = createLogger('pipeline:observable')

// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

export const PIPELINE_EVENT_TYPES = [
  'pipeline:started',
  'pipeline:completed',
  'pipeline:failed',
  'pipeline:paused',
  'pipeline:resumed',
  'stage:started',
  'stage:completed',
  'stage:skipped',
  'stage:retrying',
  'stage:failed',
  'stage:added',
  'stage:removed',
  'pass:first-started',
  'pass:first-completed',
  'pass:second-started',
  'pass:second-completed',
  'pass:memento-created',
  'pass:memento-applied',
  'pass:quality-improved',
  'pass:quality-degraded',
  'pass:rolled-back',
] as const

export type PipelineEventType = (typeof PIPELINE_EVENT_TYPES)[number]

export interface PipelineEvent {
  readonly eventType: PipelineEventType
  readonly cardId: CardId
  readonly stageName?: StageName
  readonly data: Readonly<Record<string, unknown>>
  readonly error?: Error
  /** ISO-8601 emission time */
  readonly timestamp: string
}

/** Typed event map: every event type carries a PipelineEvent */
export type PipelineEvents = { [K in PipelineEventType]: PipelineEvent }

export interface PipelineObserver {
  onEvent(event: PipelineEvent): void
}

/**
 * Build a PipelineEvent stamped with the current time.
 */
export function createPipelineEvent(
  eventType: PipelineEventType,
  cardId: CardId,
  fields: { stageName?: StageName; data?: Record<string, unknown>; error?: unknown } = {}
): PipelineEvent {
  return Object.freeze({
    eventType,
    cardId,
    ...(fields.stageName !== undefined ? { stageName: fields.stageName } : {}),
    data: fields.data ?? {},
    ...(fields.error !== undefined ? { error: toError(fields.error) } : {}),
    timestamp: new Date().toISOString(),
  })
}

// ---------------------------------------------------------------------------
// PipelineObservable
// ---------------------------------------------------------------------------

type EventHandler = (event: PipelineEvent) => void

export class PipelineObservable {
  private readonly _observers: PipelineObserver[] = []
  private readonly _bus: TypedEventBus<PipelineEvents>
  /** Unsubscribe functions by event type, then by caller's handler */
  private readonly _subscriptions = new Map<PipelineEventType, Map<EventHandler, Unsubscribe>>()

  constructor(bus: TypedEventBus<PipelineEvents> = createEventBus<PipelineEvents>()) {
    this._bus = bus
  }

  /** Register an observer for every event. Attaching twice is a no-op. */
  attach(observer: PipelineObserver): void {
    if (this._observers.includes(observer)) return
    this._observers.push(observer)
  }

  detach(observer: PipelineObserver): void {
    const index = this._observers.indexOf(observer)
    if (index !== -1) this._observers.splice(index, 1)
  }

  /** Subscribe to a single event type. Subscribing a handler twice to one type is a no-op. */
  on(eventType: PipelineEventType, handler: EventHandler): void {
    let byHandler = this._subscriptions.get(eventType)
    if (byHandler === undefined) {
      byHandler = new Map()
      this._subscriptions.set(eventType, byHandler)
    }
    if (byHandler.has(handler)) return
    byHandler.set(
      handler,
      this._bus.on(eventType, (event) => {
        this._deliver(eventType, event, handler)
      })
    )
  }

  off(eventType: PipelineEventType, handler: EventHandler): void {
    const byHandler = this._subscriptions.get(eventType)
    const unsubscribe = byHandler?.get(handler)
    if (byHandler === undefined || unsubscribe === undefined) return
    unsubscribe()
    byHandler.delete(handler)
  }

  get observerCount(): number {
    return this._observers.length
  }

  /** Deliver an event to every observer and typed handler */
  notify(event: PipelineEvent): void {
    for (const observer of [...this._observers]) {
      this._deliver(event.eventType, event, (e) => observer.onEvent(e))
    }
    this._bus.emit(event.eventType, event)
  }

  /** Convenience: build and deliver an event */
  emit(
    eventType: PipelineEventType,
    cardId: CardId,
    fields: { stageName?: StageName; data?: Record<string, unknown>; error?: unknown } = {}
  ): void {
    this.notify(createPipelineEvent(eventType, cardId, fields))
  }

  private _deliver(eventType: PipelineEventType, event: PipelineEvent, handler: EventHandler): void {
    try {
      handler(event)
    } catch (err) {
      logger.warn({ eventType, err: toError(err) }, 'Pipeline observer threw; continuing')
    }
  }
}
