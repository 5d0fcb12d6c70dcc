/**
 * Typed synchronous pub/sub over node:events, shared by the pipeline
 * observable and the state machine. Each module brings its own event map.
 */

import { EventEmitter } from 'node:events'

/** Map of event name to payload type */
export type EventMap = { [event: string]: unknown }

export type EventHandler<Payload> = (payload: Payload) => void

/** Removes the handler it was returned for */
export type Unsubscribe = () => void

export interface TypedEventBus<Events extends EventMap> {
  /** Handlers run before emit() returns */
  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void
  on<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): Unsubscribe
  /** Handler runs for the next emit only */
  once<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): Unsubscribe
  /** No-op for a handler that is not subscribed */
  off<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): void
  listenerCount<K extends keyof Events & string>(event: K): number
}

/** Observers attach one handler per event type */
const MAX_LISTENERS = 100

export class EmitterEventBus<Events extends EventMap> implements TypedEventBus<Events> {
  private readonly _emitter = new EventEmitter().setMaxListeners(MAX_LISTENERS)

  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): Unsubscribe {
    this._emitter.on(event, handler)
    return () => this.off(event, handler)
  }

  once<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): Unsubscribe {
    this._emitter.once(event, handler)
    return () => this.off(event, handler)
  }

  off<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): void {
    this._emitter.off(event, handler)
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this._emitter.listenerCount(event)
  }
}

export function createEventBus<Events extends EventMap>(): TypedEventBus<Events> {
  return new EmitterEventBus<Events>()
}
