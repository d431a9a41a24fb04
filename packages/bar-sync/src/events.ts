/**
 * Typed event bus for synchronizer events.
 *
 * Listeners run synchronously in subscription order. A listener that throws
 * is logged and does not stop the remaining listeners.
 */

import type { Bar, SeriesId } from '@crosslag/contracts'
import { createSilentLogger, type Logger } from '@crosslag/logger'

/**
 * Emitted when a completed bar lands in a series buffer.
 */
export interface BarEvent {
  series: SeriesId

  /** The bar as stored (minute-aligned) */
  bar: Bar

  /**
   * How the bar arrived:
   * - 'stream': a completed bar from a source
   * - 'aggregated': built from partial samples
   */
  origin: 'stream' | 'aggregated'
}

/**
 * Emitted when a bar is rejected by a buffer.
 */
export interface DroppedBarEvent {
  series: SeriesId
  bar: Bar
}

/**
 * Events published by the synchronizer.
 */
export interface SyncEventMap {
  bar: BarEvent
  dropped: DroppedBarEvent
}

export type EventListener<T> = (event: T) => void

type ListenerTable<E> = { [K in keyof E]?: Array<EventListener<E[K]>> }

/**
 * Publish/subscribe bus keyed by an event map.
 *
 * Example:
 * ```typescript
 * const bus = new EventBus<SyncEventMap>(logger)
 *
 * const unsubscribe = bus.on('bar', ({ series, bar }) => {
 *   logger.debug('bar landed', { series, timestamp: bar.timestamp })
 * })
 *
 * unsubscribe()
 * ```
 */
export class EventBus<E> {
  private listeners: ListenerTable<E> = {}
  private readonly logger: Logger

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * Subscribe to an event type.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof E>(eventType: K, listener: EventListener<E[K]>): () => void {
    const eventListeners = this.listeners[eventType] ?? []
    eventListeners.push(listener)
    this.listeners[eventType] = eventListeners

    return () => {
      this.off(eventType, listener)
    }
  }

  off<K extends keyof E>(eventType: K, listener: EventListener<E[K]>): void {
    const eventListeners = this.listeners[eventType]
    if (!eventListeners) {
      return
    }

    const index = eventListeners.indexOf(listener)
    if (index !== -1) {
      eventListeners.splice(index, 1)
    }

    if (eventListeners.length === 0) {
      delete this.listeners[eventType]
    }
  }

  /**
   * Invoke every listener of `eventType` with `event`.
   */
  emit<K extends keyof E>(eventType: K, event: E[K]): void {
    // Copy so listeners may unsubscribe while being invoked
    const eventListeners = [...(this.listeners[eventType] ?? [])]

    for (const listener of eventListeners) {
      try {
        listener(event)
      } catch (error) {
        this.logger.error('Event listener failed', {
          event: String(eventType),
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
  }

  listenerCount<K extends keyof E>(eventType: K): number {
    return this.listeners[eventType]?.length ?? 0
  }

  removeAllListeners(): void {
    this.listeners = {}
  }
}
