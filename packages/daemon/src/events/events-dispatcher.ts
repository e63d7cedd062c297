import type { AdminEvent, AdminEventHandler } from '@devices-widget/shared'
import type { EventSource } from '../admin/admin.types'
import { isAdminError } from '../errors/admin.errors'
import { dispatcherLogger } from '../utils/logger'

/**
 * Handlers registered under this kind receive every event
 */
export const ANY_EVENT = '*'

/**
 * Options for listenForEvents
 */
export interface ListenOptions {
  /** Reopen the stream when it ends or its transport fails */
  reconnect?: boolean
  /** Delay before reopening */
  reconnectDelayMs?: number
  /** Stops listening once the current event has been handled */
  signal?: AbortSignal
}

/**
 * Events dispatcher
 *
 * Routes admin events to handlers registered by exact event kind. Events are
 * handled strictly in arrival order: every handler of an event completes
 * before the next event is read.
 */
export class EventsDispatcher {
  private handlers = new Map<string, AdminEventHandler[]>()

  addHandler(event: string, handler: AdminEventHandler): void {
    const handlers = this.handlers.get(event)
    if (handlers) {
      handlers.push(handler)
    } else {
      this.handlers.set(event, [handler])
    }
  }

  removeHandler(event: string, handler: AdminEventHandler): void {
    const handlers = this.handlers.get(event)
    if (!handlers) {
      return
    }
    const remaining = handlers.filter((registered) => registered !== handler)
    if (remaining.length === 0) {
      this.handlers.delete(event)
    } else {
      this.handlers.set(event, remaining)
    }
  }

  /**
   * Run every handler registered for an event, one after the other
   */
  async dispatch(event: AdminEvent): Promise<void> {
    const handlers = [...(this.handlers.get(event.event) ?? []), ...(this.handlers.get(ANY_EVENT) ?? [])]
    if (handlers.length === 0) {
      return
    }
    dispatcherLogger.trace({ event: event.event, subject: event.subject }, 'Dispatching event')
    for (const handler of handlers) {
      await handler(event)
    }
  }

  /**
   * Consume an event stream until it ends
   *
   * A transport failure ends the stream (and reconnects when asked to); a
   * handler failure rejects.
   */
  async listenForEvents(source: EventSource, options: ListenOptions = {}): Promise<void> {
    const { reconnect = false, reconnectDelayMs = 1000, signal } = options

    while (!signal?.aborted) {
      const iterator = source()[Symbol.asyncIterator]()
      dispatcherLogger.info('Listening for admin events')

      while (!signal?.aborted) {
        let result: IteratorResult<AdminEvent>
        try {
          result = await iterator.next()
        } catch (error) {
          if (!isAdminError(error)) throw error
          dispatcherLogger.warn({ error: error.message }, 'Admin event stream failed')
          break
        }
        if (result.done) {
          break
        }
        await this.dispatch(result.value)
      }

      await iterator.return?.()
      if (!reconnect || signal?.aborted) {
        return
      }
      dispatcherLogger.warn({ delayMs: reconnectDelayMs }, 'Admin event stream closed, reconnecting')
      await new Promise(resolve => setTimeout(resolve, reconnectDelayMs))
    }
  }
}
