/**
 * Notification Service
 *
 * Hands scheduler actions to the notifier and URL opener sinks.
 * Keeps a bounded history and emits events for the dashboard.
 */

import { EventEmitter } from 'node:events'
import { randomUUID } from 'node:crypto'
import type {
  Notifier,
  UrlOpener,
  SchedulerAction,
  NotificationRecord,
  NotificationEvent,
} from './types.js'

/**
 * Configuration for NotificationService
 */
export interface NotificationServiceConfig {
  notifier: Notifier
  urlOpener: UrlOpener
  /** Max records to keep in memory */
  maxHistory?: number
}

/**
 * NotificationService: delivers actions, one attempt each
 */
export class NotificationService extends EventEmitter {
  private notifier: Notifier
  private urlOpener: UrlOpener
  private history: NotificationRecord[] = []
  private maxHistory: number

  constructor(config: NotificationServiceConfig) {
    super()
    this.notifier = config.notifier
    this.urlOpener = config.urlOpener
    this.maxHistory = config.maxHistory ?? 200
  }

  /**
   * Deliver actions in order. A failing sink is logged and recorded;
   * it never stops the remaining actions.
   */
  async dispatch(actions: readonly SchedulerAction[]): Promise<NotificationRecord[]> {
    const records: NotificationRecord[] = []

    for (const action of actions) {
      const record: NotificationRecord = {
        id: randomUUID(),
        action,
        dispatchedAt: new Date(),
        delivered: false,
      }

      try {
        if (action.type === 'notify') {
          await this.notifier.notify(action)
        } else {
          console.log(`[Notifications] Opening URL for "${action.title}": ${action.url}`)
          await this.urlOpener.open(action.url)
        }
        record.delivered = true
      } catch (err) {
        record.error = err instanceof Error ? err.message : String(err)
        console.error(`[Notifications] Delivery failed for ${action.eventId}: ${record.error}`)
      }

      this.addRecord(record)
      this.emitEvent(record.delivered ? 'notification:delivered' : 'notification:failed', record)
      records.push(record)
    }

    return records
  }

  /**
   * Get history, newest first
   */
  getHistory(): NotificationRecord[] {
    return [...this.history]
  }

  /**
   * Clear history
   */
  clear(): void {
    this.history = []
  }

  private addRecord(record: NotificationRecord): void {
    this.history.unshift(record)
    if (this.history.length > this.maxHistory) {
      this.history.pop()
    }
  }

  /**
   * Emit typed notification event
   */
  private emitEvent(type: NotificationEvent['type'], record: NotificationRecord): void {
    const event: NotificationEvent = { type, record }
    this.emit(type, event)
    this.emit('notification', event) // Generic event for all notifications
  }
}
