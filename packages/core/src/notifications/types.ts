/**
 * Notification System Types
 *
 * Policy, scheduler output and the sinks that deliver it.
 */

/**
 * Notification policy. Read-only for the duration of a tick.
 */
export interface NotificationPolicy {
  /** Lead times in minutes before start: distinct positive integers, ascending */
  intervals: readonly number[]

  soundEnabled: boolean

  /** Open meeting links shortly before the event starts */
  autoOpenUrls: boolean

  /** Stay silent for events the account has declined */
  skipDeclined: boolean
}

/**
 * A lead-time notification for one event
 */
export interface NotificationRequest {
  type: 'notify'
  eventId: string
  title: string
  body: string
  leadMinutes: number
  minutesUntilStart: number
  playSound: boolean
}

/**
 * Request to open an event's meeting link
 */
export interface UrlOpenRequest {
  type: 'open-url'
  eventId: string
  title: string
  url: string
  minutesUntilStart: number
}

export type SchedulerAction = NotificationRequest | UrlOpenRequest

/**
 * Displays a notification. Failures are reported but never retried.
 */
export interface Notifier {
  notify(request: NotificationRequest): Promise<void> | void
}

export interface UrlOpener {
  open(url: string): Promise<void> | void
}

/**
 * One dispatched action, as kept in the history
 */
export interface NotificationRecord {
  id: string
  action: SchedulerAction
  dispatchedAt: Date
  delivered: boolean
  error?: string
}

/**
 * Event emitted after an action was handed to its sink
 */
export interface NotificationEvent {
  type: 'notification:delivered' | 'notification:failed'
  record: NotificationRecord
}
