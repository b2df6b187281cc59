/**
 * Notification System
 */

export { NotificationService } from './service.js'
export type { NotificationServiceConfig } from './service.js'

export { DedupLedger, URL_OPENED } from './ledger.js'
export type { LedgerSlot } from './ledger.js'

export { tick, resolveEffectiveStart, findNextEvent } from './scheduler.js'
export type { EffectiveStart } from './scheduler.js'

export { NotificationLoop } from './loop.js'
export type { NotificationLoopConfig, NotificationLoopStatus } from './loop.js'

export { ConsoleNotifier, SystemUrlOpener, openCommand } from './sinks.js'
export type { OpenCommand } from './sinks.js'

export type {
  NotificationPolicy,
  NotificationRequest,
  UrlOpenRequest,
  SchedulerAction,
  Notifier,
  UrlOpener,
  NotificationRecord,
  NotificationEvent,
} from './types.js'
