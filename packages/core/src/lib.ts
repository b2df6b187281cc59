// Public API for consumption by other packages (dashboard)

export {
  loadConfig,
  findConfigDir,
  normalizeIntervals,
  isCalDAVConfigured,
  DEFAULT_INTERVALS,
} from './config.js'
export type { AppConfig, SyncConfig } from './config.js'

// Utilities
export { computeBackoff, DEFAULT_BACKOFF } from './utils/backoff.js'
export type { RetryPolicy } from './utils/backoff.js'

// Calendar system
export {
  PARTICIPATION_STATUSES,
  combineInZone,
  parseRawDateTime,
  minutesBetween,
  TimeZoneResolutionError,
  normalize,
  eventId,
  hasUrlLocation,
  getMeetingUrl,
  CalDAVSource,
  CalendarNotFoundError,
  createCalDAVSource,
  parseOccurrences,
  EventSnapshotStore,
  CalendarSync,
} from './calendar/index.js'
export type {
  RawDateTime,
  RawAttendee,
  RawOccurrence,
  ParticipationStatus,
  NormalizedEvent,
  EventSnapshot,
  NormalizeWarning,
  NormalizeOptions,
  FetchSource,
  CalDAVHealth,
  CalDAVSettings,
  CivilDate,
  TimeOfDay,
  CalDAVConnection,
  CalDAVConnector,
  PublishedSnapshot,
  CalendarSyncConfig,
  SyncResult,
  SyncStatus,
} from './calendar/index.js'

// Notifications
export {
  NotificationService,
  DedupLedger,
  URL_OPENED,
  tick,
  resolveEffectiveStart,
  findNextEvent,
  NotificationLoop,
  ConsoleNotifier,
  SystemUrlOpener,
  openCommand,
} from './notifications/index.js'
export type {
  NotificationServiceConfig,
  LedgerSlot,
  EffectiveStart,
  NotificationLoopConfig,
  NotificationLoopStatus,
  NotificationPolicy,
  NotificationRequest,
  UrlOpenRequest,
  SchedulerAction,
  Notifier,
  UrlOpener,
  NotificationRecord,
  NotificationEvent,
} from './notifications/index.js'
