/**
 * Calendar System
 *
 * Fetching, normalization and snapshot publishing for calendar events.
 */

// Types
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
} from './types.js'
export { PARTICIPATION_STATUSES } from './types.js'

// Implementation
export {
  combineInZone,
  parseRawDateTime,
  minutesBetween,
  TimeZoneResolutionError,
} from './datetime.js'
export type { CivilDate, TimeOfDay } from './datetime.js'
export { normalize, eventId } from './normalizer.js'
export { hasUrlLocation, getMeetingUrl } from './event-url.js'
export {
  CalDAVSource,
  CalendarNotFoundError,
  createCalDAVSource,
  parseOccurrences,
} from './caldav-client.js'
export type { CalDAVConnection, CalDAVConnector } from './caldav-client.js'
export { EventSnapshotStore } from './snapshot.js'
export type { PublishedSnapshot } from './snapshot.js'
export { CalendarSync } from './sync.js'
export type { CalendarSyncConfig, SyncResult, SyncStatus } from './sync.js'
