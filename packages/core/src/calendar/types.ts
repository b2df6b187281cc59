/**
 * Calendar System Types
 *
 * Raw occurrences as delivered by a fetch source, and the normalized
 * events the notification scheduler works from.
 */

import type { DateTime } from 'luxon'

/**
 * A date-time value as it appeared in the source calendar.
 */
export interface RawDateTime {
  /** Wall-clock value: `yyyy-MM-ddTHH:mm:ss`, or `yyyy-MM-dd` for all-day values */
  value: string

  /** IANA zone, `UTC`, or a fixed offset such as `UTC+2`. Absent for floating times. */
  tzid?: string
}

/**
 * Attendee entry (iCal ATTENDEE with its PARTSTAT parameter)
 */
export interface RawAttendee {
  /** Calendar user address, usually `mailto:someone@example.com` */
  address: string
  partstat?: string
}

/**
 * One occurrence as fetched, before normalization.
 */
export interface RawOccurrence {
  /** UID of the VEVENT (shared by every instance of a recurring series) */
  uid: string

  /** RECURRENCE-ID of a single modified instance of a recurring series */
  overrideId?: string

  /** RECURRENCE-ID of an unmodified expanded instance */
  instanceId?: string

  title?: string
  start?: RawDateTime
  end?: RawDateTime
  location?: string
  description?: string
  attendees?: RawAttendee[]
}

export const PARTICIPATION_STATUSES = [
  'ACCEPTED',
  'DECLINED',
  'TENTATIVE',
  'NEEDS-ACTION',
  'DELEGATED',
] as const

export type ParticipationStatus = (typeof PARTICIPATION_STATUSES)[number]

/**
 * Calendar event after normalization.
 * Snapshots hand these out frozen; nothing downstream mutates them.
 */
export interface NormalizedEvent {
  /** Unique within one snapshot */
  id: string

  /** Source UID */
  uid: string

  title: string

  /** Start instant, carrying the event's own zone */
  start: DateTime

  end: DateTime

  allDay: boolean

  location?: string

  description?: string

  /** Overrides one instance of a recurring series; start/end are authoritative */
  isModifiedOccurrence: boolean

  /** PARTSTAT of the configured account, when it is an attendee */
  participationStatus?: ParticipationStatus

  isDeclined: boolean
}

/**
 * An immutable, atomically published set of events.
 */
export type EventSnapshot = readonly NormalizedEvent[]

/**
 * Warning raised for a record that was skipped during normalization.
 */
export interface NormalizeWarning {
  kind: 'missing-start'
  uid: string
  message: string
}

export interface NormalizeOptions {
  /** Address of the calendar account, used to find our own attendee entry */
  accountEmail?: string

  onWarning?: (warning: NormalizeWarning) => void
}

/**
 * Anything that can produce raw occurrences for a time window.
 * Allows swapping CalDAV for another backend without touching the scheduler.
 */
export interface FetchSource {
  /**
   * Fetch occurrences within a date range.
   * Recurring events are expanded into individual occurrences.
   */
  fetchOccurrences(from: Date, to: Date): Promise<RawOccurrence[]>
}

/**
 * CalDAV health status for monitoring.
 */
export interface CalDAVHealth {
  reachable: boolean
  latencyMs?: number
  calendar?: string
  error?: string
}

/**
 * Connection settings for the CalDAV server.
 */
export interface CalDAVSettings {
  url: string
  username: string
  password: string
  /** Display name of the calendar to follow; empty selects the first one */
  calendarName: string
  /** Our own attendee address, used for declined-status detection */
  accountEmail: string
}
