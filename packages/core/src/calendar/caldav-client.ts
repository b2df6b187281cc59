/**
 * CalDAV Fetch Source
 *
 * Implements FetchSource using tsdav for CalDAV operations
 * and ical-expander for recurring event expansion.
 */

import { createDAVClient, type DAVCalendar, type DAVCalendarObject } from 'tsdav'
import IcalExpander from 'ical-expander'
import { IANAZone } from 'luxon'
import type {
  CalDAVHealth,
  CalDAVSettings,
  FetchSource,
  RawAttendee,
  RawDateTime,
  RawOccurrence,
} from './types.js'

// Shapes read from ical-expander results (the library types them loosely)
export interface ICalTime {
  isDate: boolean
  zone?: { tzid: string }
  /** TZID name, kept even when the zone was not registered */
  timezone?: string
  /** Seconds east of UTC */
  utcOffset(): number
  toString(): string
}

interface ICalProperty {
  getFirstValue(): unknown
  getParameter(name: string): unknown
}

interface ICalExpanderEvent {
  uid: string
  summary: string | null
  description: string | null
  location: string | null
  startDate: ICalTime
  endDate: ICalTime
  attendees: ICalProperty[]
  recurrenceId: ICalTime | null
  isRecurrenceException(): boolean
}

interface ICalExpanderOccurrence {
  recurrenceId: ICalTime
  item: ICalExpanderEvent
  startDate: ICalTime
  endDate: ICalTime
}

interface ICalExpanderResult {
  events: ICalExpanderEvent[]
  occurrences: ICalExpanderOccurrence[]
}

/**
 * The subset of the tsdav client this source talks to
 */
export interface CalDAVConnection {
  fetchCalendars(): Promise<DAVCalendar[]>
  fetchCalendarObjects(params: {
    calendar: DAVCalendar
    timeRange?: { start: string; end: string }
  }): Promise<DAVCalendarObject[]>
}

export type CalDAVConnector = (settings: CalDAVSettings) => Promise<CalDAVConnection>

export class CalendarNotFoundError extends Error {
  constructor(readonly calendarName: string) {
    super(calendarName ? `Calendar '${calendarName}' not found` : 'No calendars found')
    this.name = 'CalendarNotFoundError'
  }
}

/** Limit recurring event expansion */
const MAX_ITERATIONS = 1000

const connectWithTsdav: CalDAVConnector = (settings) =>
  createDAVClient({
    serverUrl: settings.url,
    credentials: {
      username: settings.username,
      password: settings.password,
    },
    authMethod: 'Basic',
    defaultAccountType: 'caldav',
  })

/**
 * CalDAV-based implementation of FetchSource
 */
export class CalDAVSource implements FetchSource {
  private client: CalDAVConnection | null = null
  private calendar: DAVCalendar | null = null

  constructor(
    private settings: CalDAVSettings,
    private connect: CalDAVConnector = connectWithTsdav,
  ) {}

  /**
   * Get or create the DAV client connection
   */
  private async getClient(): Promise<CalDAVConnection> {
    if (!this.client) {
      console.log(`[CalDAV] Connecting to ${this.settings.url}`)
      this.client = await this.connect(this.settings)
    }
    return this.client
  }

  /**
   * Find the configured calendar, or the first one when no name is set
   */
  private async getCalendar(): Promise<DAVCalendar> {
    if (this.calendar) {
      return this.calendar
    }

    const client = await this.getClient()
    const calendars = await client.fetchCalendars()
    const wanted = this.settings.calendarName

    const calendar = wanted
      ? calendars.find((cal) => displayNameOf(cal) === wanted)
      : calendars[0]

    if (!calendar) {
      throw new CalendarNotFoundError(wanted)
    }

    if (!wanted) {
      console.log(`[CalDAV] Using calendar: ${displayNameOf(calendar) ?? calendar.url}`)
    }

    this.calendar = calendar
    return calendar
  }

  async fetchOccurrences(from: Date, to: Date): Promise<RawOccurrence[]> {
    const client = await this.getClient()
    const calendar = await this.getCalendar()

    console.log(`[CalDAV] Fetching events from ${from.toISOString()} to ${to.toISOString()}`)

    const objects = await client.fetchCalendarObjects({
      calendar,
      timeRange: { start: from.toISOString(), end: to.toISOString() },
    })

    const occurrences: RawOccurrence[] = []
    for (const obj of objects) {
      if (typeof obj.data === 'string' && obj.data) {
        occurrences.push(...parseOccurrences(obj.data, from, to))
      }
    }

    console.log(`[CalDAV] Found ${occurrences.length} occurrences in the date range`)
    return occurrences
  }

  /**
   * Check if the server is reachable and the calendar exists
   */
  async checkHealth(): Promise<CalDAVHealth> {
    const start = Date.now()
    try {
      const calendar = await this.getCalendar()
      return {
        reachable: true,
        latencyMs: Date.now() - start,
        calendar: displayNameOf(calendar) ?? calendar.url,
      }
    } catch (err) {
      this.invalidateCache()
      return {
        reachable: false,
        latencyMs: Date.now() - start,
        error: err instanceof Error ? err.message : String(err),
      }
    }
  }

  /**
   * Drop the connection and the selected calendar; the next call reconnects
   */
  invalidateCache(): void {
    this.client = null
    this.calendar = null
  }
}

/**
 * Parse iCalendar data into raw occurrences within [from, to].
 * A malformed object yields no occurrences rather than an error.
 */
export function parseOccurrences(ics: string, from: Date, to: Date): RawOccurrence[] {
  const occurrences: RawOccurrence[] = []

  try {
    const expander = new IcalExpander({ ics, maxIterations: MAX_ITERATIONS })
    const expanded = expander.between(from, to) as ICalExpanderResult

    // Single events, and modified instances standing in for their occurrence
    for (const event of expanded.events) {
      const raw = toRawOccurrence(event, event.startDate, event.endDate)
      if (event.isRecurrenceException() && event.recurrenceId) {
        raw.overrideId = event.recurrenceId.toString().replace(/Z$/, '')
      }
      occurrences.push(raw)
    }

    // Unmodified occurrences of recurring events
    for (const occurrence of expanded.occurrences) {
      const raw = toRawOccurrence(occurrence.item, occurrence.startDate, occurrence.endDate)
      raw.instanceId = occurrence.recurrenceId.toString().replace(/Z$/, '')
      occurrences.push(raw)
    }
  } catch (err) {
    console.warn(`[CalDAV] Error parsing iCal data: ${err instanceof Error ? err.message : String(err)}`)
  }

  return occurrences
}

function toRawOccurrence(event: ICalExpanderEvent, start: ICalTime, end: ICalTime): RawOccurrence {
  return {
    uid: event.uid,
    title: event.summary ?? undefined,
    start: toRawDateTime(start),
    end: toRawDateTime(end),
    location: event.location ?? undefined,
    description: event.description ?? undefined,
    attendees: event.attendees.map(toRawAttendee),
  }
}

/**
 * Keep the wall-clock value and its zone. Zones that are not IANA names
 * (custom VTIMEZONE ids) fall back to their fixed UTC offset.
 */
export function toRawDateTime(time: ICalTime): RawDateTime {
  const value = time.toString().replace(/Z$/, '')
  if (time.isDate) {
    return { value }
  }

  // An unregistered TZID leaves the zone floating but keeps its name
  const zoneId = time.zone?.tzid
  const tzid = zoneId && zoneId !== 'floating' ? zoneId : time.timezone
  if (!tzid || tzid === 'floating') {
    return { value }
  }
  if (tzid === 'UTC' || tzid === 'Z') {
    return { value, tzid: 'UTC' }
  }
  if (IANAZone.isValidZone(tzid)) {
    return { value, tzid }
  }
  return { value, tzid: fixedOffsetZone(time.utcOffset()) }
}

function fixedOffsetZone(offsetSeconds: number): string {
  const totalMinutes = Math.round(offsetSeconds / 60)
  if (totalMinutes === 0) return 'UTC'

  const sign = totalMinutes < 0 ? '-' : '+'
  const hours = Math.floor(Math.abs(totalMinutes) / 60)
  const minutes = Math.abs(totalMinutes) % 60
  return minutes ? `UTC${sign}${hours}:${String(minutes).padStart(2, '0')}` : `UTC${sign}${hours}`
}

function toRawAttendee(property: ICalProperty): RawAttendee {
  const address = property.getFirstValue()
  const partstat = property.getParameter('partstat')
  return {
    address: typeof address === 'string' ? address : '',
    partstat: typeof partstat === 'string' ? partstat : undefined,
  }
}

function displayNameOf(calendar: DAVCalendar): string | undefined {
  return typeof calendar.displayName === 'string' ? calendar.displayName : undefined
}

/**
 * Create a CalDAVSource instance
 */
export function createCalDAVSource(settings: CalDAVSettings): CalDAVSource {
  return new CalDAVSource(settings)
}
