/**
 * CalDAV source: iCalendar expansion into raw occurrences, and calendar
 * selection against a stubbed tsdav connection.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { DAVCalendar, DAVCalendarObject } from 'tsdav'
import {
  CalDAVSource,
  CalendarNotFoundError,
  parseOccurrences,
  toRawDateTime,
  type CalDAVConnection,
  type ICalTime,
} from '../src/calendar/caldav-client.js'
import type { CalDAVSettings } from '../src/calendar/types.js'

const FROM = new Date('2026-10-19T00:00:00Z')
const TO = new Date('2026-10-22T00:00:00Z')

const STANDUP_ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//calnotify//tests//EN',
  'BEGIN:VEVENT',
  'UID:standup@example.com',
  'DTSTAMP:20261001T000000Z',
  'DTSTART;TZID=Europe/Berlin:20261019T090000',
  'DTEND;TZID=Europe/Berlin:20261019T091500',
  'RRULE:FREQ=DAILY;COUNT=5',
  'SUMMARY:Standup',
  'LOCATION:https://meet.example/standup',
  'ATTENDEE;PARTSTAT=ACCEPTED:mailto:lead@example.com',
  'ATTENDEE;PARTSTAT=DECLINED:mailto:me@example.com',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:standup@example.com',
  'DTSTAMP:20261001T000000Z',
  'RECURRENCE-ID;TZID=Europe/Berlin:20261020T090000',
  'DTSTART;TZID=Europe/Berlin:20261020T110000',
  'DTEND;TZID=Europe/Berlin:20261020T111500',
  'SUMMARY:Standup (moved)',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n')

const SINGLE_ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//calnotify//tests//EN',
  'BEGIN:VEVENT',
  'UID:lunch@example.com',
  'DTSTAMP:20261001T000000Z',
  'DTSTART:20261019T150000Z',
  'DTEND:20261019T160000Z',
  'SUMMARY:Lunch',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:holiday@example.com',
  'DTSTAMP:20261001T000000Z',
  'DTSTART;VALUE=DATE:20261020',
  'DTEND;VALUE=DATE:20261021',
  'SUMMARY:Holiday',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n')

describe('parseOccurrences', () => {
  it('expands a recurring series and marks its modified instance', () => {
    const occurrences = parseOccurrences(STANDUP_ICS, FROM, TO)

    expect(occurrences).toHaveLength(3)

    const moved = occurrences.find((o) => o.overrideId !== undefined)
    expect(moved).toMatchObject({
      uid: 'standup@example.com',
      overrideId: '2026-10-20T09:00:00',
      title: 'Standup (moved)',
      start: { value: '2026-10-20T11:00:00', tzid: 'Europe/Berlin' },
      end: { value: '2026-10-20T11:15:00', tzid: 'Europe/Berlin' },
    })

    const instances = occurrences.filter((o) => o.instanceId !== undefined)
    expect(instances.map((o) => o.instanceId)).toEqual(['2026-10-19T09:00:00', '2026-10-21T09:00:00'])
    expect(instances[0]).toMatchObject({
      title: 'Standup',
      location: 'https://meet.example/standup',
      start: { value: '2026-10-19T09:00:00', tzid: 'Europe/Berlin' },
      end: { value: '2026-10-19T09:15:00', tzid: 'Europe/Berlin' },
    })
    expect(instances[0].attendees).toEqual([
      { address: 'mailto:lead@example.com', partstat: 'ACCEPTED' },
      { address: 'mailto:me@example.com', partstat: 'DECLINED' },
    ])
  })

  it('reads single events in UTC and all-day events', () => {
    const occurrences = parseOccurrences(SINGLE_ICS, FROM, TO)

    expect(occurrences).toEqual([
      {
        uid: 'lunch@example.com',
        title: 'Lunch',
        start: { value: '2026-10-19T15:00:00', tzid: 'UTC' },
        end: { value: '2026-10-19T16:00:00', tzid: 'UTC' },
        location: undefined,
        description: undefined,
        attendees: [],
      },
      {
        uid: 'holiday@example.com',
        title: 'Holiday',
        start: { value: '2026-10-20' },
        end: { value: '2026-10-21' },
        location: undefined,
        description: undefined,
        attendees: [],
      },
    ])
  })

  it('yields nothing for malformed data', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    expect(parseOccurrences('this is not a calendar', FROM, TO)).toEqual([])
    expect(warn).toHaveBeenCalledTimes(1)
    warn.mockRestore()
  })
})

describe('toRawDateTime', () => {
  function fakeTime(fields: Partial<ICalTime> & { text: string; offset?: number }): ICalTime {
    return {
      isDate: fields.isDate ?? false,
      zone: fields.zone,
      timezone: fields.timezone,
      utcOffset: () => fields.offset ?? 0,
      toString: () => fields.text,
    }
  }

  it('keeps floating values without a zone', () => {
    expect(toRawDateTime(fakeTime({ text: '2026-10-19T09:00:00', zone: { tzid: 'floating' } }))).toEqual({
      value: '2026-10-19T09:00:00',
    })
  })

  it('uses the zone name when the zone was not resolved', () => {
    const time = fakeTime({ text: '2026-10-19T09:00:00', zone: { tzid: 'floating' }, timezone: 'Asia/Tokyo' })
    expect(toRawDateTime(time)).toEqual({ value: '2026-10-19T09:00:00', tzid: 'Asia/Tokyo' })
  })

  it('falls back to a fixed offset for custom zone names', () => {
    const time = fakeTime({
      text: '2026-10-19T09:00:00',
      zone: { tzid: 'India Standard Time' },
      offset: 19_800,
    })
    expect(toRawDateTime(time)).toEqual({ value: '2026-10-19T09:00:00', tzid: 'UTC+5:30' })

    const west = fakeTime({ text: '2026-10-19T09:00:00', zone: { tzid: 'Pacific Custom' }, offset: -25_200 })
    expect(toRawDateTime(west)).toEqual({ value: '2026-10-19T09:00:00', tzid: 'UTC-7' })
  })
})

describe('CalDAVSource', () => {
  const settings: CalDAVSettings = {
    url: 'https://dav.example.com',
    username: 'me@example.com',
    password: 'test-secret',
    calendarName: 'Work',
    accountEmail: 'me@example.com',
  }

  const calendars: DAVCalendar[] = [
    { url: 'https://dav.example.com/cal/personal/', displayName: 'Personal' },
    { url: 'https://dav.example.com/cal/work/', displayName: 'Work' },
  ]

  const objects: DAVCalendarObject[] = [
    { url: 'https://dav.example.com/cal/work/lunch.ics', data: SINGLE_ICS },
    { url: 'https://dav.example.com/cal/work/empty.ics' },
  ]

  function stubConnection() {
    return {
      fetchCalendars: vi.fn(async () => calendars),
      fetchCalendarObjects: vi.fn(async () => objects),
    }
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('fetches the configured calendar for the requested window', async () => {
    const connection = stubConnection()
    const connect = vi.fn(async () => connection)
    const source = new CalDAVSource(settings, connect)

    const occurrences = await source.fetchOccurrences(FROM, TO)

    expect(occurrences.map((o) => o.uid)).toEqual(['lunch@example.com', 'holiday@example.com'])
    expect(connection.fetchCalendarObjects).toHaveBeenCalledWith({
      calendar: calendars[1],
      timeRange: { start: '2026-10-19T00:00:00.000Z', end: '2026-10-22T00:00:00.000Z' },
    })

    await source.fetchOccurrences(FROM, TO)
    expect(connect).toHaveBeenCalledTimes(1)
    expect(connection.fetchCalendars).toHaveBeenCalledTimes(1)
  })

  it('uses the first calendar when no name is configured', async () => {
    const connection = stubConnection()
    const source = new CalDAVSource({ ...settings, calendarName: '' }, async () => connection)

    await source.fetchOccurrences(FROM, TO)

    expect(connection.fetchCalendarObjects).toHaveBeenCalledWith(
      expect.objectContaining({ calendar: calendars[0] }),
    )
  })

  it('rejects when the named calendar does not exist', async () => {
    const source = new CalDAVSource({ ...settings, calendarName: 'Team' }, async () => stubConnection())

    await expect(source.fetchOccurrences(FROM, TO)).rejects.toBeInstanceOf(CalendarNotFoundError)
    await expect(source.fetchOccurrences(FROM, TO)).rejects.toThrow("Calendar 'Team' not found")
  })

  it('reports health and reconnects after a failure', async () => {
    const connection: CalDAVConnection = stubConnection()
    const connect = vi
      .fn(async (_settings: CalDAVSettings) => connection)
      .mockRejectedValueOnce(new Error('401 Unauthorized'))
    const source = new CalDAVSource(settings, connect)

    const down = await source.checkHealth()
    expect(down.reachable).toBe(false)
    expect(down.error).toBe('401 Unauthorized')

    const up = await source.checkHealth()
    expect(up.reachable).toBe(true)
    expect(up.calendar).toBe('Work')
    expect(connect).toHaveBeenCalledTimes(2)
  })
})
