import { DateTime } from 'luxon'
import type { NormalizedEvent } from '../src/calendar/types.js'
import type { NotificationPolicy } from '../src/notifications/types.js'

/**
 * Build a snapshot event starting at an ISO wall time in the given zone
 */
export function makeEvent(
  overrides: Partial<NormalizedEvent> & { startISO?: string; zone?: string } = {},
): NormalizedEvent {
  const { startISO = '2026-10-19T12:00:00', zone = 'UTC', ...fields } = overrides
  const start = fields.start ?? DateTime.fromISO(startISO, { zone })
  return {
    id: 'evt-1',
    uid: 'evt-1',
    title: 'Standup',
    start,
    end: fields.end ?? start.plus({ minutes: 30 }),
    allDay: false,
    isModifiedOccurrence: false,
    isDeclined: false,
    ...fields,
  }
}

export function makePolicy(overrides: Partial<NotificationPolicy> = {}): NotificationPolicy {
  return {
    intervals: [1, 5, 10],
    soundEnabled: true,
    autoOpenUrls: true,
    skipDeclined: true,
    ...overrides,
  }
}

export function utc(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: 'UTC' })
}
