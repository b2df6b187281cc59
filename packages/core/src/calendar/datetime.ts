/**
 * Timezone-safe date helpers shared by the normalizer and the scheduler.
 *
 * Values stay in the zone they were written in. Recurrence recovery needs the
 * event's own civil time, not the local system zone.
 */

import { DateTime, type Zone } from 'luxon'
import type { RawDateTime } from './types.js'

export const MINUTE_MS = 60_000
export const HOUR_MS = 60 * MINUTE_MS
export const DAY_MS = 24 * HOUR_MS

export interface CivilDate {
  year: number
  month: number
  day: number
}

export interface TimeOfDay {
  hour: number
  minute: number
  second: number
  millisecond: number
}

export class TimeZoneResolutionError extends Error {
  constructor(
    message: string,
    readonly zone?: string,
  ) {
    super(message)
    this.name = 'TimeZoneResolutionError'
  }
}

/**
 * Parse a raw calendar value. Floating values are taken as UTC; zoned values
 * keep their zone identity.
 *
 * @returns null when the value does not parse or its zone is unknown
 */
export function parseRawDateTime(raw: RawDateTime): DateTime | null {
  const dateOnly = DATE_ONLY.exec(raw.value)
  if (dateOnly) {
    // All-day values start at midnight UTC
    const date = { year: Number(dateOnly[1]), month: Number(dateOnly[2]), day: Number(dateOnly[3]) }
    try {
      return combineInZone(date, MIDNIGHT, 'UTC')
    } catch {
      return null
    }
  }

  const zone = raw.tzid?.trim() || 'UTC'
  const parsed = DateTime.fromISO(raw.value, { zone })
  return parsed.isValid ? parsed : null
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0, second: 0, millisecond: 0 }

/**
 * Whether a raw value names a date without a time (VALUE=DATE)
 */
export function isDateOnly(raw: RawDateTime): boolean {
  return DATE_ONLY.test(raw.value)
}

/**
 * Build the instant for a civil date and time of day in the given zone.
 *
 * Wall times skipped by a DST gap are shifted forward by luxon.
 *
 * @throws TimeZoneResolutionError when the zone is unknown or the parts are out of range
 */
export function combineInZone(date: CivilDate, time: TimeOfDay, zone: Zone | string): DateTime {
  const combined = DateTime.fromObject({ ...date, ...time }, { zone })
  if (!combined.isValid) {
    const zoneName = typeof zone === 'string' ? zone : zone.name
    throw new TimeZoneResolutionError(
      `Cannot place ${formatCivil(date, time)} in zone ${zoneName}: ${combined.invalidReason ?? 'invalid'}`,
      zoneName,
    )
  }
  return combined
}

/**
 * Civil date of an instant as seen in a zone
 */
export function civilDateIn(instant: DateTime, zone: Zone): CivilDate {
  const local = instant.setZone(zone)
  if (!local.isValid) {
    throw new TimeZoneResolutionError(`Unknown zone ${zone.name}`, zone.name)
  }
  return { year: local.year, month: local.month, day: local.day }
}

export function timeOfDay(instant: DateTime): TimeOfDay {
  return {
    hour: instant.hour,
    minute: instant.minute,
    second: instant.second,
    millisecond: instant.millisecond,
  }
}

export function addDays(date: CivilDate, days: number): CivilDate {
  const shifted = DateTime.fromObject(date, { zone: 'UTC' }).plus({ days })
  return { year: shifted.year, month: shifted.month, day: shifted.day }
}

/**
 * Signed minutes from `from` to `to`
 */
export function minutesBetween(from: DateTime, to: DateTime): number {
  return (to.toMillis() - from.toMillis()) / MINUTE_MS
}

function formatCivil(date: CivilDate, time: TimeOfDay): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.year}-${pad(date.month)}-${pad(date.day)} ${pad(time.hour)}:${pad(time.minute)}`
}
