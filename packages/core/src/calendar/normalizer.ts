/**
 * Event Normalizer
 *
 * Turns raw fetched occurrences into a de-duplicated, stale-filtered,
 * start-ordered snapshot with resolved, zone-preserving times.
 */

import type { DateTime } from 'luxon'
import { DAY_MS, HOUR_MS, isDateOnly, parseRawDateTime } from './datetime.js'
import {
  PARTICIPATION_STATUSES,
  type EventSnapshot,
  type NormalizedEvent,
  type NormalizeOptions,
  type ParticipationStatus,
  type RawAttendee,
  type RawOccurrence,
} from './types.js'

const DEFAULT_TITLE = 'No Title'

/** Records starting longer ago than this are leftovers of the recurrence expansion */
const STALE_AFTER_MS = DAY_MS

interface Resolved {
  event: NormalizedEvent
  order: number
}

/**
 * Normalize one fetch worth of raw occurrences.
 *
 * Never throws: records without a usable start are skipped and reported
 * through `options.onWarning`.
 */
export function normalize(
  rawOccurrences: readonly RawOccurrence[],
  referenceTime: DateTime,
  options: NormalizeOptions = {},
): EventSnapshot {
  const resolved: Resolved[] = []
  const staleBefore = referenceTime.toMillis() - STALE_AFTER_MS

  rawOccurrences.forEach((raw, order) => {
    if (!raw.start) {
      options.onWarning?.({ kind: 'missing-start', uid: raw.uid, message: 'Missing start' })
      return
    }

    const start = parseRawDateTime(raw.start)
    if (!start) {
      const zone = raw.start.tzid ? ` (${raw.start.tzid})` : ''
      options.onWarning?.({
        kind: 'missing-start',
        uid: raw.uid,
        message: `Unusable start "${raw.start.value}"${zone}`,
      })
      return
    }

    const isModifiedOccurrence = raw.overrideId !== undefined
    const end = isModifiedOccurrence
      ? resolveOverrideEnd(raw, start, rawOccurrences)
      : resolveEnd(raw, start)

    if (start.toMillis() < staleBefore) {
      return
    }

    const participationStatus = findParticipationStatus(raw.attendees, options.accountEmail)

    const event: NormalizedEvent = {
      id: eventId(raw),
      uid: raw.uid,
      title: raw.title?.trim() || DEFAULT_TITLE,
      start,
      end,
      allDay: isDateOnly(raw.start),
      location: raw.location,
      description: raw.description,
      isModifiedOccurrence,
      participationStatus,
      isDeclined: participationStatus === 'DECLINED',
    }

    resolved.push({ event: Object.freeze(event), order })
  })

  const unique = dedupe(resolved)

  // Array.prototype.sort is stable; the order tiebreak keeps that explicit
  unique.sort(
    (a, b) => a.event.start.toMillis() - b.event.start.toMillis() || a.order - b.order,
  )

  return Object.freeze(unique.map((r) => r.event))
}

/**
 * Identity of a normalized event. Modified instances get their own id
 * through their override identity.
 */
export function eventId(raw: RawOccurrence): string {
  if (raw.overrideId !== undefined) return `${raw.uid}:${raw.overrideId}`
  if (raw.instanceId !== undefined) return `${raw.uid}:${raw.instanceId}`
  return raw.uid
}

function resolveEnd(raw: RawOccurrence, start: DateTime): DateTime {
  const end = raw.end ? parseRawDateTime(raw.end) : null
  if (!end || end <= start) {
    return start.plus({ milliseconds: HOUR_MS })
  }
  return end
}

/**
 * An override keeps the duration of the series it was moved out of.
 */
function resolveOverrideEnd(
  raw: RawOccurrence,
  start: DateTime,
  all: readonly RawOccurrence[],
): DateTime {
  const sibling = findSibling(raw, all)
  const siblingStart = sibling?.start ? parseRawDateTime(sibling.start) : null
  const siblingEnd = sibling?.end ? parseRawDateTime(sibling.end) : null

  if (siblingStart && siblingEnd && siblingEnd > siblingStart) {
    return start.plus({ milliseconds: siblingEnd.toMillis() - siblingStart.toMillis() })
  }

  return resolveEnd(raw, start)
}

function findSibling(raw: RawOccurrence, all: readonly RawOccurrence[]): RawOccurrence | undefined {
  const candidates = all.filter((r) => r.uid === raw.uid && r.overrideId === undefined)
  return candidates.find((r) => r.instanceId === raw.overrideId) ?? candidates[0]
}

function findParticipationStatus(
  attendees: RawAttendee[] | undefined,
  accountEmail: string | undefined,
): ParticipationStatus | undefined {
  const account = accountEmail?.trim().toLowerCase()
  if (!account || !attendees) return undefined

  const self = attendees.find((a) => stripMailto(a.address) === account)
  const partstat = self?.partstat?.toUpperCase()
  return PARTICIPATION_STATUSES.find((status) => status === partstat)
}

function stripMailto(address: string): string {
  return address
    .trim()
    .replace(/^mailto:/i, '')
    .toLowerCase()
}

/**
 * Keep one record per id: a modified occurrence beats an un-overridden one,
 * otherwise the first fetched wins.
 */
function dedupe(resolved: Resolved[]): Resolved[] {
  const byId = new Map<string, Resolved>()

  for (const entry of resolved) {
    const existing = byId.get(entry.event.id)
    if (!existing) {
      byId.set(entry.event.id, entry)
    } else if (entry.event.isModifiedOccurrence && !existing.event.isModifiedOccurrence) {
      byId.set(entry.event.id, { event: entry.event, order: existing.order })
    }
  }

  return Array.from(byId.values())
}
