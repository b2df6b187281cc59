/**
 * Notification Scheduler
 *
 * Decides, per tick, which (event, lead time) pairs enter their firing
 * window for the first time. Pure over its inputs apart from the ledger,
 * which it records into and purges.
 */

import type { DateTime } from 'luxon'
import {
  DAY_MS,
  addDays,
  civilDateIn,
  combineInZone,
  minutesBetween,
  timeOfDay,
  TimeZoneResolutionError,
} from '../calendar/datetime.js'
import { getMeetingUrl } from '../calendar/event-url.js'
import type { EventSnapshot, NormalizedEvent } from '../calendar/types.js'
import { URL_OPENED, type DedupLedger } from './ledger.js'
import type {
  NotificationPolicy,
  NotificationRequest,
  SchedulerAction,
  UrlOpenRequest,
} from './types.js'

/** Half-width of the firing window around each lead time, in minutes */
const INTERVAL_WINDOW = 0.5

/** Window for opening meeting links; wider above since it fires only once */
const URL_OPEN_MIN = 0.5
const URL_OPEN_MAX = 1.3

/** Tomorrow's occurrence is only considered this far beyond the longest lead time */
const TOMORROW_BUFFER_MINUTES = 60

export type EffectiveStart =
  | { kind: 'scheduled'; start: DateTime; recovered: boolean }
  | { kind: 'skip'; reason: 'recent-past' | 'not-actionable' }

/**
 * Run one scheduler pass over a snapshot.
 *
 * Each action is recorded in the ledger as it is emitted, whether or not
 * delivery later succeeds.
 */
export function tick(
  events: EventSnapshot,
  policy: NotificationPolicy,
  ledger: DedupLedger,
  now: DateTime,
): SchedulerAction[] {
  const actions: SchedulerAction[] = []
  const maxInterval = policy.intervals.length > 0 ? Math.max(...policy.intervals) : 0

  for (const event of events) {
    if (policy.skipDeclined && event.isDeclined) {
      continue
    }

    let resolved: EffectiveStart
    try {
      resolved = resolveEffectiveStart(event, maxInterval, now)
    } catch (err) {
      console.error(
        `[Scheduler] Could not resolve occurrence for "${event.title}" (${event.id}): ${err instanceof Error ? err.message : String(err)}`,
      )
      continue
    }

    if (resolved.kind === 'skip') {
      continue
    }

    const minutesUntilStart = minutesBetween(now, resolved.start)

    if (minutesUntilStart <= maxInterval + 1) {
      for (const interval of policy.intervals) {
        if (
          Math.abs(minutesUntilStart - interval) <= INTERVAL_WINDOW &&
          !ledger.has(event.id, interval)
        ) {
          console.log(
            `[Scheduler] "${event.title}" starts in ${minutesUntilStart.toFixed(2)} min, sending ${interval} minute notification`,
          )
          actions.push(buildNotification(event, interval, minutesUntilStart, policy))
          ledger.record(event.id, interval, now)
        }
      }
    }

    if (
      policy.autoOpenUrls &&
      minutesUntilStart >= URL_OPEN_MIN &&
      minutesUntilStart <= URL_OPEN_MAX &&
      !ledger.has(event.id, URL_OPENED)
    ) {
      const url = getMeetingUrl(event)
      if (url) {
        actions.push(buildUrlOpen(event, url, minutesUntilStart))
        ledger.record(event.id, URL_OPENED, now)
      }
    }
  }

  const purged = ledger.purge(now)
  if (purged > 0) {
    console.debug(`[Scheduler] Purged ${purged} ledger entries older than 24h`)
  }

  return actions
}

/**
 * Work out which start time a tick should measure an event against.
 *
 * @param maxInterval - Longest configured lead time, bounding how far ahead
 *   tomorrow's recovered occurrence may lie
 * @throws TimeZoneResolutionError when the event's zone data is unusable
 */
export function resolveEffectiveStart(
  event: NormalizedEvent,
  maxInterval: number,
  now: DateTime,
): EffectiveStart {
  if (!event.start.isValid) {
    throw new TimeZoneResolutionError(
      `Invalid start: ${event.start.invalidReason ?? 'unknown reason'}`,
      event.start.zoneName ?? undefined,
    )
  }

  if (event.isModifiedOccurrence || event.start > now) {
    return { kind: 'scheduled', start: event.start, recovered: false }
  }

  if (now.toMillis() - event.start.toMillis() <= DAY_MS) {
    return { kind: 'skip', reason: 'recent-past' }
  }

  // Likely a stale instance of a recurring series: try today's and
  // tomorrow's occurrence at the same wall-clock time in the event's zone
  const today = occurrenceOnDay(event, now, 0)
  if (today > now) {
    return { kind: 'scheduled', start: today, recovered: true }
  }

  const tomorrow = occurrenceOnDay(event, now, 1)
  if (
    tomorrow > now &&
    minutesBetween(now, tomorrow) <= maxInterval + TOMORROW_BUFFER_MINUTES
  ) {
    return { kind: 'scheduled', start: tomorrow, recovered: true }
  }

  return { kind: 'skip', reason: 'not-actionable' }
}

/**
 * Next upcoming event and when it starts, for status displays.
 * Stale recurring instances are moved to today's occurrence only; modified
 * occurrences keep their own start, as in `tick`.
 */
export function findNextEvent(
  events: EventSnapshot,
  now: DateTime,
): { event: NormalizedEvent; start: DateTime; minutesUntilStart: number } | null {
  let next: { event: NormalizedEvent; start: DateTime } | null = null

  for (const event of events) {
    let start: DateTime | null = event.start
    if (event.start <= now) {
      start = null
      if (!event.isModifiedOccurrence && now.toMillis() - event.start.toMillis() > DAY_MS) {
        try {
          const today = occurrenceOnDay(event, now, 0)
          start = today > now ? today : null
        } catch (err) {
          console.error(
            `[Scheduler] Could not resolve today's occurrence for "${event.title}": ${err instanceof Error ? err.message : String(err)}`,
          )
        }
      }
    }

    if (start && (!next || start < next.start)) {
      next = { event, start }
    }
  }

  return next ? { ...next, minutesUntilStart: minutesBetween(now, next.start) } : null
}

function occurrenceOnDay(event: NormalizedEvent, now: DateTime, dayOffset: number): DateTime {
  const zone = event.start.zone
  const date = addDays(civilDateIn(now, zone), dayOffset)
  return combineInZone(date, timeOfDay(event.start), zone)
}

function buildNotification(
  event: NormalizedEvent,
  leadMinutes: number,
  minutesUntilStart: number,
  policy: NotificationPolicy,
): NotificationRequest {
  const title = `Meeting in ${leadMinutes} minute${leadMinutes > 1 ? 's' : ''}`
  const body = event.location ? `${event.title}\nLocation: ${event.location}` : event.title

  return {
    type: 'notify',
    eventId: event.id,
    title,
    body,
    leadMinutes,
    minutesUntilStart,
    playSound: policy.soundEnabled,
  }
}

function buildUrlOpen(event: NormalizedEvent, url: string, minutesUntilStart: number): UrlOpenRequest {
  return {
    type: 'open-url',
    eventId: event.id,
    title: event.title,
    url,
    minutesUntilStart,
  }
}
