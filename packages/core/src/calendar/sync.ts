/**
 * Calendar Sync
 *
 * The slow driver: fetches the upcoming window, normalizes it and publishes
 * the result as a new snapshot. Failed fetches publish an empty snapshot and
 * are retried with backoff instead of waiting for the full interval.
 */

import { DateTime } from 'luxon'
import { computeBackoff, DEFAULT_BACKOFF, type RetryPolicy } from '../utils/backoff.js'
import { MINUTE_MS } from './datetime.js'
import { normalize } from './normalizer.js'
import type { EventSnapshotStore } from './snapshot.js'
import type { FetchSource, RawOccurrence } from './types.js'

export interface CalendarSyncConfig {
  source: FetchSource
  store: EventSnapshotStore
  intervalMinutes: number
  /** Hours ahead of now to fetch */
  syncHours: number
  accountEmail?: string
  retryPolicy?: RetryPolicy
  now?: () => DateTime
}

export interface SyncResult {
  ok: boolean
  eventCount: number
  /** Records dropped as malformed */
  skipped: number
  error?: string
}

export interface SyncStatus {
  running: boolean
  intervalMinutes: number
  syncHours: number
  lastSyncAt: string | null
  lastSuccessAt: string | null
  lastError: string | null
  consecutiveFailures: number
  eventCount: number
  nextSyncAt: string | null
}

export class CalendarSync {
  private config: CalendarSyncConfig
  private retryPolicy: RetryPolicy
  private now: () => DateTime
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<SyncResult> | null = null
  private running = false
  private lastSyncAt: DateTime | null = null
  private lastSuccessAt: DateTime | null = null
  private lastError: string | null = null
  private consecutiveFailures = 0
  private nextSyncAt: DateTime | null = null

  constructor(config: CalendarSyncConfig) {
    this.config = config
    this.retryPolicy = config.retryPolicy ?? DEFAULT_BACKOFF
    this.now = config.now ?? (() => DateTime.now())
  }

  /**
   * Run a first sync, then keep syncing on the configured interval.
   */
  async start(): Promise<void> {
    if (this.running) {
      console.log('[Sync] Already running')
      return
    }

    this.running = true
    console.log(
      `[Sync] Starting with interval ${this.config.intervalMinutes}min, window ${this.config.syncHours}h`,
    )

    const result = await this.syncNow()
    this.scheduleNext(result)
  }

  /**
   * Stop syncing. An in-flight sync still completes and publishes.
   */
  stop(): void {
    if (!this.running) {
      return
    }

    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }

    this.running = false
    this.nextSyncAt = null
    console.log('[Sync] Stopped')
  }

  /**
   * Sync immediately. Concurrent callers share the sync already in flight.
   */
  syncNow(): Promise<SyncResult> {
    if (!this.inFlight) {
      this.inFlight = this.runSync().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  getStatus(): SyncStatus {
    return {
      running: this.running,
      intervalMinutes: this.config.intervalMinutes,
      syncHours: this.config.syncHours,
      lastSyncAt: this.lastSyncAt?.toISO() ?? null,
      lastSuccessAt: this.lastSuccessAt?.toISO() ?? null,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      eventCount: this.config.store.events.length,
      nextSyncAt: this.nextSyncAt?.toISO() ?? null,
    }
  }

  private async runSync(): Promise<SyncResult> {
    const now = this.now()
    const until = now.plus({ hours: this.config.syncHours })
    this.lastSyncAt = now

    let error: string | undefined
    let raw: RawOccurrence[] = []
    try {
      raw = await this.config.source.fetchOccurrences(now.toJSDate(), until.toJSDate())
    } catch (err) {
      error = err instanceof Error ? err.message : String(err)
      console.error(`[Sync] Error fetching events: ${error}`)
    }

    let skipped = 0
    const events = normalize(raw, now, {
      accountEmail: this.config.accountEmail,
      onWarning: (warning) => {
        skipped++
        console.warn(`[Sync] Skipping event ${warning.uid}: ${warning.message}`)
      },
    })

    this.config.store.publish(events, now)

    if (error === undefined) {
      this.lastSuccessAt = now
      this.lastError = null
      this.consecutiveFailures = 0
      console.log(`[Sync] Synced ${events.length} events for the next ${this.config.syncHours} hours`)
    } else {
      this.lastError = error
      this.consecutiveFailures++
    }

    return { ok: error === undefined, eventCount: events.length, skipped, error }
  }

  private scheduleNext(result: SyncResult): void {
    if (!this.running) {
      return
    }

    const intervalMs = this.config.intervalMinutes * MINUTE_MS
    const delayMs = result.ok
      ? intervalMs
      : (computeBackoff(this.retryPolicy, Math.max(0, this.consecutiveFailures - 1)) ?? intervalMs)

    this.nextSyncAt = this.now().plus({ milliseconds: delayMs })
    this.timer = setTimeout(() => {
      this.timer = null
      this.syncNow()
        .then((next) => this.scheduleNext(next))
        .catch((err) => {
          console.error('[Sync] Sync loop error:', err)
          this.scheduleNext({ ok: false, eventCount: 0, skipped: 0 })
        })
    }, delayMs)
  }
}
