/**
 * Notification Loop
 *
 * The fast driver: runs a scheduler tick against the current snapshot every
 * few seconds and hands the resulting actions to the NotificationService.
 * Owns the dedup ledger; at most one tick is in flight at a time. Delivery
 * runs detached from the tick.
 */

import { DateTime } from 'luxon'
import type { EventSnapshotStore } from '../calendar/snapshot.js'
import { DedupLedger } from './ledger.js'
import { tick } from './scheduler.js'
import type { NotificationService } from './service.js'
import type { NotificationPolicy, SchedulerAction } from './types.js'

const DEFAULT_CHECK_INTERVAL_MS = 20_000

export interface NotificationLoopConfig {
  store: EventSnapshotStore
  service: NotificationService
  policy: NotificationPolicy
  checkIntervalMs?: number
  now?: () => DateTime
}

export interface NotificationLoopStatus {
  running: boolean
  checkIntervalMs: number
  tickCount: number
  /** Ticks dropped because the previous one was still running */
  skippedOverlaps: number
  firedCount: number
  ledgerSize: number
  lastTickAt: string | null
  intervals: number[]
}

export class NotificationLoop {
  private store: EventSnapshotStore
  private service: NotificationService
  private policy: NotificationPolicy
  private checkIntervalMs: number
  private now: () => DateTime
  private ledger = new DedupLedger()
  private timer: NodeJS.Timeout | null = null
  private ticking = false
  private tickCount = 0
  private skippedOverlaps = 0
  private firedCount = 0
  private lastTickAt: DateTime | null = null

  constructor(config: NotificationLoopConfig) {
    this.store = config.store
    this.service = config.service
    this.policy = config.policy
    this.checkIntervalMs = config.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS
    this.now = config.now ?? (() => DateTime.now())
  }

  /**
   * Start ticking on the check interval, and after every new snapshot.
   */
  start(): void {
    if (this.timer) {
      console.log('[Notifications] Loop already running')
      return
    }

    this.timer = setInterval(this.scheduledTick, this.checkIntervalMs)
    this.store.on('updated', this.scheduledTick)
    console.log(`[Notifications] Checking every ${this.checkIntervalMs / 1000}s`)
  }

  stop(): void {
    if (!this.timer) {
      return
    }

    clearInterval(this.timer)
    this.timer = null
    this.store.off('updated', this.scheduledTick)
    console.log('[Notifications] Loop stopped')
  }

  /**
   * Run one tick now. Returns the actions it fired; a call made while
   * another tick is in flight is skipped and returns nothing.
   *
   * The ledger is updated before the actions are handed to the service,
   * and the next tick does not wait for their delivery.
   */
  async runTick(): Promise<SchedulerAction[]> {
    if (this.ticking) {
      this.skippedOverlaps++
      console.debug('[Notifications] Previous tick still running, skipping')
      return []
    }

    this.ticking = true
    let actions: SchedulerAction[]
    try {
      const { events } = this.store.get()
      const now = this.now()
      actions = tick(events, this.policy, this.ledger, now)

      this.tickCount++
      this.lastTickAt = now
      this.firedCount += actions.length
    } finally {
      this.ticking = false
    }

    if (actions.length > 0) {
      this.service.dispatch(actions).catch((err) => {
        console.error('[Notifications] Dispatch error:', err)
      })
    }
    return actions
  }

  getStatus(): NotificationLoopStatus {
    return {
      running: this.timer !== null,
      checkIntervalMs: this.checkIntervalMs,
      tickCount: this.tickCount,
      skippedOverlaps: this.skippedOverlaps,
      firedCount: this.firedCount,
      ledgerSize: this.ledger.size,
      lastTickAt: this.lastTickAt?.toISO() ?? null,
      intervals: [...this.policy.intervals],
    }
  }

  private scheduledTick = (): void => {
    this.runTick().catch((err) => {
      console.error('[Notifications] Tick error:', err)
    })
  }
}
