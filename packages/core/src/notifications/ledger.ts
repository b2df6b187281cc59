/**
 * Notification Dedup Ledger
 *
 * Remembers which (event, lead time) pairs and URL opens already fired.
 * Entries are purged explicitly, once per scheduler tick.
 */

import type { DateTime } from 'luxon'
import { DAY_MS } from '../calendar/datetime.js'

export const URL_OPENED = 'urlOpened'

export type LedgerSlot = number | typeof URL_OPENED

const DEFAULT_MAX_AGE_MS = DAY_MS

export class DedupLedger {
  private entries = new Map<string, DateTime>() // key → when the action was taken

  static key(eventId: string, slot: LedgerSlot): string {
    return JSON.stringify([eventId, slot])
  }

  has(eventId: string, slot: LedgerSlot): boolean {
    return this.entries.has(DedupLedger.key(eventId, slot))
  }

  recordedAt(eventId: string, slot: LedgerSlot): DateTime | undefined {
    return this.entries.get(DedupLedger.key(eventId, slot))
  }

  record(eventId: string, slot: LedgerSlot, at: DateTime): void {
    this.entries.set(DedupLedger.key(eventId, slot), at)
  }

  /**
   * Remove entries recorded more than `maxAgeMs` before `now`.
   *
   * @returns Number of entries removed
   */
  purge(now: DateTime, maxAgeMs: number = DEFAULT_MAX_AGE_MS): number {
    const cutoff = now.toMillis() - maxAgeMs
    let removed = 0
    for (const [key, at] of this.entries) {
      if (at.toMillis() < cutoff) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  /** Current ledger size */
  get size(): number {
    return this.entries.size
  }

  /** Clear all entries */
  clear(): void {
    this.entries.clear()
  }
}
