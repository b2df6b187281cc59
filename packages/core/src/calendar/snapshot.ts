/**
 * Event Snapshot Store
 *
 * Holds the current normalized event set. Publishing replaces the whole
 * frozen collection, so readers never see a partial update.
 */

import { EventEmitter } from 'node:events'
import type { DateTime } from 'luxon'
import type { EventSnapshot } from './types.js'

const EMPTY: EventSnapshot = Object.freeze([])

export interface PublishedSnapshot {
  events: EventSnapshot
  /** When the snapshot was produced; null before the first sync */
  syncedAt: DateTime | null
  version: number
}

export class EventSnapshotStore extends EventEmitter {
  private current: PublishedSnapshot = Object.freeze({ events: EMPTY, syncedAt: null, version: 0 })

  /**
   * Current snapshot. Callers keep the reference they got for the whole
   * of their work.
   */
  get(): PublishedSnapshot {
    return this.current
  }

  get events(): EventSnapshot {
    return this.current.events
  }

  publish(events: EventSnapshot, syncedAt: DateTime): PublishedSnapshot {
    const frozen = Object.isFrozen(events) ? events : Object.freeze([...events])
    this.current = Object.freeze({
      events: frozen,
      syncedAt,
      version: this.current.version + 1,
    })
    this.emit('updated', this.current)
    return this.current
  }
}
