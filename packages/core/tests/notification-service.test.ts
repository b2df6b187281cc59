import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { NotificationService } from '../src/notifications/service.js'
import type {
  NotificationEvent,
  NotificationRequest,
  UrlOpenRequest,
} from '../src/notifications/types.js'

function notifyAction(eventId: string, leadMinutes = 5): NotificationRequest {
  return {
    type: 'notify',
    eventId,
    title: `Meeting in ${leadMinutes} minutes`,
    body: 'Standup',
    leadMinutes,
    minutesUntilStart: leadMinutes,
    playSound: true,
  }
}

const openAction: UrlOpenRequest = {
  type: 'open-url',
  eventId: 'evt-1',
  title: 'Standup',
  url: 'https://meet.example/standup',
  minutesUntilStart: 1,
}

describe('NotificationService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('routes actions to their sinks and records them newest first', async () => {
    const notifier = { notify: vi.fn() }
    const urlOpener = { open: vi.fn() }
    const service = new NotificationService({ notifier, urlOpener })

    const records = await service.dispatch([notifyAction('evt-1'), openAction])

    expect(notifier.notify).toHaveBeenCalledWith(notifyAction('evt-1'))
    expect(urlOpener.open).toHaveBeenCalledWith('https://meet.example/standup')
    expect(records.map((r) => r.delivered)).toEqual([true, true])
    expect(service.getHistory().map((r) => r.action.type)).toEqual(['open-url', 'notify'])
  })

  it('records a failing sink and carries on', async () => {
    const notifier = {
      notify: vi.fn(async (request: NotificationRequest) => {
        if (request.eventId === 'bad') throw new Error('display unavailable')
      }),
    }
    const service = new NotificationService({ notifier, urlOpener: { open: vi.fn() } })
    const failed = vi.fn()
    service.on('notification:failed', failed)

    const records = await service.dispatch([notifyAction('bad'), notifyAction('good')])

    expect(records[0]).toMatchObject({ delivered: false, error: 'display unavailable' })
    expect(records[1]).toMatchObject({ delivered: true })
    expect(failed).toHaveBeenCalledTimes(1)
    expect(console.error).toHaveBeenCalledWith(
      '[Notifications] Delivery failed for bad: display unavailable',
    )
  })

  it('emits a generic event for every record', async () => {
    const service = new NotificationService({
      notifier: { notify: vi.fn() },
      urlOpener: { open: vi.fn() },
    })
    const events: NotificationEvent[] = []
    service.on('notification', (event: NotificationEvent) => events.push(event))

    await service.dispatch([notifyAction('evt-1')])

    expect(events).toHaveLength(1)
    expect(events[0].type).toBe('notification:delivered')
    expect(events[0].record.action.eventId).toBe('evt-1')
  })

  it('keeps a bounded history', async () => {
    const service = new NotificationService({
      notifier: { notify: vi.fn() },
      urlOpener: { open: vi.fn() },
      maxHistory: 2,
    })

    await service.dispatch([notifyAction('a'), notifyAction('b'), notifyAction('c')])

    expect(service.getHistory().map((r) => r.action.eventId)).toEqual(['c', 'b'])

    service.clear()
    expect(service.getHistory()).toEqual([])
  })
})
