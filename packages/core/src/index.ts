import { DateTime } from 'luxon'
import { loadConfig, findConfigDir, isCalDAVConfigured } from './config.js'
import { createCalDAVSource } from './calendar/caldav-client.js'
import { normalize } from './calendar/normalizer.js'
import { getMeetingUrl } from './calendar/event-url.js'
import { findNextEvent } from './notifications/scheduler.js'

/**
 * One-shot connection check: verifies the CalDAV settings and prints the
 * events the notifier would currently work from.
 */
async function main(): Promise<void> {
  const configDir = findConfigDir()
  const config = loadConfig(configDir)

  if (!isCalDAVConfigured(config)) {
    console.log(`CalDAV is not configured. Add a caldav section to ${configDir}/config.yaml.`)
    process.exit(1)
  }

  const source = createCalDAVSource(config.caldav)
  const health = await source.checkHealth()
  if (!health.reachable) {
    console.error(`Connection failed: ${health.error ?? 'unknown error'}`)
    process.exit(1)
  }
  console.log(`Connected to "${health.calendar ?? config.caldav.url}" in ${health.latencyMs ?? 0}ms`)

  const now = DateTime.now()
  const raw = await source.fetchOccurrences(
    now.toJSDate(),
    now.plus({ hours: config.sync.syncHours }).toJSDate(),
  )
  const events = normalize(raw, now, {
    accountEmail: config.caldav.accountEmail,
    onWarning: (warning) => console.warn(`Skipping ${warning.uid}: ${warning.message}`),
  })

  if (events.length === 0) {
    console.log('No upcoming events found.')
    return
  }

  for (const event of events) {
    const annotations: string[] = []
    if (event.isModifiedOccurrence) annotations.push('moved')
    if (event.isDeclined) annotations.push('declined')
    if (getMeetingUrl(event)) annotations.push('link')
    const suffix = annotations.length > 0 ? ` [${annotations.join(', ')}]` : ''
    console.log(`${event.start.toFormat('yyyy-MM-dd HH:mm ZZZZ')} - ${event.title}${suffix}`)
  }

  const next = findNextEvent(events, now)
  if (next) {
    console.log(`\nNext: "${next.event.title}" in ${Math.round(next.minutesUntilStart)} min`)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
