import type { NormalizedEvent } from './types.js'

const URL_PREFIXES = ['http://', 'https://', 'www.']

/**
 * Whether the event location is a meeting link rather than a place
 */
export function hasUrlLocation(event: Pick<NormalizedEvent, 'location'>): boolean {
  const location = event.location?.trim().toLowerCase()
  if (!location) return false
  return URL_PREFIXES.some((prefix) => location.startsWith(prefix))
}

/**
 * URL to open for the event, with bare `www.` links upgraded to https
 */
export function getMeetingUrl(event: Pick<NormalizedEvent, 'location'>): string | null {
  if (!hasUrlLocation(event)) return null

  const location = event.location?.trim() ?? ''
  if (location.toLowerCase().startsWith('www.')) {
    return `https://${location}`
  }
  return location
}
