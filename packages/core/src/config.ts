import * as os from 'node:os'
import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import type { CalDAVSettings } from './calendar/types.js'
import type { NotificationPolicy } from './notifications/types.js'

export const DEFAULT_INTERVALS: readonly number[] = [1, 5, 10]

const DEFAULT_SYNC_INTERVAL_MINUTES = 5
const DEFAULT_SYNC_HOURS = 24
const DEFAULT_CHECK_INTERVAL_SECONDS = 20
const DEFAULT_DASHBOARD_HOST = '127.0.0.1'
const DEFAULT_DASHBOARD_PORT = 4350

const CONFIG_DIRNAME = '.calnotify'
const CONFIG_FILENAME = 'config.yaml'

export interface SyncConfig {
  intervalMinutes: number
  /** How far ahead each fetch looks */
  syncHours: number
}

export interface AppConfig {
  caldav: CalDAVSettings
  sync: SyncConfig
  notifications: NotificationPolicy & { checkIntervalSeconds: number }
  dashboard: {
    host: string
    port: number
  }
}

/**
 * Shape of config.yaml. Both camelCase and the older snake_case keys are read.
 */
interface YamlConfig {
  caldav?: {
    url?: string
    username?: string
    password?: string
    calendarName?: string
    calendar_name?: string
    accountEmail?: string
    account_email?: string
  }
  sync?: {
    intervalMinutes?: number
    interval_minutes?: number
    syncHours?: number
    sync_hours?: number
  }
  notifications?: {
    intervalsMinutes?: unknown
    intervals_minutes?: unknown
    soundEnabled?: boolean
    sound_enabled?: boolean
    skipDeclined?: boolean
    skip_declined?: boolean
    checkIntervalSeconds?: number
    check_interval_seconds?: number
  }
  autoOpenUrls?: boolean
  auto_open_urls?: boolean
  dashboard?: {
    host?: string
    port?: number
  }
}

export function findConfigDir(): string {
  if (process.env.CALNOTIFY_DIR) {
    return path.resolve(process.env.CALNOTIFY_DIR)
  }
  // Walk up from cwd looking for an existing .calnotify/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // Fallback: per-user config directory
  const base = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config')
  return path.join(base, 'calnotify')
}

function loadYamlConfig(configDir: string): YamlConfig | null {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }
  try {
    const raw = readFileSync(configPath, 'utf-8')
    const parsed: unknown = parse(raw)
    return isRecord(parsed) ? (parsed as YamlConfig) : null
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return null
  }
}

/**
 * Load configuration from config.yaml, merged over defaults.
 */
export function loadConfig(configDir?: string): AppConfig {
  const dir = configDir ?? findConfigDir()
  const yaml = loadYamlConfig(dir) ?? {}

  const caldav = yaml.caldav ?? {}
  const sync = yaml.sync ?? {}
  const notifications = yaml.notifications ?? {}

  return {
    caldav: {
      url: (caldav.url ?? '').trim().replace(/\/+$/, ''),
      username: caldav.username ?? '',
      password: caldav.password ?? '',
      calendarName: caldav.calendarName ?? caldav.calendar_name ?? '',
      accountEmail: caldav.accountEmail ?? caldav.account_email ?? caldav.username ?? '',
    },
    sync: {
      intervalMinutes: positiveNumber(
        sync.intervalMinutes ?? sync.interval_minutes,
        DEFAULT_SYNC_INTERVAL_MINUTES,
      ),
      syncHours: positiveNumber(sync.syncHours ?? sync.sync_hours, DEFAULT_SYNC_HOURS),
    },
    notifications: {
      intervals: normalizeIntervals(notifications.intervalsMinutes ?? notifications.intervals_minutes),
      soundEnabled: notifications.soundEnabled ?? notifications.sound_enabled ?? true,
      autoOpenUrls: yaml.autoOpenUrls ?? yaml.auto_open_urls ?? true,
      skipDeclined: notifications.skipDeclined ?? notifications.skip_declined ?? true,
      checkIntervalSeconds: positiveNumber(
        notifications.checkIntervalSeconds ?? notifications.check_interval_seconds,
        DEFAULT_CHECK_INTERVAL_SECONDS,
      ),
    },
    dashboard: {
      host: yaml.dashboard?.host ?? DEFAULT_DASHBOARD_HOST,
      port: positiveNumber(yaml.dashboard?.port, DEFAULT_DASHBOARD_PORT),
    },
  }
}

/**
 * Turn configured lead times into distinct positive integers, ascending.
 * Accepts a list or a comma-separated string; falls back to the defaults
 * when nothing valid remains.
 */
export function normalizeIntervals(value: unknown): readonly number[] {
  if (value === undefined || value === null) {
    return DEFAULT_INTERVALS
  }

  const parts: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [value]

  const intervals = new Set<number>()
  for (const part of parts) {
    const n = typeof part === 'number' ? part : Number(String(part).trim())
    if (Number.isInteger(n) && n > 0) {
      intervals.add(n)
    }
  }

  if (intervals.size === 0) {
    console.warn(`Warning: Invalid notification intervals ${JSON.stringify(value)}, using defaults (1, 5, 10 minutes).`)
    return DEFAULT_INTERVALS
  }

  return [...intervals].sort((a, b) => a - b)
}

/**
 * Whether enough CalDAV settings are present to attempt a connection
 */
export function isCalDAVConfigured(config: AppConfig): boolean {
  return config.caldav.url !== '' && config.caldav.username !== ''
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
