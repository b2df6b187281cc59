/**
 * Default notification sinks
 *
 * Native notification and sound APIs are platform glue; the default
 * notifier writes to the console and the URL opener defers to the OS.
 */

import { spawn } from 'node:child_process'
import type { Notifier, NotificationRequest, UrlOpener } from './types.js'

export class ConsoleNotifier implements Notifier {
  notify(request: NotificationRequest): void {
    const sound = request.playSound ? ' (sound)' : ''
    console.log(`[Notifications] ${request.title}${sound}: ${request.body.replace(/\n/g, ' | ')}`)
  }
}

/**
 * Command used to open a URL with the desktop's default handler
 */
export function openCommand(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['open', [url]]
    case 'win32':
      return ['cmd', ['/c', 'start', '""', url]]
    default:
      return ['xdg-open', [url]]
  }
}

export type OpenCommand = (url: string) => [string, string[]]

/**
 * Resolves once the opener process has started; a command that cannot be
 * spawned rejects.
 */
export class SystemUrlOpener implements UrlOpener {
  constructor(private command: OpenCommand = (url) => openCommand(url)) {}

  open(url: string): Promise<void> {
    const [command, args] = this.command(url)

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' })
      child.once('error', reject)
      child.once('spawn', () => {
        child.unref()
        resolve()
      })
    })
  }
}
