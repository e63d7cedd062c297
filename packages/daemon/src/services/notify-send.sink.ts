import { execFile } from 'child_process'
import { promisify } from 'util'
import type { NotificationPriority, NotificationRequest } from '@devices-widget/shared'
import type { NotificationSink } from '../admin/admin.types'
import { notifierLogger } from '../utils/logger'

const execFileAsync = promisify(execFile)

const URGENCY: Record<NotificationPriority, string> = {
  low: 'low',
  normal: 'normal',
  high: 'critical',
}

/**
 * Runs a command, resolving with its standard output
 */
export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<{ stdout: string }>

const runCommand: CommandRunner = (command, args, timeoutMs) => execFileAsync(command, args, { timeout: timeoutMs })

export interface NotifySendOptions {
  /** notify-send binary */
  command: string
  appName: string
  timeoutMs?: number
  run?: CommandRunner
}

/**
 * Desktop notifications through notify-send
 *
 * Remembers the server-side id of every identity so that posting the same
 * identity again replaces the notification instead of stacking a new one.
 */
export class NotifySendSink implements NotificationSink {
  private ids = new Map<string, string>()

  constructor(private readonly options: NotifySendOptions) {}

  async notify(request: NotificationRequest): Promise<void> {
    const identity = request.error ? `${request.id}ERROR` : request.id
    const args = buildArgs(request, this.options.appName, this.ids.get(identity))

    const run = this.options.run ?? runCommand
    const { stdout } = await run(this.options.command, args, this.options.timeoutMs ?? 5000)
    const id = stdout.trim()
    if (/^\d+$/.test(id)) {
      this.ids.set(identity, id)
    }
    notifierLogger.debug({ identity, id, title: request.title }, 'Notification posted')
  }
}

/**
 * Command line for one notification
 */
export const buildArgs = (request: NotificationRequest, appName: string, replaceId?: string): string[] => {
  const args = ['--app-name', appName, '--urgency', URGENCY[request.priority], '--print-id']
  if (replaceId) {
    args.push('--replace-id', replaceId)
  }
  args.push('--icon', request.error ? 'dialog-error' : 'media-removable')
  args.push('--', request.title, request.body)
  return args
}
