import dotenv from 'dotenv'
import { QubesAdminClient } from './admin/qubes-admin.client'
import { QrexecTransport } from './admin/qrexec.transport'
import { loadConfig } from './config'
import { DevicesTray } from './devices-tray'
import { errorMessage } from './errors/admin.errors'
import { NotifySendSink } from './services/notify-send.sink'
import { logger } from './utils/logger'

export { DevicesTray } from './devices-tray'
export type { DevicesTrayOptions } from './devices-tray'
export type { AdminDirectory, AdminVm, AttachmentApi, DeviceInfo, EventSource, NotificationSink } from './admin/admin.types'
export type { ToggleResult } from './services/attachment-coordinator.service'
export type { DeviceMenuSection, DeviceMenuItem, DeviceMenuTarget } from './services/device-menu.service'

/**
 * Run the widget until the event stream fails
 */
export const main = async (): Promise<number> => {
  dotenv.config()
  const config = loadConfig()

  const transport = new QrexecTransport({
    client: config.admin.qrexecClient,
    timeoutMs: config.admin.callTimeoutMs,
  })
  const client = new QubesAdminClient(transport, config.admin.target)
  const sink = new NotifySendSink({ command: config.notifySend, appName: config.appName })
  const tray = new DevicesTray({
    directory: client,
    attachments: client,
    sink,
    debounceMs: config.notificationDebounceMs,
  })

  const abort = new AbortController()
  const stop = (): void => abort.abort()
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  try {
    await tray.initialize()
    await tray.dispatcher.listenForEvents(client.eventSource(abort.signal), {
      reconnect: true,
      reconnectDelayMs: config.events.reconnectDelayMs,
      signal: abort.signal,
    })
    return 0
  } catch (error) {
    const err = error instanceof Error ? error : new Error(errorMessage(error))
    logger.fatal({ error: { name: err.name, message: err.message, stack: err.stack } }, 'Critical error in devices widget')
    await sink
      .notify({
        id: 'devices-widget-fatal',
        title: 'Houston, we have a problem...',
        body: `A critical error in the devices widget has occurred: ${err.name}: ${err.message}`,
        priority: 'high',
        error: true,
      })
      .catch((notifyError: unknown) => {
        logger.error({ error: errorMessage(notifyError) }, 'Failed to report critical error')
      })
    return 1
  } finally {
    tray.dispose()
    process.off('SIGINT', stop)
    process.off('SIGTERM', stop)
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      logger.fatal({ error: errorMessage(error) }, 'Devices widget crashed')
      process.exitCode = 1
    })
}
