import { z } from 'zod'
import { NOTIFICATION_DEBOUNCE_MS } from '@devices-widget/shared'

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  notificationDebounceMs: z.coerce.number().int().positive().default(NOTIFICATION_DEBOUNCE_MS),
  admin: z.object({
    qrexecClient: z.string().min(1).default('qrexec-client-vm'),
    target: z.string().min(1).default('dom0'),
    callTimeoutMs: z.coerce.number().int().positive().default(10000), // 10 seconds
  }),
  events: z.object({
    reconnectDelayMs: z.coerce.number().int().min(0).default(1000),
  }),
  notifySend: z.string().min(1).default('notify-send'),
  appName: z.string().min(1).default('Devices Widget'),
})

export type Config = z.infer<typeof configSchema>

/**
 * Load and validate configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const rawConfig = {
    nodeEnv: env['NODE_ENV'],
    logLevel: env['LOG_LEVEL'],
    notificationDebounceMs: env['NOTIFICATION_DEBOUNCE_MS'],
    admin: {
      qrexecClient: env['QREXEC_CLIENT'],
      target: env['ADMIN_TARGET'],
      callTimeoutMs: env['ADMIN_CALL_TIMEOUT_MS'],
    },
    events: {
      reconnectDelayMs: env['EVENTS_RECONNECT_DELAY_MS'],
    },
    notifySend: env['NOTIFY_SEND'],
    appName: env['APP_NAME'],
  }

  try {
    return configSchema.parse(rawConfig)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] Validation failed:')
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`)
      })
      throw new Error('Configuration validation failed')
    }
    throw error
  }
}

