import { execFile, spawn } from 'child_process'
import type { AdminEvent } from '@devices-widget/shared'
import { QubesDaemonCommunicationError } from '../errors/admin.errors'
import { readAdminEvents } from '../events/event-stream.parser'
import { adminLogger } from '../utils/logger'

/**
 * Largest response accepted from a single admin call
 */
const MAX_RESPONSE_BYTES = 10 * 1024 * 1024

export interface QrexecTransportOptions {
  /** qrexec client binary */
  client: string
  /** Timeout of a single call in ms */
  timeoutMs: number
}

/**
 * Admin API transport over qrexec
 *
 * Each call runs `<client> <dest> <method>[+<arg>]`, writes the payload to
 * stdin and returns the raw response.
 */
export class QrexecTransport {
  constructor(private readonly options: QrexecTransportOptions) {}

  call(dest: string, method: string, arg = '', payload = ''): Promise<Buffer> {
    const service = arg ? `${method}+${arg}` : method

    return new Promise((resolve, reject) => {
      const child = execFile(
        this.options.client,
        [dest, service],
        { encoding: 'buffer', timeout: this.options.timeoutMs, maxBuffer: MAX_RESPONSE_BYTES },
        (error, stdout) => {
          // a refused call exits non-zero with an empty response, which the
          // protocol layer reports as an access error
          if (error && (typeof error.code === 'string' || error.killed)) {
            adminLogger.debug({ dest, service, error: error.message }, 'qrexec call failed')
            reject(new QubesDaemonCommunicationError(`${service} on ${dest} failed: ${error.message}`))
            return
          }
          resolve(stdout)
        }
      )
      child.stdin?.on('error', (error) => {
        adminLogger.debug({ dest, service, error: error.message }, 'qrexec payload not delivered')
      })
      child.stdin?.end(payload)
    })
  }

  /**
   * Open the admin event stream of a target
   */
  async *events(dest: string, signal?: AbortSignal): AsyncGenerator<AdminEvent> {
    const child = spawn(this.options.client, [dest, 'admin.Events'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      signal,
    })
    const failure: { error?: Error } = {}
    const closed = new Promise<number | null>((resolve) => {
      child.on('error', (error) => {
        failure.error = error
        resolve(null)
      })
      child.on('close', (code) => resolve(code))
    })

    try {
      yield* readAdminEvents(child.stdout)
      const code = await closed
      if (failure.error) {
        throw new QubesDaemonCommunicationError(`admin.Events failed: ${failure.error.message}`)
      }
      adminLogger.info({ dest, code }, 'admin.Events stream closed')
    } finally {
      if (child.exitCode === null && !child.killed) {
        child.kill()
      }
    }
  }
}
