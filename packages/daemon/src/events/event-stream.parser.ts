import type { Readable } from 'stream'
import type { AdminEvent } from '@devices-widget/shared'
import { adminEventSchema } from '@devices-widget/shared'
import { QubesDaemonCommunicationError } from '../errors/admin.errors'
import { dispatcherLogger } from '../utils/logger'

/**
 * Marker opening every event record
 */
const EVENT_HEADER = '1'

/**
 * Incremental decoder for the admin event stream
 *
 * Records are NUL-separated fields:
 * `1\0<subject>\0<event>\0(<key>\0<value>\0)*\0`. An empty subject denotes a
 * global event. Chunks may split a record, or a field, anywhere.
 */
export class AdminEventParser {
  private pending: Buffer = Buffer.alloc(0)
  private fields: string[] = []

  /**
   * Feed a chunk, returning the events it completed
   */
  push(chunk: Buffer): AdminEvent[] {
    const events: AdminEvent[] = []
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk

    let start = 0
    let end = this.pending.indexOf(0, start)
    while (end >= 0) {
      const field = this.pending.toString('utf-8', start, end)
      const event = this.consume(field)
      if (event) {
        events.push(event)
      }
      start = end + 1
      end = this.pending.indexOf(0, start)
    }
    this.pending = this.pending.subarray(start)

    return events
  }

  /**
   * Whether a partial record is still buffered
   */
  get hasPartialRecord(): boolean {
    return this.fields.length > 0 || this.pending.length > 0
  }

  private consume(field: string): AdminEvent | null {
    if (this.fields.length === 0 && field !== EVENT_HEADER) {
      throw new QubesDaemonCommunicationError(`Invalid event stream header: ${JSON.stringify(field)}`)
    }

    // an empty field where a key is expected closes the record
    const keyPosition = this.fields.length >= 3 && (this.fields.length - 3) % 2 === 0
    if (keyPosition && field === '') {
      const record = this.fields
      this.fields = []
      return this.toEvent(record)
    }

    this.fields.push(field)
    return null
  }

  private toEvent(record: string[]): AdminEvent | null {
    const kwargs: Record<string, string> = {}
    for (let i = 3; i + 1 < record.length; i += 2) {
      kwargs[record[i] ?? ''] = record[i + 1] ?? ''
    }

    const result = adminEventSchema.safeParse({
      subject: record[1] || null,
      event: record[2],
      kwargs,
    })
    if (!result.success) {
      dispatcherLogger.warn({ record, issues: result.error.issues }, 'Dropping malformed admin event')
      return null
    }
    return result.data
  }
}

/**
 * Decode the admin events carried by a byte stream
 */
export async function* readAdminEvents(stream: Readable): AsyncGenerator<AdminEvent> {
  const parser = new AdminEventParser()
  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    yield* parser.push(buffer)
  }
  if (parser.hasPartialRecord) {
    dispatcherLogger.warn('Admin event stream ended inside a record')
  }
}
