import type { DeviceRef } from '@devices-widget/shared'
import {
  QubesDaemonAccessError,
  QubesDaemonCommunicationError,
  QubesException,
  QubesPropertyAccessError,
  QubesVMNotFoundError,
} from '../errors/admin.errors'
import type { DeviceInfo } from './admin.types'

/**
 * VM entry of admin.vm.List
 */
export interface VmListEntry {
  name: string
  klass: string
  state: string
}

const EXCEPTIONS: Record<string, (message: string, args: string[]) => QubesException> = {
  PermissionDenied: (message) => new QubesDaemonAccessError(message || undefined),
  QubesVMNotFoundError: (message) => new QubesVMNotFoundError(message),
  QubesPropertyAccessError: (_message, args) => new QubesPropertyAccessError(args[0] ?? 'unknown'),
}

/**
 * Substitute exception arguments into a format string
 */
const formatMessage = (format: string, args: string[]): string => {
  let next = 0
  return format.replace(/\{[^}]*\}|%[sdr]/g, (placeholder) => args[next++] ?? placeholder)
}

/**
 * Decode an admin call response
 *
 * `0\0<payload>` is a success; `2\0<type>\0<traceback>\0<format>\0<args…>\0`
 * carries an exception, which is thrown. An empty response means the call
 * was refused before reaching the daemon.
 */
export const parseResponse = (response: Buffer): string => {
  if (response.length === 0) {
    throw new QubesDaemonAccessError()
  }

  const text = response.toString('utf-8')
  if (text.startsWith('0\0')) {
    return text.substring(2)
  }

  if (text.startsWith('2\0')) {
    const [, type = '', , format = '', ...rest] = text.split('\0')
    const args = rest[rest.length - 1] === '' ? rest.slice(0, -1) : rest
    const message = formatMessage(format, args)
    const create = EXCEPTIONS[type]
    throw create ? create(message, args) : new QubesException(message || type)
  }

  throw new QubesDaemonCommunicationError(`Invalid response header: ${JSON.stringify(text.substring(0, 2))}`)
}

/**
 * Parse `key=value` tokens separated by spaces
 */
const parseProperties = (text: string): Record<string, string> => {
  const properties: Record<string, string> = {}
  for (const token of text.split(' ')) {
    const idx = token.indexOf('=')
    if (idx > 0) {
      properties[token.substring(0, idx)] = token.substring(idx + 1)
    }
  }
  return properties
}

const lines = (payload: string): string[] => payload.split('\n').filter((line) => line.length > 0)

/**
 * Parse admin.vm.List: `<name> class=<class> state=<state>` per line
 */
export const parseVmList = (payload: string): VmListEntry[] =>
  lines(payload).map((line) => {
    const idx = line.indexOf(' ')
    const name = idx < 0 ? line : line.substring(0, idx)
    const properties = idx < 0 ? {} : parseProperties(line.substring(idx + 1))
    return {
      name,
      klass: properties['class'] ?? 'unknown',
      state: properties['state'] ?? 'Halted',
    }
  })

/**
 * Parse admin.vm.CurrentState: `power_state=<state>` among other properties
 */
export const parsePowerState = (payload: string): string =>
  parseProperties(payload.trim())['power_state'] ?? 'Halted'

/**
 * Parse admin.vm.property.Get+label: `default=<bool> type=label <name>`
 */
export const parseLabelIcon = (payload: string): string => {
  const tokens = payload.trim().split(' ')
  const label = tokens[tokens.length - 1] ?? ''
  if (!label || label.includes('=')) {
    throw new QubesDaemonCommunicationError(`Invalid label value: ${JSON.stringify(payload)}`)
  }
  return `appvm-${label}`
}

/**
 * Parse admin.vm.device.<class>.Available
 *
 * Each line is `<ident> [key=value ...] description=<text>`; the description
 * runs to the end of the line and may contain spaces.
 */
export const parseAvailableDevices = (payload: string, backendDomain: string, devclass: string): DeviceInfo[] =>
  lines(payload).map((line) => {
    const idx = line.indexOf(' ')
    const ident = idx < 0 ? line : line.substring(0, idx)
    const rest = idx < 0 ? '' : line.substring(idx + 1)

    const descriptionAt = rest.startsWith('description=') ? 0 : rest.indexOf(' description=')
    const head = descriptionAt < 0 ? rest : rest.substring(0, descriptionAt)
    const description =
      descriptionAt < 0 ? '' : rest.substring(descriptionAt + (descriptionAt === 0 ? 0 : 1) + 'description='.length)

    return {
      backendDomain,
      ident,
      devclass,
      description,
      data: parseProperties(head),
    }
  })

/**
 * Parse admin.vm.device.<class>.List: `<backend>+<ident> [options]` per line
 */
export const parseAttachedDevices = (payload: string): DeviceRef[] => {
  const refs: DeviceRef[] = []
  for (const line of lines(payload)) {
    const [device = ''] = line.split(' ')
    const idx = device.indexOf('+')
    if (idx > 0 && idx < device.length - 1) {
      refs.push({ backendDomain: device.substring(0, idx), ident: device.substring(idx + 1) })
    }
  }
  return refs
}
