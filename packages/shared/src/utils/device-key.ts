import type { DevClass, DeviceKey, DeviceRef } from '../types/device.types'
import { DEV_CLASSES } from '../constants'

/**
 * Build the canonical key of a device
 */
export const deviceKey = (backendDomain: string, ident: string): DeviceKey =>
  `${backendDomain}:${ident}`

/**
 * Parse a `<backend>:<ident>` reference
 *
 * VM names cannot contain a colon, so everything after the first one is the
 * ident. Returns null for malformed input.
 */
export const parseDeviceRef = (value: string): DeviceRef | null => {
  const idx = value.indexOf(':')
  if (idx <= 0 || idx === value.length - 1) {
    return null
  }
  return {
    backendDomain: value.substring(0, idx),
    ident: value.substring(idx + 1),
  }
}

/**
 * Narrow an arbitrary string to a tracked device class
 */
export const isDevClass = (value: string): value is DevClass =>
  DEV_CLASSES.some((devclass) => devclass === value)
