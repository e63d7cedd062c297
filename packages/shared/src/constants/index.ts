import type { DevClass } from '../types/device.types'

/**
 * Device classes tracked by the widget, in menu order
 */
export const DEV_CLASSES: readonly DevClass[] = ['block', 'usb', 'mic'] as const

/**
 * Menu header for each device class
 */
export const DEV_CLASS_NAMES: Record<DevClass, string> = {
  block: 'Data (Block) Devices',
  usb: 'USB Devices',
  mic: 'Audio Input',
}

/**
 * Class of the administrative VM, never tracked
 */
export const ADMIN_VM_CLASS = 'AdminVM'

/**
 * Icon used when a VM label cannot be read
 */
export const DEFAULT_VM_ICON = 'appvm-black'

/**
 * Description used when a device cannot be described
 */
export const UNKNOWN_DESCRIPTION = 'unknown'

/**
 * How long a device stays in a "recently changed" notification
 * @default 5 seconds
 */
export const NOTIFICATION_DEBOUNCE_MS = 5000

/**
 * Admin event kinds handled by the widget
 */
export const ADMIN_EVENTS = {
  DEVICE: {
    ATTACH: 'device-attach',
    DETACH: 'device-detach',
    LIST_CHANGE: 'device-list-change',
  },
  DOMAIN: {
    START: 'domain-start',
    START_FAILED: 'domain-start-failed',
    SHUTDOWN: 'domain-shutdown',
  },
  PROPERTY: {
    LABEL: 'property-set:label',
  },
} as const
