/**
 * @devices-widget/shared
 * Shared types, schemas, and constants for the devices widget
 */

// Export all device types
export type {
  DevClass,
  DeviceKey,
  DeviceRef,
  Device,
  Vm,
  DeviceDelta,
  AttachmentChange,
  AttachmentState,
} from './types/device.types'

// Export all event types
export type {
  AdminEvent,
  AdminEventHandler,
} from './types/events.types'

// Export all notification types
export type {
  NotificationPriority,
  ChangeDirection,
  NotificationRequest,
} from './types/notification.types'

// Export all schemas
export {
  vmNameSchema,
  adminEventSchema,
} from './schemas/admin-event.schema'

// Export all constants
export {
  DEV_CLASSES,
  DEV_CLASS_NAMES,
  ADMIN_VM_CLASS,
  DEFAULT_VM_ICON,
  UNKNOWN_DESCRIPTION,
  NOTIFICATION_DEBOUNCE_MS,
  ADMIN_EVENTS,
} from './constants'

// Export device key helpers
export {
  deviceKey,
  parseDeviceRef,
  isDevClass,
} from './utils/device-key'
