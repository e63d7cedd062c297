import type { AdminEvent, DevClass, DeviceRef, NotificationRequest } from '@devices-widget/shared'

/**
 * Device as listed by the admin API
 */
export interface DeviceInfo extends DeviceRef {
  devclass: string
  description: string
  data: Record<string, string>
}

/**
 * Read-only handle on one VM
 *
 * Every query may fail with a QubesException: the VM can disappear between
 * calls and the caller may not be allowed to see it.
 */
export interface AdminVm {
  readonly name: string
  /** VM class, e.g. AppVM or AdminVM */
  readonly klass: string
  isRunning(): Promise<boolean>
  /** Icon of the VM label */
  labelIcon(): Promise<string>
  /** Devices of a class exposed by this VM */
  listDevices(devclass: DevClass): Promise<DeviceInfo[]>
  /** Devices of a class currently attached to this VM */
  listAttached(devclass: DevClass): Promise<DeviceRef[]>
}

/**
 * Administration directory: every VM known to the host
 */
export interface AdminDirectory {
  listVms(): Promise<AdminVm[]>
  /** Handle on a VM by name, without checking that it exists */
  vm(name: string): AdminVm
}

/**
 * Privileged attach/detach calls
 *
 * Success is not reflected synchronously: it surfaces later as
 * device-attach/device-detach events.
 */
export interface AttachmentApi {
  attach(vm: string, devclass: DevClass, device: DeviceRef, options: { persistent: boolean }): Promise<void>
  detach(vm: string, devclass: DevClass, device: DeviceRef): Promise<void>
}

/**
 * Sink for user notifications
 */
export interface NotificationSink {
  notify(request: NotificationRequest): Promise<void>
}

/**
 * Opens the admin event stream
 */
export type EventSource = () => AsyncIterable<AdminEvent>
