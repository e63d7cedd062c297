/**
 * Device and VM types shared by the daemon and its consumers
 */

/**
 * Device classes the widget tracks
 */
export type DevClass = 'block' | 'usb' | 'mic'

/**
 * Canonical device identity: `<backendDomain>:<ident>`
 */
export type DeviceKey = string

/**
 * Reference to a device as carried by events and the admin API
 */
export interface DeviceRef {
  /** Name of the VM exposing the device */
  backendDomain: string
  /** Identifier of the device inside its backend VM (e.g. 2-1, sda) */
  ident: string
}

/**
 * A device known to the registry
 */
export interface Device extends DeviceRef {
  readonly key: DeviceKey
  description: string
  devclass: DevClass
  data: Record<string, string>
  /** Names of the VMs the device is attached to */
  attachments: Set<string>
  /** Icon of the backend VM */
  vmIcon: string
}

/**
 * A running, non-administrative VM
 */
export interface Vm {
  readonly name: string
  icon: string
}

/**
 * Change of the device set exposed by one VM
 */
export interface DeviceDelta {
  vm: string
  added: Device[]
  removed: Device[]
}

/**
 * Change of a single attachment
 */
export interface AttachmentChange {
  /** VM the device was attached to or detached from */
  vm: string
  device: Device
  attached: boolean
}

/**
 * Attachment state of a device, as seen by the attach/detach coordinator
 */
export type AttachmentState =
  | { status: 'detached' }
  | { status: 'attached'; vms: string[] }
  | { status: 'transitioning' }
