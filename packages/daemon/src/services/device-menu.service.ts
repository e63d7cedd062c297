import type { DevClass, DeviceKey } from '@devices-widget/shared'
import { DEV_CLASS_NAMES } from '@devices-widget/shared'
import type { DeviceRegistry } from './device-registry.service'

export interface DeviceMenuTarget {
  vm: string
  icon: string
  attached: boolean
}

export interface DeviceMenuItem {
  key: DeviceKey
  description: string
  backendDomain: string
  icon: string
  targets: DeviceMenuTarget[]
}

export interface DeviceMenuSection {
  devclass: DevClass
  header: string
  items: DeviceMenuItem[]
}

/**
 * Presentation data for the devices menu
 *
 * Devices are ordered by class then key and grouped under one header per
 * class. A device can be toggled on every tracked VM except its backend.
 */
export const buildDeviceMenu = (registry: DeviceRegistry): DeviceMenuSection[] => {
  const vms = registry.sortedVms()
  const devices = [...registry.allDevices()].sort((a, b) => {
    const left = a.devclass + a.key
    const right = b.devclass + b.key
    return left < right ? -1 : left > right ? 1 : 0
  })

  const sections: DeviceMenuSection[] = []
  for (const device of devices) {
    let section = sections[sections.length - 1]
    if (!section || section.devclass !== device.devclass) {
      section = { devclass: device.devclass, header: DEV_CLASS_NAMES[device.devclass], items: [] }
      sections.push(section)
    }
    section.items.push({
      key: device.key,
      description: device.description,
      backendDomain: device.backendDomain,
      icon: device.vmIcon,
      targets: vms
        .filter((vm) => vm.name !== device.backendDomain)
        .map((vm) => ({ vm: vm.name, icon: vm.icon, attached: device.attachments.has(vm.name) })),
    })
  }
  return sections
}
