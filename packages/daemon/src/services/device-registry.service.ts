import type { Device, DeviceKey, Vm } from '@devices-widget/shared'
import { registryLogger } from '../utils/logger'

/**
 * In-memory view of the tracked devices and running VMs
 *
 * Pure data, no I/O. Every mutation is a no-op when its target is absent so
 * that stale and duplicated events can be applied blindly; mutators return
 * whether anything changed.
 */
export class DeviceRegistry {
  private devices = new Map<DeviceKey, Device>()
  private vms = new Map<string, Vm>()

  /**
   * Insert a device, replacing any device with the same key
   */
  upsertDevice(device: Device): void {
    this.devices.set(device.key, device)
  }

  removeDevice(key: DeviceKey): Device | undefined {
    const device = this.devices.get(key)
    if (device) {
      this.devices.delete(key)
    }
    return device
  }

  getDevice(key: DeviceKey): Device | undefined {
    return this.devices.get(key)
  }

  hasDevice(key: DeviceKey): boolean {
    return this.devices.has(key)
  }

  allDevices(): IterableIterator<Device> {
    return this.devices.values()
  }

  /**
   * Devices exposed by a backend VM
   */
  devicesOf(backendDomain: string): Device[] {
    const result: Device[] = []
    for (const device of this.devices.values()) {
      if (device.backendDomain === backendDomain) {
        result.push(device)
      }
    }
    return result
  }

  get deviceCount(): number {
    return this.devices.size
  }

  addVm(vm: Vm): void {
    this.vms.set(vm.name, vm)
  }

  /**
   * Forget a VM and prune it from every device's attachments
   */
  removeVm(name: string): boolean {
    const known = this.vms.delete(name)
    let pruned = 0
    for (const device of this.devices.values()) {
      if (device.attachments.delete(name)) {
        pruned++
      }
    }
    if (pruned > 0) {
      registryLogger.debug({ vm: name, pruned }, 'Pruned attachments of removed VM')
    }
    return known || pruned > 0
  }

  getVm(name: string): Vm | undefined {
    return this.vms.get(name)
  }

  hasVm(name: string): boolean {
    return this.vms.has(name)
  }

  /**
   * VMs ordered by name, for presentation
   */
  sortedVms(): Vm[] {
    return [...this.vms.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  attach(key: DeviceKey, vm: string): boolean {
    const device = this.devices.get(key)
    if (!device || device.attachments.has(vm)) {
      return false
    }
    device.attachments.add(vm)
    return true
  }

  detach(key: DeviceKey, vm: string): boolean {
    return this.devices.get(key)?.attachments.delete(vm) ?? false
  }

  /**
   * Overwrite the attachments of a device with a freshly read set
   */
  replaceAttachments(key: DeviceKey, vms: Iterable<string>): boolean {
    const device = this.devices.get(key)
    if (!device) {
      return false
    }
    device.attachments = new Set(vms)
    return true
  }

  setVmIcon(name: string, icon: string): boolean {
    const vm = this.vms.get(name)
    if (!vm) {
      return false
    }
    vm.icon = icon
    return true
  }

  /**
   * Update the backend icon of every device exposed by a VM
   */
  setBackendIcon(backendDomain: string, icon: string): number {
    let updated = 0
    for (const device of this.devices.values()) {
      if (device.backendDomain === backendDomain) {
        device.vmIcon = icon
        updated++
      }
    }
    return updated
  }
}
