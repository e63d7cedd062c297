import { ADMIN_VM_CLASS, DEFAULT_VM_ICON, DEV_CLASSES, deviceKey } from '@devices-widget/shared'
import type { AdminDirectory, AdminVm } from '../admin/admin.types'
import { isAdminError } from '../errors/admin.errors'
import { snapshotLogger } from '../utils/logger'
import { createDevice, createVm } from '../utils/device'
import { DeviceRegistry } from './device-registry.service'

/**
 * Summary of a snapshot load
 */
export interface SnapshotSummary {
  vms: number
  devices: number
  attachments: number
  /** VMs whose state could not be read */
  skippedVms: string[]
}

/**
 * Builds the initial registry from one enumeration of the admin directory
 *
 * Partial visibility is a steady state: a VM we may not inspect simply
 * contributes nothing.
 */
export class SnapshotLoader {
  constructor(private readonly directory: AdminDirectory) {}

  async load(registry: DeviceRegistry = new DeviceRegistry()): Promise<{ registry: DeviceRegistry; summary: SnapshotSummary }> {
    const summary: SnapshotSummary = { vms: 0, devices: 0, attachments: 0, skippedVms: [] }
    const tracked: AdminVm[] = []

    for (const vm of await this.directory.listVms()) {
      try {
        if (vm.klass !== ADMIN_VM_CLASS && (await vm.isRunning())) {
          tracked.push(vm)
        }
      } catch (error) {
        if (!isAdminError(error)) throw error
        // no access to the VM state
        snapshotLogger.debug({ vm: vm.name, error: error.message }, 'Skipping VM with unreadable state')
        summary.skippedVms.push(vm.name)
      }
    }

    for (const vm of tracked) {
      registry.addVm(await createVm(vm))
      summary.vms++
    }

    for (const vm of tracked) {
      const icon = registry.getVm(vm.name)?.icon ?? DEFAULT_VM_ICON
      for (const devclass of DEV_CLASSES) {
        try {
          const devices = await vm.listDevices(devclass)
          for (const info of devices) {
            registry.upsertDevice(createDevice(info, devclass, icon))
            summary.devices++
          }
        } catch (error) {
          if (!isAdminError(error)) throw error
          snapshotLogger.debug({ vm: vm.name, devclass, error: error.message }, 'No access to VM devices')
        }
      }
    }

    for (const vm of tracked) {
      for (const devclass of DEV_CLASSES) {
        try {
          for (const ref of await vm.listAttached(devclass)) {
            // ghost entries remain when a device was removed while attached
            if (registry.attach(deviceKey(ref.backendDomain, ref.ident), vm.name)) {
              summary.attachments++
            }
          }
        } catch (error) {
          if (!isAdminError(error)) throw error
          snapshotLogger.debug({ vm: vm.name, devclass, error: error.message }, 'No access to VM attachments')
        }
      }
    }

    snapshotLogger.info(summary, 'Device snapshot loaded')
    return { registry, summary }
  }
}
