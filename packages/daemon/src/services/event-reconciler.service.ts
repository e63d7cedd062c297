import { EventEmitter } from 'events'
import type { AdminEvent, AttachmentChange, DevClass, Device, DeviceDelta, DeviceRef } from '@devices-widget/shared'
import { ADMIN_EVENTS, DEV_CLASSES, deviceKey, isDevClass, parseDeviceRef } from '@devices-widget/shared'
import type { AdminDirectory, DeviceInfo } from '../admin/admin.types'
import { isAdminError } from '../errors/admin.errors'
import type { EventsDispatcher } from '../events/events-dispatcher'
import { reconcilerLogger } from '../utils/logger'
import { createDevice, createVm, resolveIcon } from '../utils/device'
import type { DeviceRegistry } from './device-registry.service'

/**
 * Events published by the reconciler
 */
export interface ReconcilerEvents {
  /** Devices appeared on or vanished from a backend VM */
  'devices-changed': (delta: DeviceDelta) => void
  /** A device was attached to or detached from a VM */
  'attachments-changed': (change: AttachmentChange) => void
  /** The set of tracked VMs or their icons changed */
  'vms-changed': () => void
}

/**
 * Event Reconciler
 *
 * Applies the live admin event stream to the registry. The event source races
 * with administrative state, so every handler re-reads what it needs and
 * treats a VM that vanished or became unreadable mid-query as expected.
 * Admin errors are absorbed here; anything else propagates to the dispatcher.
 *
 * Registry mutations happen after the last await of each handler, so a
 * handler never leaves the registry half-updated.
 */
export class EventReconciler {
  private readonly emitter = new EventEmitter()

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly directory: AdminDirectory
  ) {}

  /**
   * Subscribe to reconciler events; returns the unsubscribe function
   */
  on<K extends keyof ReconcilerEvents>(event: K, listener: ReconcilerEvents[K]): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  private emit<K extends keyof ReconcilerEvents>(event: K, ...args: Parameters<ReconcilerEvents[K]>): void {
    this.emitter.emit(event, ...args)
  }

  /**
   * Register every handler on the dispatcher
   */
  register(dispatcher: EventsDispatcher): void {
    for (const devclass of DEV_CLASSES) {
      dispatcher.addHandler(`${ADMIN_EVENTS.DEVICE.ATTACH}:${devclass}`, (event) =>
        this.onDeviceEvent(event, devclass, true)
      )
      dispatcher.addHandler(`${ADMIN_EVENTS.DEVICE.DETACH}:${devclass}`, (event) =>
        this.onDeviceEvent(event, devclass, false)
      )
      dispatcher.addHandler(`${ADMIN_EVENTS.DEVICE.LIST_CHANGE}:${devclass}`, async (event) => {
        if (event.subject) {
          await this.deviceListChanged(event.subject)
        }
      })
    }

    const shutdown = (event: AdminEvent): void => {
      if (event.subject) {
        this.vmShutdown(event.subject)
      }
    }
    dispatcher.addHandler(ADMIN_EVENTS.DOMAIN.SHUTDOWN, shutdown)
    dispatcher.addHandler(ADMIN_EVENTS.DOMAIN.START_FAILED, shutdown)
    dispatcher.addHandler(ADMIN_EVENTS.DOMAIN.START, async (event) => {
      if (event.subject) {
        await this.vmStarted(event.subject)
      }
    })
    dispatcher.addHandler(ADMIN_EVENTS.PROPERTY.LABEL, (event) => this.labelChanged(event.subject))
  }

  private async onDeviceEvent(event: AdminEvent, devclass: DevClass, attached: boolean): Promise<void> {
    const ref = parseDeviceRef(event.kwargs['device'] ?? '')
    if (!event.subject || !ref) {
      reconcilerLogger.warn({ event: event.event, subject: event.subject, kwargs: event.kwargs }, 'Malformed device event ignored')
      return
    }
    if (attached) {
      await this.deviceAttached(event.subject, devclass, ref)
    } else {
      await this.deviceDetached(event.subject, ref)
    }
  }

  /**
   * Full refresh of the devices exposed by a VM
   *
   * Re-reads every class, not only the one that signalled. An admin failure
   * means the VM is gone and exposes nothing.
   */
  async deviceListChanged(vmName: string): Promise<DeviceDelta> {
    const adminVm = this.directory.vm(vmName)
    const fetched = new Map<string, Device>()

    try {
      const icon = this.registry.getVm(vmName)?.icon ?? (await resolveIcon(adminVm))
      for (const devclass of DEV_CLASSES) {
        for (const info of await adminVm.listDevices(devclass)) {
          const device = createDevice(info, devclass, icon)
          fetched.set(device.key, device)
        }
      }
    } catch (error) {
      if (!isAdminError(error)) throw error
      reconcilerLogger.debug({ vm: vmName, error: error.message }, 'VM devices unreadable, treating as empty')
      fetched.clear()
    }

    const added = [...fetched.values()].filter((device) => !this.registry.hasDevice(device.key))
    const removed = this.registry.devicesOf(vmName).filter((device) => !fetched.has(device.key))

    for (const device of added) {
      this.registry.upsertDevice(device)
    }
    for (const device of removed) {
      this.registry.removeDevice(device.key)
    }

    const delta: DeviceDelta = { vm: vmName, added, removed }
    if (added.length > 0 || removed.length > 0) {
      reconcilerLogger.info(
        { vm: vmName, added: added.map((d) => d.key), removed: removed.map((d) => d.key) },
        'Device list changed'
      )
      this.emit('devices-changed', delta)
    }
    return delta
  }

  /**
   * Record that a device was attached to a running VM
   */
  async deviceAttached(vmName: string, devclass: string, ref: DeviceRef): Promise<boolean> {
    if (!isDevClass(devclass) || !(await this.isRunning(vmName))) {
      return false
    }

    const key = deviceKey(ref.backendDomain, ref.ident)
    if (!this.registry.hasDevice(key)) {
      const info = await this.describe(ref, devclass)
      const icon = this.registry.getVm(ref.backendDomain)?.icon ?? (await resolveIcon(this.directory.vm(ref.backendDomain)))
      // the device may have been learned while we were reading
      if (!this.registry.hasDevice(key)) {
        this.registry.upsertDevice(createDevice(info, devclass, icon))
      }
    }

    const changed = this.registry.attach(key, vmName)
    const device = this.registry.getDevice(key)
    if (changed && device) {
      reconcilerLogger.info({ vm: vmName, device: key }, 'Device attached')
      this.emit('attachments-changed', { vm: vmName, device, attached: true })
    }
    return changed
  }

  /**
   * Clear an attachment; unknown devices are ignored
   */
  async deviceDetached(vmName: string, ref: DeviceRef): Promise<boolean> {
    if (!(await this.isRunning(vmName))) {
      return false
    }

    const key = deviceKey(ref.backendDomain, ref.ident)
    const changed = this.registry.detach(key, vmName)
    const device = this.registry.getDevice(key)
    if (changed && device) {
      reconcilerLogger.info({ vm: vmName, device: key }, 'Device detached')
      this.emit('attachments-changed', { vm: vmName, device, attached: false })
    }
    return changed
  }

  /**
   * Forget a VM that shut down or failed to start
   */
  vmShutdown(vmName: string): void {
    if (this.registry.removeVm(vmName)) {
      reconcilerLogger.info({ vm: vmName }, 'VM stopped')
      this.emit('vms-changed')
    }
  }

  /**
   * Track a started VM and re-derive its attachments
   */
  async vmStarted(vmName: string): Promise<void> {
    const adminVm = this.directory.vm(vmName)
    const vm = await createVm(adminVm)
    const attached: string[] = []

    for (const devclass of DEV_CLASSES) {
      try {
        for (const ref of await adminVm.listAttached(devclass)) {
          attached.push(deviceKey(ref.backendDomain, ref.ident))
        }
      } catch (error) {
        if (!isAdminError(error)) throw error
        reconcilerLogger.debug({ vm: vmName, devclass, error: error.message }, 'No access to VM attachments')
      }
    }

    this.registry.addVm(vm)
    for (const key of attached) {
      this.registry.attach(key, vmName)
    }
    reconcilerLogger.info({ vm: vmName, attachments: attached.length }, 'VM started')
    this.emit('vms-changed')
  }

  /**
   * Refresh the icon of a VM and of the devices it exposes
   */
  async labelChanged(vmName: string | null): Promise<void> {
    // global properties changed
    if (!vmName) {
      return
    }
    if (!this.registry.hasVm(vmName) && this.registry.devicesOf(vmName).length === 0) {
      return
    }

    const icon = await resolveIcon(this.directory.vm(vmName))
    this.registry.setVmIcon(vmName, icon)
    this.registry.setBackendIcon(vmName, icon)
    reconcilerLogger.debug({ vm: vmName, icon }, 'VM label changed')
    this.emit('vms-changed')
  }

  private async isRunning(vmName: string): Promise<boolean> {
    try {
      return await this.directory.vm(vmName).isRunning()
    } catch (error) {
      if (!isAdminError(error)) throw error
      // no access to the VM state
      reconcilerLogger.debug({ vm: vmName, error: error.message }, 'VM state unreadable, event ignored')
      return false
    }
  }

  /**
   * Look a device up in its backend's listing
   */
  private async describe(ref: DeviceRef, devclass: DevClass): Promise<DeviceInfo> {
    const fallback: DeviceInfo = { ...ref, devclass, description: '', data: {} }
    try {
      const devices = await this.directory.vm(ref.backendDomain).listDevices(devclass)
      return devices.find((info) => info.ident === ref.ident) ?? fallback
    } catch (error) {
      if (!isAdminError(error)) throw error
      return fallback
    }
  }
}
