import type { AttachmentState, Device, DeviceKey } from '@devices-widget/shared'
import type { AdminDirectory, AdminVm, AttachmentApi, NotificationSink } from '../admin/admin.types'
import { errorMessage, isAdminError } from '../errors/admin.errors'
import { coordinatorLogger } from '../utils/logger'
import type { DeviceRegistry } from './device-registry.service'

/**
 * Outcome of a toggle
 */
export type ToggleResult =
  | { status: 'attach-requested'; vm: string }
  | { status: 'detached' }
  | { status: 'failed'; vm: string; operation: 'attach' | 'detach'; error: string }
  | { status: 'rejected'; reason: string }

/**
 * Attach/Detach Coordinator
 *
 * Turns a user's toggle into detach/attach calls. Success leaves the registry
 * alone: the matching device events update it. Only a failed call, after
 * which local state may disagree with reality, triggers a resync.
 */
export class AttachmentCoordinator {
  private inFlight = new Map<DeviceKey, Promise<ToggleResult>>()

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly directory: AdminDirectory,
    private readonly api: AttachmentApi,
    private readonly sink: NotificationSink
  ) {}

  /**
   * Current state of a device
   */
  state(key: DeviceKey): AttachmentState | undefined {
    if (this.inFlight.has(key)) {
      return { status: 'transitioning' }
    }
    const device = this.registry.getDevice(key)
    if (!device) {
      return undefined
    }
    return device.attachments.size > 0
      ? { status: 'attached', vms: [...device.attachments].sort() }
      : { status: 'detached' }
  }

  /**
   * Toggle the attachment of a device to a VM
   *
   * Detaches the device from every VM first; attaches it to the target unless
   * it was already attached there. Toggles of the same device run one after
   * the other.
   */
  toggle(key: DeviceKey, targetVm: string): Promise<ToggleResult> {
    const previous = this.inFlight.get(key) ?? Promise.resolve<ToggleResult>({ status: 'detached' })
    const next = previous
      .catch(() => undefined)
      .then(() => this.runToggle(key, targetVm))
      .finally(() => {
        if (this.inFlight.get(key) === next) {
          this.inFlight.delete(key)
        }
      })
    this.inFlight.set(key, next)
    return next
  }

  private async runToggle(key: DeviceKey, targetVm: string): Promise<ToggleResult> {
    const device = this.registry.getDevice(key)
    if (!device) {
      coordinatorLogger.warn({ device: key, vm: targetVm }, 'Toggle of unknown device rejected')
      return { status: 'rejected', reason: `Unknown device ${key}` }
    }
    if (device.backendDomain === targetVm) {
      coordinatorLogger.warn({ device: key, vm: targetVm }, 'Toggle to backend VM rejected')
      return { status: 'rejected', reason: `${key} is exposed by ${targetVm}` }
    }

    const attach = !device.attachments.has(targetVm)

    const detachFailure = await this.detachAll(device)
    if (detachFailure) {
      return detachFailure
    }
    if (!attach) {
      return { status: 'detached' }
    }

    try {
      await this.api.attach(targetVm, device.devclass, device, { persistent: false })
      coordinatorLogger.info({ device: key, vm: targetVm }, 'Attach requested')
      await this.notify(device, 'Attaching device', `Attaching ${device.description} to ${targetVm}`, false)
      return { status: 'attach-requested', vm: targetVm }
    } catch (error) {
      const message = this.describeError(error)
      coordinatorLogger.warn({ device: key, vm: targetVm, error: message }, 'Attach failed')
      await this.notify(
        device,
        'Error',
        `Attaching device ${device.description} to ${targetVm} failed. Error: ${message}`,
        true
      )
      await this.resync(device)
      return { status: 'failed', vm: targetVm, operation: 'attach', error: message }
    }
  }

  /**
   * Detach a device from every VM it is recorded on; stops at the first failure
   */
  private async detachAll(device: Device): Promise<ToggleResult | null> {
    for (const vm of [...device.attachments]) {
      await this.notify(device, 'Detaching device', `Detaching ${device.description} from ${vm}`, false)
      try {
        await this.api.detach(vm, device.devclass, device)
        coordinatorLogger.info({ device: device.key, vm }, 'Detach requested')
      } catch (error) {
        if (!isAdminError(error)) throw error
        coordinatorLogger.warn({ device: device.key, vm, error: error.message }, 'Detach failed')
        await this.notify(
          device,
          'Error',
          `Detaching device ${device.description} from ${vm} failed. Error: ${error.message}`,
          true
        )
        await this.resync(device)
        return { status: 'failed', vm, operation: 'detach', error: error.message }
      }
    }
    return null
  }

  /**
   * Re-read the attachments of a device from every VM
   *
   * Used only after a failed call, when the expected events may never come.
   */
  async resync(device: Device): Promise<Set<string>> {
    const attachments = new Set<string>()

    let vms: AdminVm[]
    try {
      vms = await this.directory.listVms()
    } catch (error) {
      if (!isAdminError(error)) throw error
      coordinatorLogger.error({ device: device.key, error: error.message }, 'Resync failed, VM list unreadable')
      return new Set(device.attachments)
    }

    for (const vm of vms) {
      try {
        const attached = await vm.listAttached(device.devclass)
        if (attached.some((ref) => ref.backendDomain === device.backendDomain && ref.ident === device.ident)) {
          attachments.add(vm.name)
        }
      } catch (error) {
        if (!isAdminError(error)) throw error
        coordinatorLogger.debug({ vm: vm.name, error: error.message }, 'No access to VM attachments')
      }
    }

    // attachments name only tracked VMs, as of now
    const tracked = new Set([...attachments].filter((name) => this.registry.hasVm(name)))
    this.registry.replaceAttachments(device.key, tracked)
    coordinatorLogger.info({ device: device.key, attachments: [...tracked] }, 'Device attachments resynchronized')
    return tracked
  }

  private describeError(error: unknown): string {
    return error instanceof Error ? `${error.name} - ${error.message}` : errorMessage(error)
  }

  private async notify(device: Device, title: string, body: string, error: boolean): Promise<void> {
    try {
      await this.sink.notify({
        id: `${device.backendDomain}${device.ident}`,
        title,
        body,
        priority: error ? 'high' : 'normal',
        error,
      })
    } catch (sinkError) {
      coordinatorLogger.warn({ device: device.key, error: errorMessage(sinkError) }, 'Failed to post notification')
    }
  }
}
