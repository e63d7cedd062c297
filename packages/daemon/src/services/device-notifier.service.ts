import type { ChangeDirection, Device, DeviceKey, NotificationRequest } from '@devices-widget/shared'
import { NOTIFICATION_DEBOUNCE_MS } from '@devices-widget/shared'
import type { NotificationSink } from '../admin/admin.types'
import { errorMessage } from '../errors/admin.errors'
import { notifierLogger } from '../utils/logger'
import type { EventReconciler } from './event-reconciler.service'

const TITLES: Record<ChangeDirection, (vm: string) => string> = {
  added: (vm) => `Devices added on ${vm}`,
  removed: (vm) => `Devices removed on ${vm}`,
}

/**
 * Notification identity for a direction and VM
 */
export const notificationId = (direction: ChangeDirection, vm: string): string =>
  `device-${direction}-${vm}`

/**
 * Debounce Notifier
 *
 * Batches device changes per VM and direction. Each inserted device stays in
 * its buffer for one debounce window; every insertion re-posts the whole
 * buffer under the same identity so the sink replaces the previous
 * notification. Eviction is silent.
 */
export class DeviceNotifier {
  private buffers: Record<ChangeDirection, Map<string, Device[]>> = {
    added: new Map(),
    removed: new Map(),
  }
  private timers = new Map<string, NodeJS.Timeout>()

  constructor(
    private readonly sink: NotificationSink,
    private readonly debounceMs: number = NOTIFICATION_DEBOUNCE_MS
  ) {}

  /**
   * Feed the notifier from the reconciler's deltas
   */
  subscribe(reconciler: EventReconciler): () => void {
    const unsubscribers = [
      reconciler.on('devices-changed', (delta) => {
        this.devicesAdded(delta.vm, delta.added)
        this.devicesRemoved(delta.vm, delta.removed)
      }),
      reconciler.on('attachments-changed', (change) => {
        if (change.attached) {
          this.devicesAdded(change.vm, [change.device])
        } else {
          this.devicesRemoved(change.vm, [change.device])
        }
      }),
    ]
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe())
  }

  devicesAdded(vm: string, devices: Device[]): void {
    this.insert('added', vm, devices)
  }

  devicesRemoved(vm: string, devices: Device[]): void {
    this.insert('removed', vm, devices)
  }

  /**
   * Devices currently buffered for a VM and direction
   */
  pending(direction: ChangeDirection, vm: string): Device[] {
    return [...(this.buffers[direction].get(vm) ?? [])]
  }

  /**
   * Cancel every expiry timer and drop all buffers
   */
  dispose(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
    this.buffers.added.clear()
    this.buffers.removed.clear()
  }

  private insert(direction: ChangeDirection, vm: string, devices: Device[]): void {
    if (devices.length === 0) {
      return
    }

    let buffer = this.buffers[direction].get(vm)
    if (!buffer) {
      buffer = []
      this.buffers[direction].set(vm, buffer)
    }

    for (const device of devices) {
      if (buffer.some((known) => known.key === device.key)) {
        continue
      }
      buffer.push(device)
      const timerKey = this.timerKey(direction, vm, device.key)
      this.timers.set(
        timerKey,
        setTimeout(() => this.evict(direction, vm, device.key), this.debounceMs)
      )
    }

    this.post(direction, vm, buffer)
  }

  private evict(direction: ChangeDirection, vm: string, key: DeviceKey): void {
    this.timers.delete(this.timerKey(direction, vm, key))
    const buffer = this.buffers[direction].get(vm)
    if (!buffer) {
      return
    }
    const idx = buffer.findIndex((device) => device.key === key)
    if (idx >= 0) {
      buffer.splice(idx, 1)
    }
    if (buffer.length === 0) {
      this.buffers[direction].delete(vm)
    }
  }

  private post(direction: ChangeDirection, vm: string, buffer: Device[]): void {
    const body = buffer
      .map((device) => device.description)
      .sort()
      .join('\n')
    const request: NotificationRequest = {
      id: notificationId(direction, vm),
      title: TITLES[direction](vm),
      body,
      priority: 'low',
      error: false,
    }
    this.sink.notify(request).catch((error: unknown) => {
      notifierLogger.warn({ id: request.id, error: errorMessage(error) }, 'Failed to post notification')
    })
  }

  private timerKey(direction: ChangeDirection, vm: string, key: DeviceKey): string {
    return `${direction}\0${vm}\0${key}`
  }
}
