import type { DeviceKey } from '@devices-widget/shared'
import type { AdminDirectory, AttachmentApi, NotificationSink } from './admin/admin.types'
import { EventsDispatcher } from './events/events-dispatcher'
import { AttachmentCoordinator, type ToggleResult } from './services/attachment-coordinator.service'
import { buildDeviceMenu, type DeviceMenuSection } from './services/device-menu.service'
import { DeviceNotifier } from './services/device-notifier.service'
import { DeviceRegistry } from './services/device-registry.service'
import { EventReconciler } from './services/event-reconciler.service'
import { SnapshotLoader, type SnapshotSummary } from './services/snapshot-loader.service'

export interface DevicesTrayOptions {
  directory: AdminDirectory
  attachments: AttachmentApi
  sink: NotificationSink
  dispatcher?: EventsDispatcher
  debounceMs?: number
}

/**
 * Devices tray
 *
 * Wires the registry, reconciler, notifier and coordinator together and
 * registers the reconciler on the events dispatcher.
 */
export class DevicesTray {
  readonly registry = new DeviceRegistry()
  readonly dispatcher: EventsDispatcher
  readonly reconciler: EventReconciler
  readonly notifier: DeviceNotifier
  readonly coordinator: AttachmentCoordinator
  private readonly loader: SnapshotLoader
  private unsubscribe: (() => void) | null = null

  constructor(options: DevicesTrayOptions) {
    this.dispatcher = options.dispatcher ?? new EventsDispatcher()
    this.loader = new SnapshotLoader(options.directory)
    this.reconciler = new EventReconciler(this.registry, options.directory)
    this.notifier = new DeviceNotifier(options.sink, options.debounceMs)
    this.coordinator = new AttachmentCoordinator(this.registry, options.directory, options.attachments, options.sink)
  }

  /**
   * Load the initial snapshot, then start reconciling events
   */
  async initialize(): Promise<SnapshotSummary> {
    const { summary } = await this.loader.load(this.registry)
    this.reconciler.register(this.dispatcher)
    this.unsubscribe = this.notifier.subscribe(this.reconciler)
    return summary
  }

  toggle(key: DeviceKey, vm: string): Promise<ToggleResult> {
    return this.coordinator.toggle(key, vm)
  }

  menu(): DeviceMenuSection[] {
    return buildDeviceMenu(this.registry)
  }

  dispose(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
    this.notifier.dispose()
  }
}
