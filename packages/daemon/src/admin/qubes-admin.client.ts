import type { DevClass, DeviceRef } from '@devices-widget/shared'
import { adminLogger } from '../utils/logger'
import type { AdminDirectory, AdminVm, AttachmentApi, DeviceInfo, EventSource } from './admin.types'
import {
  parseAttachedDevices,
  parseAvailableDevices,
  parseLabelIcon,
  parsePowerState,
  parseResponse,
  parseVmList,
} from './admin-protocol'
import type { QrexecTransport } from './qrexec.transport'

/**
 * Handle on one VM, backed by admin API calls
 */
class QubesVm implements AdminVm {
  constructor(
    private readonly client: QubesAdminClient,
    readonly name: string,
    readonly klass: string = 'unknown'
  ) {}

  async isRunning(): Promise<boolean> {
    const state = parsePowerState(await this.client.call(this.name, 'admin.vm.CurrentState'))
    return state !== 'Halted'
  }

  async labelIcon(): Promise<string> {
    return parseLabelIcon(await this.client.call(this.name, 'admin.vm.property.Get', 'label'))
  }

  async listDevices(devclass: DevClass): Promise<DeviceInfo[]> {
    const payload = await this.client.call(this.name, `admin.vm.device.${devclass}.Available`)
    return parseAvailableDevices(payload, this.name, devclass)
  }

  async listAttached(devclass: DevClass): Promise<DeviceRef[]> {
    return parseAttachedDevices(await this.client.call(this.name, `admin.vm.device.${devclass}.List`))
  }
}

/**
 * Admin API client
 *
 * Implements the administration directory, the attachment API and the event
 * source on top of a qrexec transport.
 */
export class QubesAdminClient implements AdminDirectory, AttachmentApi {
  constructor(
    private readonly transport: QrexecTransport,
    private readonly target: string = 'dom0'
  ) {}

  /**
   * Run one admin call and decode its response
   */
  async call(dest: string, method: string, arg = '', payload = ''): Promise<string> {
    const response = await this.transport.call(dest, method, arg, payload)
    return parseResponse(response)
  }

  async listVms(): Promise<AdminVm[]> {
    const entries = parseVmList(await this.call(this.target, 'admin.vm.List'))
    return entries.map((entry) => new QubesVm(this, entry.name, entry.klass))
  }

  vm(name: string): AdminVm {
    return new QubesVm(this, name)
  }

  async attach(vm: string, devclass: DevClass, device: DeviceRef, options: { persistent: boolean }): Promise<void> {
    adminLogger.debug({ vm, devclass, device, options }, 'Attaching device')
    await this.call(
      vm,
      `admin.vm.device.${devclass}.Attach`,
      `${device.backendDomain}+${device.ident}`,
      `persistent=${options.persistent ? 'True' : 'False'}`
    )
  }

  async detach(vm: string, devclass: DevClass, device: DeviceRef): Promise<void> {
    adminLogger.debug({ vm, devclass, device }, 'Detaching device')
    await this.call(vm, `admin.vm.device.${devclass}.Detach`, `${device.backendDomain}+${device.ident}`)
  }

  /**
   * Event source over admin.Events
   */
  eventSource(signal?: AbortSignal): EventSource {
    return () => this.transport.events(this.target, signal)
  }
}
