/**
 * In-process stand-ins for the admin directory, attachment API and
 * notification sink
 */

import type { DevClass, DeviceRef, NotificationRequest } from '@devices-widget/shared';
import type { AdminDirectory, AdminVm, AttachmentApi, DeviceInfo, NotificationSink } from '../admin/admin.types';
import { QubesDaemonAccessError, QubesVMNotFoundError } from '../errors/admin.errors';

type Query = 'isRunning' | 'labelIcon' | `listDevices:${DevClass}` | `listAttached:${DevClass}`;

export const deviceInfo = (
  backendDomain: string,
  ident: string,
  description: string,
  devclass: DevClass = 'usb'
): DeviceInfo => ({ backendDomain, ident, description, devclass, data: {} });

export class FakeVm implements AdminVm {
  running = true;
  icon = 'appvm-green';
  devices: Record<DevClass, DeviceInfo[]> = { block: [], usb: [], mic: [] };
  attached: Record<DevClass, DeviceRef[]> = { block: [], usb: [], mic: [] };
  /** Queries answered with an access error */
  denied = new Set<Query>();

  constructor(
    readonly name: string,
    readonly klass: string = 'AppVM'
  ) {}

  private check(query: Query): void {
    if (this.denied.has(query)) {
      throw new QubesDaemonAccessError();
    }
  }

  async isRunning(): Promise<boolean> {
    this.check('isRunning');
    return this.running;
  }

  async labelIcon(): Promise<string> {
    this.check('labelIcon');
    return this.icon;
  }

  async listDevices(devclass: DevClass): Promise<DeviceInfo[]> {
    this.check(`listDevices:${devclass}`);
    return [...this.devices[devclass]];
  }

  async listAttached(devclass: DevClass): Promise<DeviceRef[]> {
    this.check(`listAttached:${devclass}`);
    return [...this.attached[devclass]];
  }
}

/**
 * Handle on a VM that does not exist
 */
class MissingVm implements AdminVm {
  readonly klass = 'unknown';

  constructor(readonly name: string) {}

  private fail(): never {
    throw new QubesVMNotFoundError(`No such domain: '${this.name}'`);
  }

  async isRunning(): Promise<boolean> {
    return this.fail();
  }

  async labelIcon(): Promise<string> {
    return this.fail();
  }

  async listDevices(): Promise<DeviceInfo[]> {
    return this.fail();
  }

  async listAttached(): Promise<DeviceRef[]> {
    return this.fail();
  }
}

export class FakeDirectory implements AdminDirectory {
  vms = new Map<string, FakeVm>();

  add(name: string, klass = 'AppVM'): FakeVm {
    const vm = new FakeVm(name, klass);
    this.vms.set(name, vm);
    return vm;
  }

  async listVms(): Promise<AdminVm[]> {
    return [...this.vms.values()];
  }

  vm(name: string): AdminVm {
    return this.vms.get(name) ?? new MissingVm(name);
  }
}

export interface AttachmentCall {
  operation: 'attach' | 'detach';
  vm: string;
  device: string;
  persistent?: boolean;
}

export class FakeAttachmentApi implements AttachmentApi {
  calls: AttachmentCall[] = [];
  /** Failures keyed by `<operation>:<vm>` */
  failures = new Map<string, Error>();

  async attach(vm: string, _devclass: DevClass, device: DeviceRef, options: { persistent: boolean }): Promise<void> {
    this.calls.push({ operation: 'attach', vm, device: `${device.backendDomain}:${device.ident}`, persistent: options.persistent });
    const failure = this.failures.get(`attach:${vm}`);
    if (failure) {
      throw failure;
    }
  }

  async detach(vm: string, _devclass: DevClass, device: DeviceRef): Promise<void> {
    this.calls.push({ operation: 'detach', vm, device: `${device.backendDomain}:${device.ident}` });
    const failure = this.failures.get(`detach:${vm}`);
    if (failure) {
      throw failure;
    }
  }
}

export class FakeSink implements NotificationSink {
  notifications: NotificationRequest[] = [];

  async notify(request: NotificationRequest): Promise<void> {
    this.notifications.push(request);
  }

  last(): NotificationRequest | undefined {
    return this.notifications[this.notifications.length - 1];
  }
}
