/**
 * Tests for the devices tray wiring
 *
 * Tests for:
 * - snapshot load on initialize
 * - detach events flowing from the dispatcher to the notifier
 * - device list changes flowing to the added buffer
 * - toggles leaving the registry to the events
 * - consuming an event stream
 */

import type { AdminEvent } from '@devices-widget/shared';
import { DevicesTray } from '../devices-tray';
import { FakeAttachmentApi, FakeDirectory, FakeSink, FakeVm, deviceInfo } from './fakes';

const event = (subject: string, kind: string, kwargs: Record<string, string> = {}): AdminEvent => ({
  subject,
  event: kind,
  kwargs,
});

describe('DevicesTray', () => {
  let directory: FakeDirectory;
  let sysUsb: FakeVm;
  let work: FakeVm;
  let attachments: FakeAttachmentApi;
  let sink: FakeSink;
  let tray: DevicesTray;

  beforeEach(async () => {
    jest.useFakeTimers();
    directory = new FakeDirectory();
    directory.add('dom0', 'AdminVM');
    sysUsb = directory.add('sys-usb');
    sysUsb.icon = 'appvm-red';
    sysUsb.devices.usb = [deviceInfo('sys-usb', '2-1', 'Webcam')];
    work = directory.add('work');
    work.attached.usb = [{ backendDomain: 'sys-usb', ident: '2-1' }];
    directory.add('personal');
    attachments = new FakeAttachmentApi();
    sink = new FakeSink();
    tray = new DevicesTray({ directory, attachments, sink, debounceMs: 5000 });
    await tray.initialize();
  });

  afterEach(() => {
    tray.dispose();
    jest.useRealTimers();
  });

  it('should load the snapshot without the admin VM', () => {
    expect(tray.registry.sortedVms().map((vm) => vm.name)).toEqual(['personal', 'sys-usb', 'work']);
    expect(tray.registry.getDevice('sys-usb:2-1')?.attachments).toEqual(new Set(['work']));
    expect(sink.notifications).toHaveLength(0);
  });

  it('should buffer a detached device for the frontend VM until the window passes', async () => {
    await tray.dispatcher.dispatch(event('work', 'device-detach:usb', { device: 'sys-usb:2-1' }));

    expect(tray.registry.getDevice('sys-usb:2-1')?.attachments.size).toBe(0);
    expect(tray.notifier.pending('removed', 'work').map((device) => device.key)).toEqual(['sys-usb:2-1']);
    expect(sink.notifications).toEqual([
      { id: 'device-removed-work', title: 'Devices removed on work', body: 'Webcam', priority: 'low', error: false },
    ]);

    jest.advanceTimersByTime(5000);

    expect(tray.notifier.pending('removed', 'work')).toEqual([]);
    expect(sink.notifications).toHaveLength(1);
  });

  it('should announce devices that appear on a backend VM', async () => {
    sysUsb.devices.usb.push(deviceInfo('sys-usb', '2-2', 'Keyboard'));

    await tray.dispatcher.dispatch(event('sys-usb', 'device-list-change:usb'));

    expect(tray.registry.getDevice('sys-usb:2-2')?.vmIcon).toBe('appvm-red');
    expect(sink.last()).toEqual({
      id: 'device-added-sys-usb',
      title: 'Devices added on sys-usb',
      body: 'Keyboard',
      priority: 'low',
      error: false,
    });
  });

  it('should leave the registry to the events after a toggle', async () => {
    const result = await tray.toggle('sys-usb:2-1', 'personal');

    expect(result).toEqual({ status: 'attach-requested', vm: 'personal' });
    expect(attachments.calls).toEqual([
      { operation: 'detach', vm: 'work', device: 'sys-usb:2-1' },
      { operation: 'attach', vm: 'personal', device: 'sys-usb:2-1', persistent: false },
    ]);
    expect(tray.registry.getDevice('sys-usb:2-1')?.attachments).toEqual(new Set(['work']));

    await tray.dispatcher.dispatch(event('work', 'device-detach:usb', { device: 'sys-usb:2-1' }));
    await tray.dispatcher.dispatch(event('personal', 'device-attach:usb', { device: 'sys-usb:2-1' }));

    expect(tray.registry.getDevice('sys-usb:2-1')?.attachments).toEqual(new Set(['personal']));
    const [section] = tray.menu();
    expect(section?.items[0]?.targets).toEqual([
      { vm: 'personal', icon: 'appvm-green', attached: true },
      { vm: 'work', icon: 'appvm-green', attached: false },
    ]);
  });

  it('should apply every event of a stream in order', async () => {
    async function* stream(): AsyncGenerator<AdminEvent> {
      yield event('work', 'domain-shutdown');
      yield event('work', 'device-attach:usb', { device: 'sys-usb:2-1' });
    }
    work.running = false;

    await tray.dispatcher.listenForEvents(stream);

    expect(tray.registry.hasVm('work')).toBe(false);
    // attach events for a halted VM are ignored
    expect(tray.registry.getDevice('sys-usb:2-1')?.attachments.size).toBe(0);
  });
});
