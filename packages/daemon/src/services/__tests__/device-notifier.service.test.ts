/**
 * Tests for the debounce notifier
 *
 * Tests for:
 * - coalescing of insertions into one notification identity
 * - per-device expiry and silent eviction
 * - separation of directions and VMs
 * - subscription to reconciler events
 */

import type { Device } from '@devices-widget/shared';
import { DeviceNotifier, notificationId } from '../device-notifier.service';
import { DeviceRegistry } from '../device-registry.service';
import { EventReconciler } from '../event-reconciler.service';
import { SnapshotLoader } from '../snapshot-loader.service';
import { FakeDirectory, FakeSink, deviceInfo } from '../../__tests__/fakes';

const makeDevice = (ident: string, description: string): Device => ({
  key: `sys-usb:${ident}`,
  backendDomain: 'sys-usb',
  ident,
  description,
  devclass: 'usb',
  data: {},
  attachments: new Set(),
  vmIcon: 'appvm-red',
});

describe('DeviceNotifier', () => {
  let sink: FakeSink;
  let notifier: DeviceNotifier;

  beforeEach(() => {
    jest.useFakeTimers();
    sink = new FakeSink();
    notifier = new DeviceNotifier(sink, 5000);
  });

  afterEach(() => {
    notifier.dispose();
    jest.useRealTimers();
  });

  it('should derive identities from direction and VM', () => {
    expect(notificationId('added', 'sys-usb')).toBe('device-added-sys-usb');
    expect(notificationId('removed', 'work')).toBe('device-removed-work');
  });

  it('should coalesce insertions within the window, sorted by description', () => {
    notifier.devicesAdded('sys-usb', [makeDevice('2-1', 'Webcam')]);
    jest.advanceTimersByTime(1000);
    notifier.devicesAdded('sys-usb', [makeDevice('2-2', 'Keyboard')]);

    expect(sink.notifications).toHaveLength(2);
    expect(sink.last()).toEqual({
      id: 'device-added-sys-usb',
      title: 'Devices added on sys-usb',
      body: 'Keyboard\nWebcam',
      priority: 'low',
      error: false,
    });
  });

  it('should evict each device after its own window without notifying', () => {
    notifier.devicesAdded('sys-usb', [makeDevice('2-1', 'Webcam')]);
    jest.advanceTimersByTime(3000);
    notifier.devicesAdded('sys-usb', [makeDevice('2-2', 'Keyboard')]);

    jest.advanceTimersByTime(2000);
    expect(notifier.pending('added', 'sys-usb').map((d) => d.description)).toEqual(['Keyboard']);

    jest.advanceTimersByTime(3000);
    expect(notifier.pending('added', 'sys-usb')).toEqual([]);
    expect(sink.notifications).toHaveLength(2);
  });

  it('should list only the devices still buffered', () => {
    notifier.devicesRemoved('work', [makeDevice('2-1', 'Webcam')]);
    jest.advanceTimersByTime(5000);
    notifier.devicesRemoved('work', [makeDevice('2-2', 'Keyboard')]);

    expect(sink.last()?.body).toBe('Keyboard');
    expect(sink.last()?.title).toBe('Devices removed on work');
  });

  it('should not buffer a device twice', () => {
    const webcam = makeDevice('2-1', 'Webcam');
    notifier.devicesAdded('sys-usb', [webcam]);
    notifier.devicesAdded('sys-usb', [webcam]);

    expect(notifier.pending('added', 'sys-usb')).toHaveLength(1);
    expect(sink.last()?.body).toBe('Webcam');
  });

  it('should keep directions and VMs apart', () => {
    notifier.devicesAdded('sys-usb', [makeDevice('2-1', 'Webcam')]);
    notifier.devicesRemoved('sys-usb', [makeDevice('2-2', 'Keyboard')]);
    notifier.devicesAdded('sys-net', [makeDevice('3-1', 'Dongle')]);

    expect(sink.notifications.map((n) => [n.id, n.body])).toEqual([
      ['device-added-sys-usb', 'Webcam'],
      ['device-removed-sys-usb', 'Keyboard'],
      ['device-added-sys-net', 'Dongle'],
    ]);
  });

  it('should ignore empty batches', () => {
    notifier.devicesAdded('sys-usb', []);

    expect(sink.notifications).toEqual([]);
  });

  it('should cancel pending evictions on dispose', () => {
    notifier.devicesAdded('sys-usb', [makeDevice('2-1', 'Webcam')]);
    notifier.dispose();

    expect(jest.getTimerCount()).toBe(0);
    expect(notifier.pending('added', 'sys-usb')).toEqual([]);
  });

  it('should survive a failing sink', async () => {
    const failing = new DeviceNotifier({ notify: () => Promise.reject(new Error('no session bus')) }, 5000);

    expect(() => failing.devicesAdded('sys-usb', [makeDevice('2-1', 'Webcam')])).not.toThrow();
    await Promise.resolve();
    expect(failing.pending('added', 'sys-usb')).toHaveLength(1);
    failing.dispose();
  });

  describe('subscribe', () => {
    it('should buffer list changes and detachments', async () => {
      const directory = new FakeDirectory();
      const sysUsb = directory.add('sys-usb');
      sysUsb.devices.usb = [deviceInfo('sys-usb', '2-1', 'Webcam')];
      directory.add('work');
      const registry = new DeviceRegistry();
      await new SnapshotLoader(directory).load(registry);
      const reconciler = new EventReconciler(registry, directory);
      const unsubscribe = notifier.subscribe(reconciler);

      sysUsb.devices.usb.push(deviceInfo('sys-usb', '2-2', 'Keyboard'));
      await reconciler.deviceListChanged('sys-usb');
      await reconciler.deviceAttached('work', 'usb', { backendDomain: 'sys-usb', ident: '2-1' });
      await reconciler.deviceDetached('work', { backendDomain: 'sys-usb', ident: '2-1' });

      expect(notifier.pending('added', 'sys-usb').map((d) => d.key)).toEqual(['sys-usb:2-2']);
      expect(notifier.pending('added', 'work').map((d) => d.key)).toEqual(['sys-usb:2-1']);
      expect(notifier.pending('removed', 'work').map((d) => d.key)).toEqual(['sys-usb:2-1']);

      unsubscribe();
      await reconciler.deviceAttached('work', 'usb', { backendDomain: 'sys-usb', ident: '2-2' });
      expect(notifier.pending('added', 'work')).toHaveLength(1);
    });
  });
});
