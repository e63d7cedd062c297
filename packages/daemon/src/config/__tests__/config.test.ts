/**
 * Tests for configuration loading
 *
 * Tests for:
 * - defaults when the environment is empty
 * - numeric coercion of environment strings
 * - rejection of invalid values
 */

import { loadConfig } from '../index';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.notificationDebounceMs).toBe(5000);
    expect(config.admin).toEqual({ qrexecClient: 'qrexec-client-vm', target: 'dom0', callTimeoutMs: 10000 });
    expect(config.events.reconnectDelayMs).toBe(1000);
    expect(config.notifySend).toBe('notify-send');
    expect(config.appName).toBe('Devices Widget');
  });

  it('should coerce numeric values from strings', () => {
    const config = loadConfig({
      NOTIFICATION_DEBOUNCE_MS: '250',
      ADMIN_CALL_TIMEOUT_MS: '3000',
      EVENTS_RECONNECT_DELAY_MS: '0',
      ADMIN_TARGET: 'admin-vm',
    });

    expect(config.notificationDebounceMs).toBe(250);
    expect(config.admin.callTimeoutMs).toBe(3000);
    expect(config.admin.target).toBe('admin-vm');
    expect(config.events.reconnectDelayMs).toBe(0);
  });

  describe('invalid values', () => {
    let consoleError: jest.SpyInstance;

    beforeEach(() => {
      consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      consoleError.mockRestore();
    });

    it('should reject a non-numeric debounce window', () => {
      expect(() => loadConfig({ NOTIFICATION_DEBOUNCE_MS: 'soon' })).toThrow('Configuration validation failed');
      expect(consoleError).toHaveBeenCalledWith(expect.stringContaining('notificationDebounceMs'));
    });

    it('should reject an unknown log level', () => {
      expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Configuration validation failed');
    });

    it('should reject a negative reconnect delay', () => {
      expect(() => loadConfig({ EVENTS_RECONNECT_DELAY_MS: '-5' })).toThrow('Configuration validation failed');
    });
  });
});
