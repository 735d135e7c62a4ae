import { describe, it, expect, vi } from 'vitest';
import { KasaDeviceClient, todayFromDayStats } from '../../../src/plugins/devices/KasaDeviceClient';
import type { DeviceTransport } from '../../../src/plugins/devices/transports/DeviceTransport';
import type { KasaHandle } from '../../../src/types/devices/kasa.types';

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const today = new Date(2026, 9, 19, 12, 0, 0);
const credentials = { username: 'someone', password: 'test-secret' };

function legacyHandle(overrides: Partial<KasaHandle> = {}): KasaHandle {
  return {
    protocol: 'legacy',
    getRealtime: async () => ({ power_mw: 3000, err_code: 0 }),
    getDayStats: async () => ({
      day_list: [
        { year: 2026, month: 10, day: 18, energy_wh: 900 },
        { year: 2026, month: 10, day: 19, energy_wh: 250 },
      ],
    }),
    close: vi.fn(),
    ...overrides,
  };
}

function klapTransport(send: DeviceTransport['send']) {
  return {
    scheme: 'klap' as const,
    handshake: vi.fn(async () => undefined),
    login: vi.fn(async () => undefined),
    send,
    close: vi.fn(),
  };
}

describe('todayFromDayStats', () => {
  it('should keep watt-hours from newer hardware unconverted', () => {
    expect(
      todayFromDayStats({ day_list: [{ year: 2026, month: 10, day: 19, energy_wh: 1005 }] }, today)
    ).toEqual({ today_wh: 1005 });
  });

  it('should take kilowatt-hours from older hardware as they are', () => {
    expect(
      todayFromDayStats({ day_list: [{ year: 2026, month: 10, day: 19, energy: 1.5 }] }, today)
    ).toEqual({ today: 1.5 });
  });

  it('should return undefined when today is not listed', () => {
    expect(
      todayFromDayStats({ day_list: [{ year: 2026, month: 10, day: 18, energy_wh: 250 }] }, today)
    ).toBeUndefined();
  });

  it('should return undefined for a reply without a day list', () => {
    expect(todayFromDayStats({ err_code: 0 }, today)).toBeUndefined();
    expect(todayFromDayStats(null, today)).toBeUndefined();
  });
});

describe('KasaDeviceClient', () => {
  describe('without credentials', () => {
    it('should read realtime power and today from the legacy protocol', async () => {
      const handle = legacyHandle();
      const client = new KasaDeviceClient({
        timeoutMs: 1000,
        now: () => today,
        connectLegacy: async () => handle,
      });

      const connected = await client.connect('10.0.0.20');
      const usage = await client.readUsage(connected);
      await client.disconnect(connected);

      expect(usage).toEqual({ power_mw: 3000, today: undefined, today_wh: 250 });
      expect(handle.close).toHaveBeenCalledTimes(1);
    });

    it('should report a failed lookup as unreachable', async () => {
      const client = new KasaDeviceClient({
        timeoutMs: 1000,
        connectLegacy: async () => {
          throw new Error('connect ETIMEDOUT 10.0.0.20:9999');
        },
      });

      await expect(client.connect('10.0.0.20')).rejects.toMatchObject({
        kind: 'DEVICE_UNREACHABLE',
        message: 'lookup failed: connect ETIMEDOUT 10.0.0.20:9999',
      });
    });

    it('should report a failed realtime read as unreachable', async () => {
      const client = new KasaDeviceClient({ timeoutMs: 1000, connectLegacy: async () => legacyHandle() });
      const handle = legacyHandle({
        getRealtime: async () => {
          throw new Error('socket hang up');
        },
      });

      await expect(client.readUsage(handle)).rejects.toMatchObject({
        kind: 'DEVICE_UNREACHABLE',
        message: 'get_realtime failed: socket hang up',
      });
    });

    it('should leave today out when the day statistics cannot be read', async () => {
      const client = new KasaDeviceClient({
        timeoutMs: 1000,
        now: () => today,
        connectLegacy: async () => legacyHandle(),
      });
      const handle = legacyHandle({
        getDayStats: async () => {
          throw new Error('module not supported');
        },
      });

      expect(await client.readUsage(handle)).toEqual({ power_mw: 3000, today: undefined });
    });
  });

  describe('with credentials', () => {
    it('should use KLAP and read the emeter sections', async () => {
      const send = vi
        .fn<DeviceTransport['send']>()
        .mockResolvedValueOnce({ emeter: { get_realtime: { power_mw: 7000, err_code: 0 } } })
        .mockResolvedValueOnce({
          emeter: {
            get_daystat: { day_list: [{ year: 2026, month: 10, day: 19, energy_wh: 1200 }], err_code: 0 },
          },
        });
      const transport = klapTransport(send);
      const createKlapTransport = vi.fn(() => transport);
      const client = new KasaDeviceClient({ timeoutMs: 1000, now: () => today, createKlapTransport });

      const handle = await client.connect('10.0.0.20', credentials);
      const usage = await client.readUsage(handle);
      await client.disconnect(handle);

      expect(createKlapTransport).toHaveBeenCalledWith('10.0.0.20', credentials);
      expect(transport.handshake).toHaveBeenCalledTimes(1);
      expect(transport.login).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenNthCalledWith(1, { emeter: { get_realtime: {} } });
      expect(send).toHaveBeenNthCalledWith(2, { emeter: { get_daystat: { year: 2026, month: 10 } } });
      expect(usage).toEqual({ power_mw: 7000, today: undefined, today_wh: 1200 });
      expect(transport.close).toHaveBeenCalledTimes(1);
    });

    it('should reject an emeter error code', async () => {
      const send = vi
        .fn<DeviceTransport['send']>()
        .mockResolvedValue({ emeter: { get_realtime: { err_code: -1, err_msg: 'module not support' } } });
      const client = new KasaDeviceClient({
        timeoutMs: 1000,
        createKlapTransport: () => klapTransport(send),
      });

      const handle = await client.connect('10.0.0.20', credentials);

      await expect(client.readUsage(handle)).rejects.toMatchObject({
        kind: 'PROTOCOL_SHAPE',
        message: 'emeter.get_realtime returned err_code -1',
      });
    });

    it('should reject a reply without an emeter section', async () => {
      const send = vi.fn<DeviceTransport['send']>().mockResolvedValue({ system: {} });
      const client = new KasaDeviceClient({
        timeoutMs: 1000,
        createKlapTransport: () => klapTransport(send),
      });

      const handle = await client.connect('10.0.0.20', credentials);

      await expect(client.readUsage(handle)).rejects.toMatchObject({
        kind: 'PROTOCOL_SHAPE',
        message: 'reply has no emeter.get_realtime section',
      });
    });
  });
});
