import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PollCycle, describeReading } from '../../src/core/PollCycle';
import type { PollTarget } from '../../src/core/PluginManager';
import { buildBatch } from '../../src/core/MetricBatchBuilder';
import { BaseDevicePlugin } from '../../src/plugins/devices/BaseDevicePlugin';
import { KasaPlugin } from '../../src/plugins/devices/KasaPlugin';
import { DeviceError } from '../../src/core/errors';
import type {
  DeviceClient,
  DeviceConfig,
  PluginMetadata,
  PollResult,
} from '../../src/types/plugin.types';
import type { Reading } from '../../src/types/metric.types';
import type { KasaHandle, KasaRawUsage } from '../../src/types/devices/kasa.types';

const { logger } = vi.hoisted(() => ({
  logger: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => logger,
}));

const TS = 1700000000000000000n;

type Script = PollResult<Reading> | 'throw' | 'hang';

// Test device plugin answering from a per-address script
class ScriptedPlugin extends BaseDevicePlugin {
  readonly metadata: PluginMetadata = {
    name: 'Scripted',
    version: '1.0.0',
    description: 'Scripted device plugin for testing',
  };

  readonly vendor = 'kasa' as const;
  public polled: string[] = [];

  constructor(private readonly scripts: Record<string, Script>) {
    super();
  }

  async poll(device: DeviceConfig): Promise<PollResult<Reading>> {
    this.polled.push(device.address);
    const script = this.scripts[device.address];
    if (script === 'throw') throw new Error('socket closed');
    if (script === 'hang') return new Promise<PollResult<Reading>>(() => undefined);
    return script;
  }
}

const reading = (deviceName: string, nowWatts: number, todayWattHours?: number): Reading =>
  todayWattHours === undefined
    ? { deviceName, nowWatts, capturedAtNanos: TS }
    : { deviceName, nowWatts, todayWattHours, capturedAtNanos: TS };

const target = (plugin: BaseDevicePlugin, name: string, address: string): PollTarget => ({
  plugin,
  device: { name, address, vendor: 'kasa' },
});

describe('PollCycle', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should key readings by device name in configuration order', async () => {
    const plugin = new ScriptedPlugin({
      '10.0.0.1': { ok: true, value: reading('fridge', 80, 900) },
      '10.0.0.2': { ok: true, value: reading('tv', 45) },
    });
    const cycle = new PollCycle(
      [target(plugin, 'fridge', '10.0.0.1'), target(plugin, 'tv', '10.0.0.2')],
      { concurrency: 4, deviceTimeoutMs: 1000 }
    );

    const readings = await cycle.run(TS);

    expect([...readings.keys()]).toEqual(['fridge', 'tv']);
    expect(readings.get('tv')).toEqual(reading('tv', 45));
  });

  it('should exclude failed devices and keep the rest', async () => {
    const plugin = new ScriptedPlugin({
      '10.0.0.1': { ok: true, value: reading('fridge', 80) },
      '10.0.0.2': { ok: false, failure: { kind: 'AUTH_FAILURE', message: 'bad password' } },
      '10.0.0.3': 'throw',
      '10.0.0.4': { ok: true, value: reading('heater', 1200) },
    });
    const cycle = new PollCycle(
      [
        target(plugin, 'fridge', '10.0.0.1'),
        target(plugin, 'washer', '10.0.0.2'),
        target(plugin, 'dryer', '10.0.0.3'),
        target(plugin, 'heater', '10.0.0.4'),
      ],
      { concurrency: 2, deviceTimeoutMs: 1000 }
    );

    const readings = await cycle.run(TS);

    expect([...readings.keys()]).toEqual(['fridge', 'heater']);
    expect(plugin.polled).toHaveLength(4);
    expect(logger.warn).toHaveBeenCalledWith(
      'washer (10.0.0.2): authentication failed: bad password'
    );
    expect(logger.warn).toHaveBeenCalledWith('dryer (10.0.0.3): device unreachable: socket closed');
  });

  it('should give up on a device that exceeds the timeout', async () => {
    const plugin = new ScriptedPlugin({
      '10.0.0.1': 'hang',
      '10.0.0.2': { ok: true, value: reading('tv', 45) },
    });
    const cycle = new PollCycle(
      [target(plugin, 'stuck', '10.0.0.1'), target(plugin, 'tv', '10.0.0.2')],
      { concurrency: 1, deviceTimeoutMs: 20 }
    );

    const readings = await cycle.run(TS);

    expect([...readings.keys()]).toEqual(['tv']);
    expect(logger.warn).toHaveBeenCalledWith(
      'stuck (10.0.0.1): device unreachable: no reading within 20ms'
    );
  });

  it('should let a later device with the same name replace the earlier reading', async () => {
    const plugin = new ScriptedPlugin({
      '10.0.0.1': { ok: true, value: reading('plug', 10) },
      '10.0.0.2': { ok: true, value: reading('other', 20) },
      '10.0.0.3': { ok: true, value: reading('plug', 30) },
    });
    const cycle = new PollCycle(
      [
        target(plugin, 'plug', '10.0.0.1'),
        target(plugin, 'other', '10.0.0.2'),
        target(plugin, 'plug', '10.0.0.3'),
      ],
      { concurrency: 3, deviceTimeoutMs: 1000 }
    );

    const readings = await cycle.run(TS);

    expect([...readings.keys()]).toEqual(['plug', 'other']);
    expect(readings.get('plug')?.nowWatts).toBe(30);
  });

  it('should return an empty map when every device fails', async () => {
    const plugin = new ScriptedPlugin({ '10.0.0.1': 'throw' });
    const cycle = new PollCycle([target(plugin, 'a', '10.0.0.1')], {
      concurrency: 4,
      deviceTimeoutMs: 1000,
    });

    expect((await cycle.run(TS)).size).toBe(0);
  });

  it('should log one line per successful device', async () => {
    const plugin = new ScriptedPlugin({
      '10.0.0.1': { ok: true, value: reading('fridge', 80.5, 1500) },
    });
    const cycle = new PollCycle([target(plugin, 'fridge', '10.0.0.1')], {
      concurrency: 1,
      deviceTimeoutMs: 1000,
    });

    await cycle.run(TS);

    expect(logger.info).toHaveBeenCalledWith('fridge: 80.5 W now, today 1500 Wh');
  });

  describe('with Kasa devices', () => {
    // Kasa plugin whose device client answers from a fixed table
    class TableKasaPlugin extends KasaPlugin {
      protected createClient(): DeviceClient<KasaHandle, KasaRawUsage> {
        return {
          connect: async (address) => {
            if (address === '10.0.0.9') {
              return new Promise<KasaHandle>(() => undefined);
            }
            return {
              protocol: 'legacy',
              getRealtime: async () => ({}),
              getDayStats: async () => ({}),
              close: () => undefined,
            };
          },
          readUsage: async () => ({ power_mw: 1500, today: false }),
          disconnect: async () => undefined,
        };
      }
    }

    it('should write one consumption point when one device times out and the other has no today figure', async () => {
      const plugin = new TableKasaPlugin();
      await plugin.initialize({
        devices: [
          { name: 'lamp', ip: '10.0.0.8' },
          { name: 'offline', ip: '10.0.0.9' },
        ],
      });
      const cycle = new PollCycle(
        plugin.getDevices().map((device) => ({ device, plugin })),
        { concurrency: 4, deviceTimeoutMs: 20 }
      );

      const readings = await cycle.run(TS);
      const batch = buildBatch(readings);

      expect(readings.get('lamp')).toEqual({ deviceName: 'lamp', nowWatts: 1.5, capturedAtNanos: TS });
      expect(readings.has('offline')).toBe(false);
      expect(batch).toEqual([
        {
          measurement: 'power_watts',
          tags: { host: 'lamp' },
          fields: { consumption: 1.5 },
          timestampNanos: TS,
        },
      ]);
    });
  });

  describe('describeReading', () => {
    it('should say when today was not supplied', () => {
      expect(describeReading(reading('tv', 45))).toBe('tv: 45 W now, today not supplied');
    });
  });

  it('should classify a thrown DeviceError by its kind', async () => {
    class ThrowingPlugin extends ScriptedPlugin {
      async poll(): Promise<PollResult<Reading>> {
        throw new DeviceError('PROTOCOL_SHAPE', 'odd reply');
      }
    }
    const plugin = new ThrowingPlugin({});
    const cycle = new PollCycle([target(plugin, 'odd', '10.0.0.5')], {
      concurrency: 1,
      deviceTimeoutMs: 1000,
    });

    await cycle.run(TS);

    expect(logger.warn).toHaveBeenCalledWith('odd (10.0.0.5): unexpected response: odd reply');
  });
});
