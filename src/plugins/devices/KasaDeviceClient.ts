import { Client } from 'tplink-smarthome-api';
import { createLogger } from '../../core/Logger';
import { DeviceError, describeError } from '../../core/errors';
import type { Credentials, DeviceClient } from '../../types/plugin.types';
import type {
  KasaDayStat,
  KasaHandle,
  KasaRawUsage,
  KasaTodayEnergy,
} from '../../types/devices/kasa.types';
import { DeviceTransport, isRecord } from './transports/DeviceTransport';
import { KlapTransport } from './transports/KlapTransport';

const logger = createLogger('KasaDeviceClient');

/**
 * The part of a tplink-smarthome-api device this client talks to
 */
interface LegacyKasaDevice {
  emeter: {
    getRealtime(): Promise<unknown>;
    getDayStats(year: number, month: number): Promise<unknown>;
  };
  closeConnection(): void;
}

export interface KasaDeviceClientOptions {
  timeoutMs: number;
  /** Overridable for tests */
  now?: () => Date;
  connectLegacy?: (address: string) => Promise<KasaHandle>;
  createKlapTransport?: (address: string, credentials: Credentials) => DeviceTransport;
}

function legacyHandle(device: LegacyKasaDevice): KasaHandle {
  return {
    protocol: 'legacy',
    getRealtime: () => device.emeter.getRealtime(),
    getDayStats: (year, month) => device.emeter.getDayStats(year, month),
    close: () => device.closeConnection(),
  };
}

/**
 * Replies to emeter queries sent over KLAP look like {"emeter": {"<method>": {...}}}
 */
function emeterSection(reply: unknown, method: string): unknown {
  if (!isRecord(reply) || !isRecord(reply.emeter) || !isRecord(reply.emeter[method])) {
    throw new DeviceError('PROTOCOL_SHAPE', `reply has no emeter.${method} section`);
  }
  const section = reply.emeter[method];
  if (isRecord(section) && typeof section.err_code === 'number' && section.err_code !== 0) {
    throw new DeviceError('PROTOCOL_SHAPE', `emeter.${method} returned err_code ${section.err_code}`);
  }
  return section;
}

function klapHandle(transport: DeviceTransport): KasaHandle {
  return {
    protocol: 'klap',
    getRealtime: async () =>
      emeterSection(await transport.send({ emeter: { get_realtime: {} } }), 'get_realtime'),
    getDayStats: async (year, month) =>
      emeterSection(
        await transport.send({ emeter: { get_daystat: { year, month } } }),
        'get_daystat'
      ),
    close: () => transport.close(),
  };
}

function isDayStat(value: unknown): value is KasaDayStat {
  return (
    isRecord(value) &&
    typeof value.year === 'number' &&
    typeof value.month === 'number' &&
    typeof value.day === 'number'
  );
}

/**
 * Today's cumulative energy from a get_daystat reply, if the device reported it
 */
export function todayFromDayStats(reply: unknown, today: Date): KasaTodayEnergy | undefined {
  if (!isRecord(reply) || !Array.isArray(reply.day_list)) {
    return undefined;
  }

  const entry = reply.day_list
    .filter(isDayStat)
    .find(
      (stat) =>
        stat.year === today.getFullYear() &&
        stat.month === today.getMonth() + 1 &&
        stat.day === today.getDate()
    );

  if (!entry) return undefined;
  if (typeof entry.energy_wh === 'number') return { today_wh: entry.energy_wh };
  if (typeof entry.energy === 'number') return { today: entry.energy };
  return undefined;
}

/**
 * Kasa device client. Without credentials it uses the unauthenticated local protocol
 * through tplink-smarthome-api; with credentials it uses KLAP (md5 auth hash).
 */
export class KasaDeviceClient implements DeviceClient<KasaHandle, KasaRawUsage> {
  private readonly now: () => Date;
  private readonly connectLegacy: (address: string) => Promise<KasaHandle>;
  private readonly createKlapTransport: (address: string, credentials: Credentials) => DeviceTransport;

  constructor(options: KasaDeviceClientOptions) {
    const { timeoutMs } = options;
    this.now = options.now ?? (() => new Date());

    if (options.connectLegacy) {
      this.connectLegacy = options.connectLegacy;
    } else {
      const client = new Client({ defaultSendOptions: { timeout: timeoutMs } });
      this.connectLegacy = async (address) => {
        const device: LegacyKasaDevice = await client.getDevice({ host: address });
        return legacyHandle(device);
      };
    }

    this.createKlapTransport =
      options.createKlapTransport ??
      ((address, credentials) =>
        new KlapTransport({ address, credentials, timeoutMs, authVersion: 1 }));
  }

  async connect(address: string, credentials?: Credentials): Promise<KasaHandle> {
    if (!credentials) {
      try {
        return await this.connectLegacy(address);
      } catch (error) {
        throw new DeviceError('DEVICE_UNREACHABLE', `lookup failed: ${describeError(error)}`);
      }
    }

    const transport = this.createKlapTransport(address, credentials);
    await transport.handshake();
    await transport.login();
    return klapHandle(transport);
  }

  async readUsage(handle: KasaHandle): Promise<KasaRawUsage> {
    let realtime: unknown;
    try {
      realtime = await handle.getRealtime();
    } catch (error) {
      if (error instanceof DeviceError) throw error;
      throw new DeviceError('DEVICE_UNREACHABLE', `get_realtime failed: ${describeError(error)}`);
    }

    return {
      power_mw: isRecord(realtime) ? realtime.power_mw : undefined,
      today: undefined,
      ...(await this.readToday(handle)),
    };
  }

  async disconnect(handle: KasaHandle): Promise<void> {
    handle.close();
  }

  /**
   * A failed day-stat query only costs the cumulative figure, not the reading
   */
  private async readToday(handle: KasaHandle): Promise<KasaTodayEnergy | undefined> {
    const today = this.now();
    try {
      const reply = await handle.getDayStats(today.getFullYear(), today.getMonth() + 1);
      return todayFromDayStats(reply, today);
    } catch (error) {
      logger.debug(`get_daystat failed over ${handle.protocol}: ${describeError(error)}`);
      return undefined;
    }
  }
}
