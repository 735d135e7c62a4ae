import { BaseDevicePlugin, attemptPoll } from './BaseDevicePlugin';
import { KasaDeviceClient } from './KasaDeviceClient';
import { normalizeKasa } from './ReadingNormalizer';
import type { KasaConfig } from '../../config/schemas/config.schema';
import type {
  Credentials,
  DeviceClient,
  DeviceConfig,
  PluginMetadata,
  PollResult,
} from '../../types/plugin.types';
import type { KasaHandle, KasaRawUsage } from '../../types/devices/kasa.types';
import type { Reading } from '../../types/metric.types';

export type KasaPluginConfig = KasaConfig & { requestTimeoutMs?: number };

/**
 * Kasa device plugin
 * Polls HS110/KP115-style plugs for instantaneous power and today's energy
 */
export class KasaPlugin extends BaseDevicePlugin<KasaPluginConfig> {
  readonly metadata: PluginMetadata = {
    name: 'Kasa',
    version: '1.0.0',
    description: 'Reads power usage from Kasa smart plugs',
  };

  readonly vendor = 'kasa' as const;

  private client!: DeviceClient<KasaHandle, KasaRawUsage>;
  private credentials?: Credentials;

  async initialize(config: KasaPluginConfig): Promise<void> {
    await super.initialize(config);

    if (config.auth) {
      this.credentials = { username: config.auth.user, password: config.auth.passw };
      this.logger.debug('Kasa credentials configured, using KLAP');
    }
    this.client = this.createClient();
  }

  async poll(device: DeviceConfig, capturedAtNanos: bigint): Promise<PollResult<Reading>> {
    const result = await attemptPoll(this.client, device.address, this.credentials);
    if (!result.ok) {
      return result;
    }
    return normalizeKasa(device.name, result.value, capturedAtNanos);
  }

  /**
   * Create the device client; tests substitute a fake
   */
  protected createClient(): DeviceClient<KasaHandle, KasaRawUsage> {
    return new KasaDeviceClient({ timeoutMs: this.requestTimeoutMs });
  }
}
