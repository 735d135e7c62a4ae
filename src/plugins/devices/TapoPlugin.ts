import { BaseDevicePlugin } from './BaseDevicePlugin';
import { AuthNegotiator, SchemeClients } from './AuthNegotiator';
import { TapoDeviceClient, createTapoTransportFactory } from './TapoDeviceClient';
import { normalizeTapo } from './ReadingNormalizer';
import type { TapoConfig } from '../../config/schemas/config.schema';
import type {
  Credentials,
  DeviceConfig,
  PluginMetadata,
  PollResult,
} from '../../types/plugin.types';
import type { Reading } from '../../types/metric.types';

export type TapoPluginConfig = TapoConfig & { requestTimeoutMs?: number };

/**
 * Tapo device plugin
 * Negotiates KLAP or securePassthrough per device and reads get_energy_usage
 */
export class TapoPlugin extends BaseDevicePlugin<TapoPluginConfig> {
  readonly metadata: PluginMetadata = {
    name: 'Tapo',
    version: '1.0.0',
    description: 'Reads power usage from Tapo P110/P115 smart plugs',
  };

  readonly vendor = 'tapo' as const;

  private negotiator!: AuthNegotiator;
  private credentials!: Credentials;

  async initialize(config: TapoPluginConfig): Promise<void> {
    await super.initialize(config);
    this.credentials = { username: config.user, password: config.passw };
    this.negotiator = new AuthNegotiator(this.createSchemeClients());
  }

  async poll(device: DeviceConfig, capturedAtNanos: bigint): Promise<PollResult<Reading>> {
    const result = await this.negotiator.negotiate(
      device.address,
      this.credentials,
      device.authMode ?? 'all'
    );
    if (!result.ok) {
      return result;
    }

    this.logger.debug(`${device.name}: read over ${result.value.scheme}`);
    return normalizeTapo(device.name, result.value.raw, capturedAtNanos);
  }

  /**
   * Per-scheme clients handed to the negotiator; tests substitute fakes
   */
  protected createSchemeClients(): SchemeClients {
    const createTransport = createTapoTransportFactory(this.requestTimeoutMs);
    return {
      klap: new TapoDeviceClient('klap', createTransport),
      securePassthrough: new TapoDeviceClient('securePassthrough', createTransport),
    };
  }

  protected toDeviceConfig(device: TapoPluginConfig['devices'][number]): DeviceConfig {
    return { name: device.name, address: device.ip, vendor: this.vendor, authMode: device.auth };
  }
}
