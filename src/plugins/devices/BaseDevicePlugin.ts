import { createLogger } from '../../core/Logger';
import { toPollFailure } from '../../core/errors';
import type {
  Credentials,
  DeviceClient,
  DeviceConfig,
  DevicePlugin,
  PluginMetadata,
  PollResult,
} from '../../types/plugin.types';
import type { Reading } from '../../types/metric.types';

const attemptLogger = createLogger('DeviceAttempt');

/**
 * Settings shared by every device family
 */
export interface BaseDeviceConfig {
  devices: { name: string; ip: string }[];
  /** Per-request timeout for device HTTP/TCP exchanges */
  requestTimeoutMs?: number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/**
 * One connect → readUsage → disconnect pass against a device.
 * Failures come back as values; disconnect is best-effort and never surfaces.
 */
export async function attemptPoll<THandle, TRaw>(
  client: DeviceClient<THandle, TRaw>,
  address: string,
  credentials?: Credentials
): Promise<PollResult<TRaw>> {
  let handle: THandle;
  try {
    handle = await client.connect(address, credentials);
  } catch (error) {
    return { ok: false, failure: toPollFailure(error) };
  }

  try {
    return { ok: true, value: await client.readUsage(handle) };
  } catch (error) {
    return { ok: false, failure: toPollFailure(error) };
  } finally {
    try {
      await client.disconnect(handle);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      attemptLogger.debug(`Disconnect from ${address} failed: ${message}`);
    }
  }
}

/**
 * Abstract base class for all device-family plugins.
 * Provides configuration handling, logging and the device list.
 */
export abstract class BaseDevicePlugin<TConfig extends BaseDeviceConfig = BaseDeviceConfig>
  implements DevicePlugin<TConfig>
{
  protected config!: TConfig;
  protected logger = createLogger(this.constructor.name);

  /**
   * Plugin metadata - must be implemented by subclasses
   */
  abstract readonly metadata: PluginMetadata;

  /**
   * Vendor family handled by this plugin
   */
  abstract readonly vendor: DeviceConfig['vendor'];

  /**
   * Initialize the plugin with configuration
   */
  async initialize(config: TConfig): Promise<void> {
    this.config = config;
    this.logger.info(
      `Initialized ${this.metadata.name} plugin (${this.config.devices.length} device(s))`
    );
  }

  /**
   * Devices configured for this family, in configuration order
   */
  getDevices(): DeviceConfig[] {
    return this.config.devices.map((device) => this.toDeviceConfig(device));
  }

  /**
   * Poll one device and normalize its reading - must be implemented by subclasses
   */
  abstract poll(device: DeviceConfig, capturedAtNanos: bigint): Promise<PollResult<Reading>>;

  /**
   * Shutdown the plugin
   */
  async shutdown(): Promise<void> {
    this.logger.info(`Shutting down ${this.metadata.name} plugin`);
  }

  protected get requestTimeoutMs(): number {
    return this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  protected toDeviceConfig(device: TConfig['devices'][number]): DeviceConfig {
    return { name: device.name, address: device.ip, vendor: this.vendor };
  }
}
