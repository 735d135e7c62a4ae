import { createLogger } from './Logger';
import { describeError } from './errors';
import type {
  DeviceConfig,
  DevicePlugin,
  OutputPlugin,
  SinkTarget,
  VendorFamily,
} from '../types/plugin.types';
import type { PlugpollConfig } from '../config/schemas/config.schema';
import type { InfluxDB2Config } from '../plugins/outputs/InfluxDB2Plugin';

const logger = createLogger('PluginManager');

/**
 * Plugin factory type for creating device plugin instances
 */
export type DevicePluginFactory = new () => DevicePlugin;

/**
 * Plugin factory type for creating output plugin instances
 */
export type OutputPluginFactory = new () => OutputPlugin<InfluxDB2Config>;

/**
 * Every configured destination is written through this output type
 */
export const DESTINATION_TYPE = 'influxdb2';

const FAMILY_ORDER: readonly VendorFamily[] = ['kasa', 'tapo'];

/**
 * A device paired with the plugin that polls it
 */
export interface PollTarget {
  device: DeviceConfig;
  plugin: DevicePlugin;
}

/**
 * PluginManager handles plugin registration and instantiation.
 * Device plugins are created once per configured family, output plugins once per destination.
 */
export class PluginManager {
  private deviceFactories: Map<VendorFamily, DevicePluginFactory> = new Map();
  private outputFactories: Map<string, OutputPluginFactory> = new Map();

  private devicePlugins: Map<VendorFamily, DevicePlugin> = new Map();
  private outputPlugins: Map<string, OutputPlugin<InfluxDB2Config>> = new Map();
  private sinkTargets: SinkTarget[] = [];

  /**
   * Register a device plugin factory
   */
  registerDevicePlugin(family: VendorFamily, factory: DevicePluginFactory): void {
    logger.debug(`Registering device plugin for family: ${family}`);
    this.deviceFactories.set(family, factory);
  }

  /**
   * Register an output plugin factory
   */
  registerOutputPlugin(type: string, factory: OutputPluginFactory): void {
    logger.debug(`Registering output plugin type: ${type}`);
    this.outputFactories.set(type, factory);
  }

  /**
   * Initialize all plugins from configuration
   */
  async initializeFromConfig(config: PlugpollConfig): Promise<void> {
    logger.info('Initializing plugins from configuration...');

    await this.initializeOutputPlugins(config.destinations);
    await this.initializeDevicePlugins(config);

    logger.info('All plugins initialized');
  }

  /**
   * Initialize one sink per destination. A destination that cannot be set up is skipped.
   */
  private async initializeOutputPlugins(destinations: PlugpollConfig['destinations']): Promise<void> {
    if (destinations.length === 0) {
      logger.warn('No destinations configured, readings will not be stored');
      return;
    }

    const factory = this.outputFactories.get(DESTINATION_TYPE);
    if (!factory) {
      logger.warn(`No registered factory for output type: ${DESTINATION_TYPE}`);
      return;
    }

    for (const destination of destinations) {
      try {
        const plugin = new factory();
        await plugin.initialize(destination);
        this.outputPlugins.set(destination.name, plugin);
        this.sinkTargets.push({
          name: destination.name,
          bucket: destination.bucket,
          org: destination.org,
          connection: plugin,
        });
        logger.info(`Initialized destination: ${destination.name}`);
      } catch (error) {
        logger.error(
          `Failed to initialize destination ${destination.name}: ${describeError(error)}`
        );
      }
    }
  }

  /**
   * Initialize device plugins for each configured family
   */
  private async initializeDevicePlugins(config: PlugpollConfig): Promise<void> {
    const requestTimeoutMs = config.poller.deviceTimeout * 1000;

    for (const family of FAMILY_ORDER) {
      const familyConfig = config.devices[family];
      if (!familyConfig) continue;

      const factory = this.deviceFactories.get(family);
      if (!factory) {
        logger.warn(`No registered factory for device family: ${family}`);
        continue;
      }

      const plugin = new factory();
      await plugin.initialize({ ...familyConfig, requestTimeoutMs });
      this.devicePlugins.set(family, plugin);
      logger.info(`Initialized device plugin: ${family}`);
    }
  }

  /**
   * Every configured device with its plugin, Kasa devices first, each family in config order
   */
  getPollTargets(): PollTarget[] {
    const targets: PollTarget[] = [];
    for (const family of FAMILY_ORDER) {
      const plugin = this.devicePlugins.get(family);
      if (!plugin) continue;
      for (const device of plugin.getDevices()) {
        targets.push({ device, plugin });
      }
    }
    return targets;
  }

  getSinkTargets(): SinkTarget[] {
    return [...this.sinkTargets];
  }

  /**
   * Run health checks on all destinations
   */
  async healthCheck(): Promise<Map<string, boolean>> {
    const results = new Map<string, boolean>();

    for (const [name, plugin] of this.outputPlugins) {
      try {
        results.set(name, await plugin.healthCheck());
      } catch (error) {
        logger.debug(`Health check for ${name} threw: ${describeError(error)}`);
        results.set(name, false);
      }
    }

    return results;
  }

  /**
   * Shutdown all plugins
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down PluginManager...');

    for (const [family, plugin] of this.devicePlugins) {
      try {
        await plugin.shutdown();
      } catch (error) {
        logger.error(`Error shutting down device plugin ${family}: ${describeError(error)}`);
      }
    }

    for (const [name, plugin] of this.outputPlugins) {
      try {
        await plugin.shutdown();
      } catch (error) {
        logger.error(`Error shutting down destination ${name}: ${describeError(error)}`);
      }
    }

    this.devicePlugins.clear();
    this.outputPlugins.clear();
    this.sinkTargets = [];

    logger.info('PluginManager shutdown complete');
  }

  /**
   * Count of configured devices and active destinations
   */
  getStats(): { activeDevices: number; activeDestinations: number } {
    let activeDevices = 0;
    for (const plugin of this.devicePlugins.values()) {
      activeDevices += plugin.getDevices().length;
    }

    return {
      activeDevices,
      activeDestinations: this.outputPlugins.size,
    };
  }
}
