import { createLogger } from '../../core/Logger';
import type { OutputPlugin, PluginMetadata } from '../../types/plugin.types';
import type { MetricPoint } from '../../types/metric.types';

/**
 * Base configuration interface for output plugins
 */
export interface BaseOutputConfig {
  name: string;
  url: string;
}

/**
 * Abstract base class for all output plugins.
 * Provides configuration handling and logging.
 */
export abstract class BaseOutputPlugin<TConfig extends BaseOutputConfig = BaseOutputConfig>
  implements OutputPlugin<TConfig>
{
  protected config!: TConfig;
  protected logger = createLogger(this.constructor.name);

  /**
   * Plugin metadata - must be implemented by subclasses
   */
  abstract readonly metadata: PluginMetadata;

  /**
   * Initialize the plugin with configuration
   */
  async initialize(config: TConfig): Promise<void> {
    this.config = config;
    this.logger.info(`Initialized ${this.metadata.name} destination ${this.config.name}`);
  }

  /**
   * Write one batch in a single call - must be implemented by subclasses
   */
  abstract writeBatch(bucket: string, org: string, points: readonly MetricPoint[]): Promise<void>;

  /**
   * Check if the output is healthy - must be implemented by subclasses
   */
  abstract healthCheck(): Promise<boolean>;

  /**
   * Shutdown the plugin
   */
  async shutdown(): Promise<void> {
    this.logger.info(`Shutting down ${this.metadata.name} destination ${this.config.name}`);
  }

  /**
   * Destination URL with a scheme, defaulting to http
   */
  protected getBaseUrl(): string {
    if (/^https?:\/\//.test(this.config.url)) {
      return this.config.url;
    }
    return `http://${this.config.url}`;
  }
}
