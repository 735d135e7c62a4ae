import * as fs from 'fs';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { ConfigError } from '../core/errors';
import { PlugpollConfigSchema, PlugpollConfig } from './schemas/config.schema';

const logger = createLogger('ConfigLoader');

export const DEFAULT_CONFIG_FILE = './config/plugpoll.yaml';
const ENV_PREFIX = 'PLUGPOLL_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigLoader handles loading, validation, and environment variable overrides
 * for the plugpoll YAML configuration.
 */
export class ConfigLoader {
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_FILE) {
    this.configPath = configPath;
  }

  /**
   * Load configuration from YAML file with environment variable overrides
   * @returns Validated configuration object
   * @throws ConfigError if the file is missing, unparseable or invalid
   */
  load(): PlugpollConfig {
    if (!fs.existsSync(this.configPath)) {
      throw new ConfigError(
        `Configuration file not found: ${this.configPath} (see config/plugpoll.example.yaml)`
      );
    }

    logger.info(`Loading configuration from: ${this.configPath}`);
    let rawConfig: unknown;

    try {
      const fileContent = fs.readFileSync(this.configPath, 'utf-8');
      rawConfig = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ConfigError(`Failed to read YAML configuration: ${message}`);
    }

    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }
    if (!isRecord(rawConfig)) {
      throw new ConfigError('Configuration root must be a mapping');
    }

    // Apply environment variable overrides
    const merged = this.applyEnvOverrides(rawConfig);

    // Validate with Zod schema
    const result = PlugpollConfigSchema.safeParse(merged);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${errors}`);
    }

    logger.info('Configuration loaded and validated successfully');
    this.logConfigSummary(result.data);

    return result.data;
  }

  // Mapping of lowercase env var keys to camelCase config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    devicetimeout: 'deviceTimeout',
    verifyssl: 'verifySsl',
  };

  /**
   * Apply PLUGPOLL_* environment variable overrides to configuration
   * Format: PLUGPOLL_SECTION_SUBSECTION_KEY (e.g., PLUGPOLL_POLLER_INTERVAL)
   */
  private applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
    const envVars = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));

    for (const [key, value] of envVars) {
      if (!value) continue;

      const pathParts = key
        .substring(ENV_PREFIX.length)
        .toLowerCase()
        .split('_')
        .map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);

      this.setNestedValue(config, pathParts, this.parseEnvValue(value));
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts.
   * A numeric part addresses an array item (e.g. destinations_0_token).
   */
  private setNestedValue(obj: Record<string, unknown>, pathParts: string[], value: unknown): void {
    let current: Record<string, unknown> = obj;

    for (let i = 0; i < pathParts.length - 1; i++) {
      const part = pathParts[i];
      const indexMatch = pathParts[i + 1].match(/^(\d+)$/);

      if (indexMatch) {
        const existing = current[part];
        const arr: unknown[] = Array.isArray(existing) ? existing : [];
        current[part] = arr;

        const index = parseInt(indexMatch[1], 10);
        const item = arr[index];
        const next: Record<string, unknown> = isRecord(item) ? item : {};
        arr[index] = next;

        if (i + 1 === pathParts.length - 1) {
          arr[index] = value;
          return;
        }

        current = next;
        i++; // Skip the index part
        continue;
      }

      const existing = current[part];
      const next: Record<string, unknown> = isRecord(existing) ? existing : {};
      current[part] = next;
      current = next;
    }

    const finalKey = pathParts[pathParts.length - 1];
    current[finalKey] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    // Boolean
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    // Number
    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    // String (default)
    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: PlugpollConfig): void {
    logger.info('Configuration summary:');

    const destinations = config.destinations.map((d) => d.name);
    logger.info(`  Destinations: ${destinations.join(', ') || 'none'}`);

    const families = Object.entries(config.devices)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}(${value?.devices.length ?? 0})`);
    logger.info(`  Devices: ${families.join(', ')}`);

    const mode = config.poller.persist
      ? `persistent, every ${config.poller.interval ?? '?'}s`
      : 'one-shot';
    logger.info(`  Mode: ${mode}`);
  }
}
