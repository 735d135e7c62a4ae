import type { OutputPluginFactory } from '../../core/PluginManager';
import { DESTINATION_TYPE } from '../../core/PluginManager';

// Plugin imports
import { InfluxDB2Plugin } from './InfluxDB2Plugin';

// Re-exports for direct usage
export { BaseOutputPlugin } from './BaseOutputPlugin';
export type { BaseOutputConfig } from './BaseOutputPlugin';
export { InfluxDB2Plugin } from './InfluxDB2Plugin';
export type { InfluxDB2Config } from './InfluxDB2Plugin';

/**
 * Build the registry keyed by output type
 */
export function getOutputPluginRegistry(): Map<string, OutputPluginFactory> {
  return new Map<string, OutputPluginFactory>([[DESTINATION_TYPE, InfluxDB2Plugin]]);
}
