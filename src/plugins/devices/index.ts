import type { VendorFamily } from '../../types/plugin.types';
import type { DevicePluginFactory } from '../../core/PluginManager';

// Plugin imports
import { KasaPlugin } from './KasaPlugin';
import { TapoPlugin } from './TapoPlugin';

// Re-exports for direct usage
export { BaseDevicePlugin, attemptPoll } from './BaseDevicePlugin';
export type { BaseDeviceConfig } from './BaseDevicePlugin';
export { KasaPlugin } from './KasaPlugin';
export { TapoPlugin } from './TapoPlugin';
export { AuthNegotiator } from './AuthNegotiator';
export { normalizeKasa, normalizeTapo } from './ReadingNormalizer';

/**
 * Build the registry keyed by the family's configuration key
 */
export function getDevicePluginRegistry(): Map<VendorFamily, DevicePluginFactory> {
  return new Map<VendorFamily, DevicePluginFactory>([
    ['kasa', KasaPlugin],
    ['tapo', TapoPlugin],
  ]);
}
