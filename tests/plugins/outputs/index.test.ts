import { describe, it, expect, vi } from 'vitest';
import {
  BaseOutputPlugin,
  InfluxDB2Plugin,
  getOutputPluginRegistry,
} from '../../../src/plugins/outputs';

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe('Output Plugins Index', () => {
  it('should export the plugin classes', () => {
    expect(typeof BaseOutputPlugin).toBe('function');
    expect(typeof InfluxDB2Plugin).toBe('function');
  });

  it('should register InfluxDB2 as the destination type', () => {
    const registry = getOutputPluginRegistry();

    expect([...registry.keys()]).toEqual(['influxdb2']);
    expect(registry.get('influxdb2')).toBe(InfluxDB2Plugin);
  });
});
