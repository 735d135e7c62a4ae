import { describe, it, expect, vi } from 'vitest';
import { attemptPoll } from '../../../src/plugins/devices/BaseDevicePlugin';
import { DeviceError } from '../../../src/core/errors';
import type { DeviceClient } from '../../../src/types/plugin.types';

const { logger } = vi.hoisted(() => ({
  logger: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => logger,
}));

function client(overrides: Partial<DeviceClient<string, number>> = {}) {
  return {
    connect: vi.fn(async () => 'handle'),
    readUsage: vi.fn(async () => 7),
    disconnect: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('attemptPoll', () => {
  it('should connect, read and disconnect', async () => {
    const fake = client();

    expect(await attemptPoll(fake, '10.0.0.1')).toEqual({ ok: true, value: 7 });
    expect(fake.disconnect).toHaveBeenCalledWith('handle');
  });

  it('should not disconnect when connect fails', async () => {
    const disconnect = vi.fn(async () => undefined);
    const fake = client({
      connect: async () => {
        throw new DeviceError('AUTH_FAILURE', 'rejected');
      },
      disconnect,
    });

    expect(await attemptPoll(fake, '10.0.0.1')).toEqual({
      ok: false,
      failure: { kind: 'AUTH_FAILURE', message: 'rejected' },
    });
    expect(disconnect).not.toHaveBeenCalled();
  });

  it('should disconnect after a failed read', async () => {
    const disconnect = vi.fn(async () => undefined);
    const fake = client({
      readUsage: async () => {
        throw new Error('socket hang up');
      },
      disconnect,
    });

    expect(await attemptPoll(fake, '10.0.0.1')).toEqual({
      ok: false,
      failure: { kind: 'DEVICE_UNREACHABLE', message: 'socket hang up' },
    });
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it('should keep the reading when disconnect fails', async () => {
    const fake = client({
      disconnect: async () => {
        throw new Error('already closed');
      },
    });

    expect(await attemptPoll(fake, '10.0.0.1')).toEqual({ ok: true, value: 7 });
    expect(logger.debug).toHaveBeenCalledWith('Disconnect from 10.0.0.1 failed: already closed');
  });
});
