import { DeviceError } from '../../core/errors';
import type { Credentials, DeviceClient } from '../../types/plugin.types';
import type { DeviceTransport, TransportScheme } from './transports/DeviceTransport';
import { isRecord } from './transports/DeviceTransport';
import { KlapTransport } from './transports/KlapTransport';
import { SecurePassthroughTransport } from './transports/SecurePassthroughTransport';

export type TransportFactory = (
  scheme: TransportScheme,
  address: string,
  credentials: Credentials
) => DeviceTransport;

export function createTapoTransportFactory(timeoutMs: number): TransportFactory {
  return (scheme, address, credentials) =>
    scheme === 'klap'
      ? new KlapTransport({ address, credentials, timeoutMs, authVersion: 2 })
      : new SecurePassthroughTransport({ address, credentials, timeoutMs });
}

/**
 * Tapo device client bound to a single authentication scheme.
 * connect performs the handshake and the credential login; readUsage asks for get_energy_usage.
 */
export class TapoDeviceClient implements DeviceClient<DeviceTransport, unknown> {
  readonly scheme: TransportScheme;
  private readonly createTransport: TransportFactory;

  constructor(scheme: TransportScheme, createTransport: TransportFactory) {
    this.scheme = scheme;
    this.createTransport = createTransport;
  }

  async connect(address: string, credentials?: Credentials): Promise<DeviceTransport> {
    if (!credentials) {
      throw new DeviceError('AUTH_FAILURE', 'Tapo devices require credentials');
    }

    const transport = this.createTransport(this.scheme, address, credentials);
    await transport.handshake();
    await transport.login();
    return transport;
  }

  async readUsage(transport: DeviceTransport): Promise<unknown> {
    const reply = await transport.send({ method: 'get_energy_usage' });

    if (isRecord(reply) && typeof reply.error_code === 'number' && reply.error_code !== 0) {
      throw new DeviceError(
        'PROTOCOL_SHAPE',
        `get_energy_usage rejected (error_code ${reply.error_code})`
      );
    }
    return reply;
  }

  async disconnect(transport: DeviceTransport): Promise<void> {
    transport.close();
  }
}
