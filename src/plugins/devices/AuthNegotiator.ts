import { createLogger } from '../../core/Logger';
import { formatPollFailure } from '../../core/errors';
import type {
  AuthMode,
  Credentials,
  DeviceClient,
  PollFailure,
  PollResult,
} from '../../types/plugin.types';
import type { DeviceTransport, TransportScheme } from './transports/DeviceTransport';
import { attemptPoll } from './BaseDevicePlugin';

const logger = createLogger('AuthNegotiator');

/**
 * Schemes tried for each auth mode, in order. KLAP is the default scheme,
 * securePassthrough the legacy one.
 */
export const SCHEME_ORDER: Readonly<Record<AuthMode, readonly TransportScheme[]>> = {
  all: ['klap', 'securePassthrough'],
  default_only: ['klap'],
  legacy_only: ['securePassthrough'],
};

export interface NegotiatedUsage {
  scheme: TransportScheme;
  raw: unknown;
}

export type SchemeClients = Readonly<Record<TransportScheme, DeviceClient<DeviceTransport, unknown>>>;

/**
 * Finds the scheme a device currently speaks and returns its raw energy usage.
 * Nothing is remembered between calls: firmware can change between polls.
 */
export class AuthNegotiator {
  private readonly clients: SchemeClients;

  constructor(clients: SchemeClients) {
    this.clients = clients;
  }

  async negotiate(
    address: string,
    credentials: Credentials,
    authMode: AuthMode = 'all'
  ): Promise<PollResult<NegotiatedUsage>> {
    const failures: string[] = [];
    let lastFailure: PollFailure | undefined;

    for (const scheme of SCHEME_ORDER[authMode]) {
      const result = await attemptPoll(this.clients[scheme], address, credentials);

      if (result.ok) {
        logger.debug(`${address}: ${scheme} succeeded`);
        return { ok: true, value: { scheme, raw: result.value } };
      }

      // Probing the wrong scheme fails routinely
      logger.debug(`${address}: ${scheme} attempt failed, ${formatPollFailure(result.failure)}`);
      failures.push(`${scheme}: ${result.failure.message}`);
      lastFailure = result.failure;
    }

    return {
      ok: false,
      failure: {
        kind: lastFailure?.kind ?? 'AUTH_FAILURE',
        message: `no scheme produced a reading (${failures.join('; ')})`,
      },
    };
  }
}
