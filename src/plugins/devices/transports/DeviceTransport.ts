import axios from 'axios';
import { DeviceError } from '../../../core/errors';
import { formatHttpError, isNetworkError } from '../../../utils/http';
import type { Credentials } from '../../../types/plugin.types';

export type TransportScheme = 'klap' | 'securePassthrough';

export type TransportStep = 'handshake' | 'login' | 'request';

export interface TransportOptions {
  address: string;
  credentials: Credentials;
  timeoutMs: number;
}

/**
 * An authenticated session with one device. Opened and discarded within a single poll.
 */
export interface DeviceTransport {
  readonly scheme: TransportScheme;
  /** Connection handshake */
  handshake(): Promise<void>;
  /** Credential login; requires a completed handshake */
  login(): Promise<void>;
  /** Send one JSON request over the authenticated session */
  send(request: Record<string, unknown>): Promise<unknown>;
  close(): void;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the TP_SESSIONID cookie out of a Set-Cookie header
 */
export function extractSessionCookie(header: unknown): string | undefined {
  const values = Array.isArray(header) ? header : [header];

  for (const value of values) {
    if (typeof value !== 'string') continue;
    const match = value.match(/TP_SESSIONID=([^;]+)/);
    if (match) {
      return `TP_SESSIONID=${match[1]}`;
    }
  }

  return undefined;
}

/**
 * Classify a failed HTTP exchange with a device
 */
export function toDeviceError(error: unknown, step: TransportStep): DeviceError {
  if (error instanceof DeviceError) {
    return error;
  }

  const message = `${step} failed: ${formatHttpError(error)}`;

  if (isNetworkError(error) || !axios.isAxiosError(error)) {
    return new DeviceError('DEVICE_UNREACHABLE', message);
  }
  if (step === 'login') {
    return new DeviceError('AUTH_FAILURE', message);
  }
  return new DeviceError('PROTOCOL_SHAPE', message);
}

export function parseJson(text: string, step: TransportStep): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new DeviceError('PROTOCOL_SHAPE', `${step} returned a body that is not JSON`);
  }
}
