import type { PollFailure, PollFailureKind } from '../types/plugin.types';

/**
 * Configuration could not be loaded, parsed or validated. Fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Persistent mode was requested without a polling interval. Fatal.
 */
export class IntervalMisconfigurationError extends Error {
  constructor(message = 'Persistent mode requires poller.interval to be set') {
    super(message);
    this.name = 'IntervalMisconfigurationError';
  }
}

/**
 * A connect, login or read step against a single device failed.
 * Contained at the device-poll boundary and turned into a PollFailure.
 */
export class DeviceError extends Error {
  readonly kind: PollFailureKind;

  constructor(kind: PollFailureKind, message: string) {
    super(message);
    this.name = 'DeviceError';
    this.kind = kind;
  }

  toFailure(): PollFailure {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * A destination rejected or could not accept a batch.
 */
export class SinkWriteError extends Error {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`Write to ${target} failed: ${describeError(cause)}`);
    this.name = 'SinkWriteError';
    this.target = target;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Map anything thrown during a device poll onto a failure value.
 * Errors that are not DeviceErrors count as the device being unreachable.
 */
export function toPollFailure(error: unknown): PollFailure {
  if (error instanceof DeviceError) {
    return error.toFailure();
  }
  return { kind: 'DEVICE_UNREACHABLE', message: describeError(error) };
}

export function formatPollFailure(failure: PollFailure): string {
  switch (failure.kind) {
    case 'DEVICE_UNREACHABLE':
      return `device unreachable: ${failure.message}`;
    case 'AUTH_FAILURE':
      return `authentication failed: ${failure.message}`;
    case 'PROTOCOL_SHAPE':
      return `unexpected response: ${failure.message}`;
  }
}
