/**
 * Plugin system types
 */

import type { MetricPoint, Reading } from './metric.types';

export interface PluginMetadata {
  name: string;
  version: string;
  description: string;
}

export type VendorFamily = 'kasa' | 'tapo';

export type AuthMode = 'all' | 'default_only' | 'legacy_only';

export interface Credentials {
  username: string;
  password: string;
}

export interface DeviceConfig {
  name: string;
  address: string;
  vendor: VendorFamily;
  authMode?: AuthMode;
}

export type PollFailureKind = 'DEVICE_UNREACHABLE' | 'AUTH_FAILURE' | 'PROTOCOL_SHAPE';

export interface PollFailure {
  readonly kind: PollFailureKind;
  readonly message: string;
}

export type PollResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: PollFailure };

/**
 * Single-device capability of a vendor family.
 * connect and readUsage reject with a DeviceError; disconnect never rejects.
 */
export interface DeviceClient<THandle, TRaw> {
  connect(address: string, credentials?: Credentials): Promise<THandle>;
  readUsage(handle: THandle): Promise<TRaw>;
  disconnect(handle: THandle): Promise<void>;
}

export interface DevicePlugin<TConfig = unknown> {
  readonly metadata: PluginMetadata;
  initialize(config: TConfig): Promise<void>;
  getDevices(): DeviceConfig[];
  poll(device: DeviceConfig, capturedAtNanos: bigint): Promise<PollResult<Reading>>;
  shutdown(): Promise<void>;
}

export interface MetricSink {
  writeBatch(bucket: string, org: string, points: readonly MetricPoint[]): Promise<void>;
}

export interface OutputPlugin<TConfig = unknown> extends MetricSink {
  readonly metadata: PluginMetadata;
  initialize(config: TConfig): Promise<void>;
  healthCheck(): Promise<boolean>;
  shutdown(): Promise<void>;
}

export interface SinkTarget {
  name: string;
  bucket: string;
  org: string;
  connection: MetricSink;
}
