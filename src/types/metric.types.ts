/**
 * Readings and the metric points derived from them
 */

export const MEASUREMENT = 'power_watts';

export interface Reading {
  deviceName: string;
  nowWatts: number;
  /** Absent when the device did not report cumulative usage this cycle */
  todayWattHours?: number;
  capturedAtNanos: bigint;
}

export type MetricFields = { consumption: number } | { watts_today: number };

export interface MetricPoint {
  measurement: typeof MEASUREMENT;
  tags: { host: string };
  fields: MetricFields;
  timestampNanos: bigint;
}

export interface SinkWriteOutcome {
  target: string;
  ok: boolean;
  pointsWritten: number;
  error?: string;
}
