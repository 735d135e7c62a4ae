import type { PollResult } from '../../types/plugin.types';
import type { Reading } from '../../types/metric.types';
import type { KasaRawUsage } from '../../types/devices/kasa.types';
import { isRecord } from './transports/DeviceTransport';

/*
 * Raw vendor responses in, Readings out. Anything ambiguous fails closed:
 * no Reading is produced rather than a guessed value.
 */

function shapeError(message: string): PollResult<Reading> {
  return { ok: false, failure: { kind: 'PROTOCOL_SHAPE', message } };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Values this family uses for "not reported yet". A reported zero cannot be told
 * apart from them, so all count as absent.
 */
function isZeroLike(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === false ||
    value === 0 ||
    value === '' ||
    (typeof value === 'number' && Number.isNaN(value))
  );
}

function buildReading(
  deviceName: string,
  nowWatts: number,
  todayWattHours: number | undefined,
  capturedAtNanos: bigint
): Reading {
  const reading: Reading = { deviceName, nowWatts, capturedAtNanos };
  if (todayWattHours !== undefined) {
    reading.todayWattHours = todayWattHours;
  }
  return reading;
}

/**
 * Kasa: power in milliwatts, today in kilowatt-hours (or today_wh in watt-hours)
 */
export function normalizeKasa(
  deviceName: string,
  raw: KasaRawUsage,
  capturedAtNanos: bigint
): PollResult<Reading> {
  if (!isFiniteNumber(raw.power_mw)) {
    return shapeError(`power_mw is ${JSON.stringify(raw.power_mw) ?? 'missing'}`);
  }

  let todayWattHours: number | undefined;
  if (!isZeroLike(raw.today_wh)) {
    if (!isFiniteNumber(raw.today_wh)) {
      return shapeError(`today_wh is ${JSON.stringify(raw.today_wh)}`);
    }
    todayWattHours = raw.today_wh;
  } else if (!isZeroLike(raw.today)) {
    if (!isFiniteNumber(raw.today)) {
      return shapeError(`today is ${JSON.stringify(raw.today)}`);
    }
    todayWattHours = raw.today * 1000;
  }

  return {
    ok: true,
    value: buildReading(deviceName, raw.power_mw / 1000, todayWattHours, capturedAtNanos),
  };
}

/**
 * Newer Tapo firmware returns the usage fields at the top level; older firmware
 * nests them under `result`. Both are brought to the nested form.
 */
export function wrapTapoUsage(raw: unknown): unknown {
  if (isRecord(raw) && !('result' in raw) && 'current_power' in raw) {
    return { result: raw };
  }
  return raw;
}

/**
 * Tapo: current_power in milliwatts, today_energy already in watt-hours
 */
export function normalizeTapo(
  deviceName: string,
  raw: unknown,
  capturedAtNanos: bigint
): PollResult<Reading> {
  const wrapped = wrapTapoUsage(raw);

  if (!isRecord(wrapped) || !isRecord(wrapped.result)) {
    return shapeError('energy usage reply has no result object');
  }

  const usage = wrapped.result;
  if (!isFiniteNumber(usage.current_power)) {
    return shapeError(`current_power is ${JSON.stringify(usage.current_power) ?? 'missing'}`);
  }

  let todayWattHours: number | undefined;
  if ('today_energy' in usage) {
    if (!isFiniteNumber(usage.today_energy)) {
      return shapeError(`today_energy is ${JSON.stringify(usage.today_energy)}`);
    }
    todayWattHours = usage.today_energy;
  }

  return {
    ok: true,
    value: buildReading(deviceName, usage.current_power / 1000, todayWattHours, capturedAtNanos),
  };
}
