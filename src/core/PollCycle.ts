import { createLogger } from './Logger';
import { formatPollFailure, toPollFailure } from './errors';
import { mapWithConcurrency, withTimeout } from '../utils';
import type { PollResult } from '../types/plugin.types';
import type { Reading } from '../types/metric.types';
import type { PollTarget } from './PluginManager';

const logger = createLogger('PollCycle');

export interface PollCycleOptions {
  /** Device polls in flight at once */
  concurrency: number;
  /** Upper bound on a single device poll */
  deviceTimeoutMs: number;
}

export function describeReading(reading: Reading): string {
  const today =
    reading.todayWattHours === undefined
      ? 'today not supplied'
      : `today ${reading.todayWattHours} Wh`;
  return `${reading.deviceName}: ${reading.nowWatts} W now, ${today}`;
}

/**
 * Visits every configured device once and collects the readings that succeeded.
 */
export class PollCycle {
  private readonly targets: readonly PollTarget[];
  private readonly options: PollCycleOptions;

  constructor(targets: readonly PollTarget[], options: PollCycleOptions) {
    this.targets = targets;
    this.options = options;
  }

  /**
   * Readings keyed by device name, in device-configuration order.
   * A later device with the same name replaces the earlier reading.
   */
  async run(capturedAtNanos: bigint): Promise<Map<string, Reading>> {
    const results = await mapWithConcurrency(this.targets, this.options.concurrency, (target) =>
      this.pollOne(target, capturedAtNanos)
    );

    const readings = new Map<string, Reading>();
    results.forEach((result, index) => {
      const { device } = this.targets[index];
      if (result.ok) {
        logger.info(describeReading(result.value));
        readings.set(device.name, result.value);
      } else {
        logger.warn(`${device.name} (${device.address}): ${formatPollFailure(result.failure)}`);
      }
    });

    logger.debug(`Cycle produced ${readings.size} of ${this.targets.length} readings`);
    return readings;
  }

  private async pollOne(target: PollTarget, capturedAtNanos: bigint): Promise<PollResult<Reading>> {
    try {
      return await withTimeout(
        target.plugin.poll(target.device, capturedAtNanos),
        this.options.deviceTimeoutMs,
        `no reading within ${this.options.deviceTimeoutMs}ms`
      );
    } catch (error) {
      return { ok: false, failure: toPollFailure(error) };
    }
  }
}
