import { MEASUREMENT } from '../types/metric.types';
import type { MetricPoint, Reading } from '../types/metric.types';

/**
 * One consumption point per reading, followed by a watts_today point when the
 * device reported cumulative usage. Order follows the map's insertion order.
 */
export function buildBatch(readings: ReadonlyMap<string, Reading>): MetricPoint[] {
  const points: MetricPoint[] = [];

  for (const [host, reading] of readings) {
    points.push({
      measurement: MEASUREMENT,
      tags: { host },
      fields: { consumption: reading.nowWatts },
      timestampNanos: reading.capturedAtNanos,
    });

    if (reading.todayWattHours !== undefined) {
      points.push({
        measurement: MEASUREMENT,
        tags: { host },
        fields: { watts_today: reading.todayWattHours },
        timestampNanos: reading.capturedAtNanos,
      });
    }
  }

  return points;
}
