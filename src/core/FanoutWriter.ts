import { createLogger } from './Logger';
import { SinkWriteError } from './errors';
import type { SinkTarget } from '../types/plugin.types';
import type { MetricPoint, SinkWriteOutcome } from '../types/metric.types';

const logger = createLogger('FanoutWriter');

/**
 * Writes each batch to every destination. One destination failing does not
 * stop the others; nothing is retried.
 */
export class FanoutWriter {
  private readonly targets: readonly SinkTarget[];

  constructor(targets: readonly SinkTarget[]) {
    this.targets = targets;
  }

  async writeAll(points: readonly MetricPoint[]): Promise<SinkWriteOutcome[]> {
    return Promise.all(this.targets.map((target) => this.writeOne(target, points)));
  }

  private async writeOne(
    target: SinkTarget,
    points: readonly MetricPoint[]
  ): Promise<SinkWriteOutcome> {
    try {
      await target.connection.writeBatch(target.bucket, target.org, points);
      logger.info(`${target.name}: wrote ${points.length} points`);
      return { target: target.name, ok: true, pointsWritten: points.length };
    } catch (error) {
      const failure = new SinkWriteError(target.name, error);
      logger.error(failure.message);
      return { target: target.name, ok: false, pointsWritten: 0, error: failure.message };
    }
  }
}
