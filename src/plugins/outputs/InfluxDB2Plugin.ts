import { InfluxDB, Point, HttpError } from '@influxdata/influxdb-client';
import { HealthAPI } from '@influxdata/influxdb-client-apis';
import { z } from 'zod';
import { BaseOutputPlugin } from './BaseOutputPlugin';
import type { PluginMetadata } from '../../types/plugin.types';
import type { MetricPoint } from '../../types/metric.types';
import { InfluxDB2ConfigSchema } from '../../config/schemas/config.schema';

export type InfluxDB2Config = z.infer<typeof InfluxDB2ConfigSchema>;

/**
 * InfluxDB 2.x output plugin
 * Uses the official InfluxDB 2.x client with token authentication
 */
export class InfluxDB2Plugin extends BaseOutputPlugin<InfluxDB2Config> {
  readonly metadata: PluginMetadata = {
    name: 'InfluxDB2',
    version: '1.0.0',
    description: 'InfluxDB 2.x destination',
  };

  private client!: InfluxDB;

  /**
   * Initialize the InfluxDB 2.x client. The client is kept for the process lifetime.
   */
  async initialize(config: InfluxDB2Config): Promise<void> {
    await super.initialize(config);

    const url = this.getBaseUrl();

    this.client = new InfluxDB({
      url,
      token: this.config.token,
      transportOptions: {
        rejectUnauthorized: this.config.verifySsl,
      },
    });

    this.logger.info(
      `Connected to InfluxDB 2.x at ${url} (org: ${this.config.org}, bucket: ${this.config.bucket})`
    );
  }

  /**
   * Write all points in one request. Failed batches are not retried.
   * The buffer is sized above the batch: writePoints must not auto-flush, since only
   * an explicit flush() reports a rejection.
   */
  async writeBatch(bucket: string, org: string, points: readonly MetricPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }

    const writeApi = this.client.getWriteApi(org, bucket, 'ns', {
      batchSize: points.length + 1,
      maxRetries: 0,
    });

    try {
      writeApi.writePoints(points.map((point) => this.convertToInfluxPoint(point)));
      await writeApi.flush();
      this.logger.debug(`Wrote ${points.length} points to ${this.config.name}`);
    } catch (error) {
      if (error instanceof HttpError) {
        this.logger.debug(`InfluxDB 2.x rejected batch: ${error.statusCode} - ${error.message}`);
      }
      throw error;
    } finally {
      await writeApi.close();
    }
  }

  /**
   * Convert a MetricPoint to InfluxDB 2.x Point format
   */
  private convertToInfluxPoint(metric: MetricPoint): Point {
    const point = new Point(metric.measurement).tag('host', metric.tags.host);

    for (const [key, value] of Object.entries(metric.fields)) {
      point.floatField(key, value);
    }

    return point.timestamp(metric.timestampNanos.toString());
  }

  /**
   * Check if InfluxDB is healthy
   */
  async healthCheck(): Promise<boolean> {
    try {
      const healthApi = new HealthAPI(this.client);
      const health = await healthApi.getHealth();
      return health.status === 'pass';
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.debug(`Health check for ${this.config.name} failed: ${message}`);
      return false;
    }
  }
}
