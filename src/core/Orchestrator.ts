import { createLogger } from './Logger';
import { describeError } from './errors';
import type { DevicePluginFactory, OutputPluginFactory } from './PluginManager';
import { PluginManager } from './PluginManager';
import { PollCycle } from './PollCycle';
import { buildBatch } from './MetricBatchBuilder';
import { FanoutWriter } from './FanoutWriter';
import { Scheduler } from './Scheduler';
import type { SleepFn } from './Scheduler';
import type { PlugpollConfig } from '../config/schemas/config.schema';
import type { VendorFamily } from '../types/plugin.types';
import type { SinkWriteOutcome } from '../types/metric.types';

const logger = createLogger('Orchestrator');

/**
 * Plugin registration entry
 */
interface PluginRegistration {
  devicePlugins: Map<VendorFamily, DevicePluginFactory>;
  outputPlugins: Map<string, OutputPluginFactory>;
}

export interface OrchestratorOptions {
  /** Install SIGINT/SIGTERM handlers that stop the loop */
  handleSignals?: boolean;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * Orchestrator is the main coordinator that ties everything together.
 * It manages the lifecycle of the application and handles graceful shutdown.
 */
export class Orchestrator {
  private pluginManager: PluginManager;
  private config: PlugpollConfig;
  private options: OrchestratorOptions;
  private scheduler: Scheduler;
  private pollCycle?: PollCycle;
  private fanoutWriter?: FanoutWriter;
  private isRunning = false;
  private shutdownPromise: Promise<void> | null = null;
  private signalHandler?: (signal: NodeJS.Signals) => void;

  constructor(config: PlugpollConfig, options: OrchestratorOptions = {}) {
    this.config = config;
    this.options = options;
    this.pluginManager = new PluginManager();
    // Rejects persistent mode without an interval before any device is touched
    this.scheduler = new Scheduler(() => this.runPass(), {
      persist: config.poller.persist,
      intervalSeconds: config.poller.interval,
      sleep: options.sleep,
    });
  }

  /**
   * Register plugins before starting
   */
  registerPlugins(registration: PluginRegistration): void {
    for (const [family, factory] of registration.devicePlugins) {
      this.pluginManager.registerDevicePlugin(family, factory);
    }

    for (const [type, factory] of registration.outputPlugins) {
      this.pluginManager.registerOutputPlugin(type, factory);
    }
  }

  /**
   * Initialize plugins and run the polling schedule.
   * Resolves after a one-shot pass, or once a persistent loop has been stopped.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Orchestrator is already running');
      return;
    }

    logger.info('Starting plugpoll orchestrator...');

    if (this.options.handleSignals ?? true) {
      this.setupSignalHandlers();
    }

    await this.pluginManager.initializeFromConfig(this.config);

    const healthResults = await this.pluginManager.healthCheck();
    for (const [name, healthy] of healthResults) {
      if (healthy) {
        logger.info(`Destination ${name}: healthy`);
      } else {
        logger.warn(`Destination ${name}: unhealthy`);
      }
    }

    this.pollCycle = new PollCycle(this.pluginManager.getPollTargets(), {
      concurrency: this.config.poller.concurrency,
      deviceTimeoutMs: this.config.poller.deviceTimeout * 1000,
    });
    this.fanoutWriter = new FanoutWriter(this.pluginManager.getSinkTargets());

    this.isRunning = true;
    const stats = this.pluginManager.getStats();
    logger.info(
      `plugpoll started with ${stats.activeDevices} device(s) and ${stats.activeDestinations} destination(s)`
    );

    await this.scheduler.run();
  }

  /**
   * One poll, build and write pass
   */
  async runCycle(): Promise<SinkWriteOutcome[]> {
    if (!this.pollCycle || !this.fanoutWriter) {
      throw new Error('Orchestrator has not been started');
    }

    const now = this.options.now ?? Date.now;
    const capturedAtNanos = BigInt(now()) * 1000000n;

    const readings = await this.pollCycle.run(capturedAtNanos);
    const points = buildBatch(readings);

    if (points.length === 0) {
      logger.warn('No readings collected this cycle, nothing to write');
      return [];
    }

    return this.fanoutWriter.writeAll(points);
  }

  private async runPass(): Promise<void> {
    await this.runCycle();
  }

  /**
   * Stop the loop and shut every plugin down
   */
  async stop(): Promise<void> {
    this.scheduler.stop();

    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    if (!this.isRunning) {
      this.removeSignalHandlers();
      return;
    }

    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    logger.info('Stopping plugpoll orchestrator...');
    this.isRunning = false;
    this.removeSignalHandlers();

    try {
      await this.pluginManager.shutdown();
      logger.info('plugpoll stopped');
    } catch (error) {
      logger.error(`Error during shutdown: ${describeError(error)}`);
      throw error;
    }
  }

  /**
   * A signal ends the loop; start() then resolves and the caller shuts down
   */
  private setupSignalHandlers(): void {
    this.signalHandler = (signal) => {
      logger.info(`Received ${signal}, stopping after the current pass...`);
      this.scheduler.stop();
    };

    process.on('SIGTERM', this.signalHandler);
    process.on('SIGINT', this.signalHandler);
  }

  private removeSignalHandlers(): void {
    if (!this.signalHandler) return;
    process.off('SIGTERM', this.signalHandler);
    process.off('SIGINT', this.signalHandler);
    this.signalHandler = undefined;
  }
}
