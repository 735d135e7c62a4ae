import { createLogger } from './Logger';
import { IntervalMisconfigurationError, describeError } from './errors';

const logger = createLogger('Scheduler');

export type SleepFn = (ms: number) => Promise<void>;

export interface SchedulerOptions {
  persist: boolean;
  /** Whole seconds slept between passes; required when persist is set */
  intervalSeconds?: number;
  /** Replaces the built-in timer, mainly for tests */
  sleep?: SleepFn;
}

/**
 * Runs a polling pass once, or forever with a fixed sleep between passes.
 * The sleep starts after a pass finishes, so the cadence is interval plus pass duration.
 */
export class Scheduler {
  private readonly pass: () => Promise<void>;
  private readonly options: SchedulerOptions;
  private stopRequested = false;
  private timer?: NodeJS.Timeout;
  private wake?: () => void;

  constructor(pass: () => Promise<void>, options: SchedulerOptions) {
    if (options.persist && options.intervalSeconds === undefined) {
      throw new IntervalMisconfigurationError();
    }
    this.pass = pass;
    this.options = options;
  }

  async run(): Promise<void> {
    if (!this.options.persist) {
      await this.pass();
      return;
    }

    const intervalSeconds = this.options.intervalSeconds;
    if (intervalSeconds === undefined) {
      throw new IntervalMisconfigurationError();
    }

    logger.info(`Polling every ${intervalSeconds}s`);

    while (!this.stopRequested) {
      try {
        await this.pass();
      } catch (error) {
        logger.error(`Polling pass failed: ${describeError(error)}`);
      }

      if (this.stopRequested) break;
      logger.debug(`Sleeping ${intervalSeconds}s`);
      await this.wait(intervalSeconds * 1000);
    }

    logger.info('Polling loop stopped');
  }

  /**
   * Ends the loop after the current pass; a pending sleep is cut short
   */
  stop(): void {
    this.stopRequested = true;
    clearTimeout(this.timer);
    this.wake?.();
  }

  isStopped(): boolean {
    return this.stopRequested;
  }

  private wait(ms: number): Promise<void> {
    const { sleep } = this.options;
    if (sleep) {
      return Promise.race([
        sleep(ms),
        new Promise<void>((resolve) => {
          this.wake = resolve;
        }),
      ]);
    }

    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(resolve, ms);
    });
  }
}
