/**
 * Interval trigger for repeated scans. Runs never overlap: a tick that arrives
 * while the previous run is still going is skipped.
 */

import { logger } from '../utils/logger.js';
import { MAX_TIMER_MS } from '../utils/concurrency.js';
import { ConfigError, errorMessage } from './errors.js';

export interface IntervalTriggerOptions {
  everyMs: number;
  runOnStartup: boolean;
}

export class IntervalTrigger {
  private task: () => Promise<unknown>;
  private options: IntervalTriggerOptions;
  private timer?: NodeJS.Timeout;
  private running?: Promise<void>;
  private runs = 0;
  private skipped = 0;

  /**
   * Throws ConfigError when the interval is not a usable timer delay
   */
  constructor(task: () => Promise<unknown>, options: IntervalTriggerOptions) {
    if (!Number.isFinite(options.everyMs) || options.everyMs <= 0 || options.everyMs > MAX_TIMER_MS) {
      throw new ConfigError([
        `interval must be between 1 and ${MAX_TIMER_MS}ms (got ${options.everyMs}ms)`,
      ]);
    }
    this.task = task;
    this.options = options;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.options.everyMs);
    if (this.options.runOnStartup) {
      this.tick();
    }
  }

  /**
   * Stop scheduling and wait for a run in progress to finish
   */
  async stop(): Promise<void> {
    clearInterval(this.timer);
    this.timer = undefined;
    await this.running;
  }

  getStats() {
    return { runs: this.runs, skipped: this.skipped, active: this.running !== undefined };
  }

  private tick(): void {
    if (this.running) {
      this.skipped += 1;
      logger.warn('Previous scan still running; skipping this tick');
      return;
    }

    this.runs += 1;
    this.running = Promise.resolve()
      .then(() => this.task())
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error(`Scheduled scan failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running = undefined;
      });
  }
}
