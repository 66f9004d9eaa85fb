/**
 * Watch command: repeat the scan on a fixed interval until interrupted
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { errorMessage } from '../../core/errors.js';
import { IntervalTrigger } from '../../core/trigger.js';
import { logger } from '../../utils/logger.js';
import type { WebhookNotifier } from '../../notify/webhook.js';
import {
  addScanOptions,
  applyLogging,
  parseNumber,
  resolveInventory,
  resolveOutput,
  resolveScanConfig,
  resolveSubject,
  resolveTransport,
  type ScanCliOptions,
} from '../options.js';
import { printConfiguration, printFailure } from './scan.js';

interface WatchCliOptions extends ScanCliOptions {
  every: number;
  runOnStartup: boolean;
}

export const watchCommand = addScanOptions(
  new Command('watch').description('Scan repeatedly on a fixed interval')
)
  .option('--every <minutes>', 'Minutes between scans (at most 35791)', parseNumber, 1440)
  .option('--run-on-startup', 'Scan once immediately', false)
  .action(async (options: WatchCliOptions) => {
    let transport: WebhookNotifier | undefined;
    let trigger: IntervalTrigger;

    try {
      applyLogging(options);
      const output = resolveOutput(options);
      transport = resolveTransport(options);
      const app = new App(
        resolveScanConfig(options),
        {
          inventory: resolveInventory(options),
          transport,
          render: { subject: resolveSubject(options) },
        },
        output
      );
      trigger = new IntervalTrigger(() => app.run(), {
        everyMs: options.every * 60_000,
        runOnStartup: options.runOnStartup,
      });
      if (!output.quiet) {
        printConfiguration(app.getConfig(), transport !== undefined);
      }
    } catch (error) {
      printFailure(error);
      await transport?.close();
      process.exit(1);
    }

    const shutdown = async () => {
      logger.info('Stopping watch, waiting for the current scan');
      await trigger.stop();
      await transport?.close();
      const stats = trigger.getStats();
      logger.info(`Watch stopped after ${stats.runs} scans`, { skipped: stats.skipped });
      process.exit(0);
    };
    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    logger.info(chalk.cyan(`Watching: a scan every ${options.every} minutes`));
    trigger.start();
  });
