/**
 * Scan command implementation
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { TransportError, errorMessage } from '../../core/errors.js';
import type { ScanConfig } from '../../core/types.js';
import type { WebhookNotifier } from '../../notify/webhook.js';
import {
  addScanOptions,
  applyLogging,
  resolveInventory,
  resolveOutput,
  resolveScanConfig,
  resolveSubject,
  resolveTransport,
  type ScanCliOptions,
} from '../options.js';

export const scanCommand = addScanOptions(
  new Command('scan').description('Probe every inventory domain once and report expiring certificates')
).action(async (options: ScanCliOptions) => {
  let transport: WebhookNotifier | undefined;
  let exitCode = 0;

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

    if (!output.quiet) {
      printConfiguration(app.getConfig(), transport !== undefined);
    }

    const report = await app.run();

    if (!output.quiet) {
      console.log(
        report
          ? chalk.yellow.bold(`   ✔ Scan completed: ${report.entries.length} certificates need attention\n`)
          : chalk.green.bold('   ✔ Scan completed: nothing to report\n')
      );
    }
  } catch (error) {
    printFailure(error);
    exitCode = 1;
  } finally {
    await transport?.close();
  }

  process.exit(exitCode);
});

export function printConfiguration(config: ScanConfig, notify: boolean) {
  console.log(chalk.dim('\n   Configuration'));
  console.log(chalk.gray('   ├─ Threshold        : ') + chalk.white.bold(`${config.thresholdDays} days`));
  console.log(chalk.gray('   ├─ Concurrency      : ') + chalk.white(String(config.concurrency)));
  console.log(chalk.gray('   ├─ Probe timeout    : ') + chalk.white(`${config.probeTimeoutMs}ms`));
  console.log(chalk.gray('   ├─ Deadline         : ') + chalk.white(`${config.deadlineMs}ms`));
  console.log(
    chalk.gray('   └─ Notification     : ') + (notify ? chalk.green('webhook') : chalk.dim('disabled'))
  );
}

export function printFailure(error: unknown) {
  if (error instanceof TransportError && error.report) {
    console.log(chalk.red.bold('\n   ✘ Report computed but not delivered'));
    console.log(chalk.red('   Error: ') + chalk.white(error.message) + '\n');
    return;
  }
  console.log(chalk.red.bold('\n   ✘ Scan failed\n'));
  console.log(chalk.red('   Error: ') + chalk.white(errorMessage(error)));
  console.log(chalk.dim('\n   Check your input arguments, inventory and environment.\n'));
}
