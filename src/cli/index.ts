#!/usr/bin/env node

/**
 * certwatch CLI entry point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { inventoryCommand } from './commands/inventory.js';
import { watchCommand } from './commands/watch.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('certwatch')
  .description('TLS certificate expiry scanner for a host and domain inventory')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('CERTWATCH')} ${chalk.gray(`v${VERSION}`)}                                    ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('TLS certificate expiry scanner')}                           ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);
program.addCommand(inventoryCommand);
program.addCommand(watchCommand);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
