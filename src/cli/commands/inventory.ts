/**
 * Inventory command: load the inventory and print it as a tree without probing
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { describeInventory, type CertificateNode, type InventoryTree } from '../../inventory/describe.js';
import { errorMessage } from '../../core/errors.js';
import { resolveInventory } from '../options.js';

interface InventoryCliOptions {
  inventory?: string;
  domains?: string;
  format: string;
}

export const inventoryCommand = new Command('inventory')
  .description('Show hosts, certificates and domains as they would be scanned')
  .option('-i, --inventory <file>', 'JSON inventory file (hosts, certificates, domains)')
  .option('--domains <list>', 'Comma-separated domains, one certificate each (env: DOMAINS)')
  .option('-f, --format <type>', 'Output format: text|json', 'text')
  .action(async (options: InventoryCliOptions) => {
    try {
      const source = resolveInventory(options);
      const tree = describeInventory(await source.load());

      if (options.format === 'json') {
        console.log(JSON.stringify(tree, null, 2));
        return;
      }
      console.log(chalk.dim(`\n   Source: ${source.description}\n`));
      console.log(formatTree(tree));
    } catch (error) {
      console.log(chalk.red.bold('\n   ✘ Cannot read inventory\n'));
      console.log(chalk.red('   Error: ') + chalk.white(errorMessage(error)) + '\n');
      process.exit(1);
    }
  });

function formatCertificate(node: CertificateNode, indent: string, last: boolean): string[] {
  const branch = last ? '└─' : '├─';
  const lines = [
    `${indent}${chalk.gray(branch)} ${chalk.white.bold(node.certificate.name)} ${chalk.dim(
      `[${node.certificate.visibility}]`
    )}`,
  ];
  const childIndent = indent + (last ? '   ' : chalk.gray('│  '));
  node.domains.forEach((domain, i) => {
    const domainBranch = i === node.domains.length - 1 ? '└─' : '├─';
    lines.push(`${childIndent}${chalk.gray(domainBranch)} ${chalk.cyan(domain.name)}`);
  });
  if (node.domains.length === 0) {
    lines.push(`${childIndent}${chalk.gray('└─')} ${chalk.dim('no domains (not probed)')}`);
  }
  return lines;
}

export function formatTree(tree: InventoryTree): string {
  const lines: string[] = [];

  for (const { host, certificates } of tree.hosts) {
    lines.push(`   ${chalk.magenta.bold(host.name)}`);
    certificates.forEach((node, i) => {
      lines.push(...formatCertificate(node, '   ', i === certificates.length - 1));
    });
    lines.push('');
  }

  if (tree.unassignedCertificates.length > 0) {
    lines.push(`   ${chalk.yellow.bold('No host')}`);
    tree.unassignedCertificates.forEach((node, i) => {
      lines.push(...formatCertificate(node, '   ', i === tree.unassignedCertificates.length - 1));
    });
    lines.push('');
  }

  if (tree.unassignedDomains.length > 0) {
    lines.push(`   ${chalk.red.bold('Domains without a certificate')} ${chalk.dim('(skipped)')}`);
    for (const domain of tree.unassignedDomains) {
      lines.push(`   ${chalk.gray('•')} ${domain.name}`);
    }
    lines.push('');
  }

  if (tree.unusedCertificates.length > 0) {
    lines.push(`   ${chalk.dim.bold('Unused certificates')} ${chalk.dim('(no domains, never probed)')}`);
    for (const certificate of tree.unusedCertificates) {
      lines.push(`   ${chalk.gray('•')} ${certificate.name}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
