/**
 * Options shared by the scan and watch commands.
 * Precedence: command-line flags, then environment variables, then defaults.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readScanConfigFromEnv, readWebhookConfigFromEnv } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import {
  DomainListInventorySource,
  JsonFileInventorySource,
  type InventorySource,
} from '../inventory/sources.js';
import { WebhookNotifier } from '../notify/webhook.js';
import { isLogLevel, logger } from '../utils/logger.js';
import type { OutputOptions, ScanConfig } from '../core/types.js';

type Env = Record<string, string | undefined>;

export interface ScanCliOptions {
  inventory?: string;
  domains?: string;
  threshold?: number;
  timeout?: number;
  deadline?: number;
  concurrency?: number;
  port?: number;
  retries?: number;
  format: string;
  export?: string;
  notify: boolean;
  subject?: string;
  quiet: boolean;
  logLevel: string;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function addScanOptions(command: Command): Command {
  return command
    .option('-i, --inventory <file>', 'JSON inventory file (hosts, certificates, domains)')
    .option('--domains <list>', 'Comma-separated domains, one certificate each (env: DOMAINS)')
    .option(
      '-t, --threshold <days>',
      'Flag certificates expiring within this many days',
      parseNumber
    )
    .option('--timeout <ms>', 'Per-probe timeout in milliseconds', parseNumber)
    .option('--deadline <ms>', 'Overall scan deadline in milliseconds', parseNumber)
    .option('-c, --concurrency <number>', 'Simultaneous probes', parseNumber)
    .option('-p, --port <number>', 'Port for domains without an explicit port', parseNumber)
    .option('--retries <number>', 'Retries for unreachable or timed-out domains', parseNumber)
    .option('-f, --format <type>', 'Output format: text|json', 'text')
    .option('-e, --export <file>', 'Export results to file')
    .option('--notify', 'Send the report through the webhook configured in the environment', false)
    .option('--subject <text>', 'Notification subject (env: EMAIL_SUBJECT)')
    .option('-q, --quiet', 'Suppress output', false)
    .option('--log-level <level>', 'Log level: debug|info|warn|error', 'info');
}

export function resolveScanConfig(
  options: ScanCliOptions,
  env: Env = process.env
): Partial<ScanConfig> {
  const config = readScanConfigFromEnv(env);
  if (options.threshold !== undefined) config.thresholdDays = options.threshold;
  if (options.timeout !== undefined) config.probeTimeoutMs = options.timeout;
  if (options.deadline !== undefined) config.deadlineMs = options.deadline;
  if (options.concurrency !== undefined) config.concurrency = options.concurrency;
  if (options.port !== undefined) config.defaultPort = options.port;
  if (options.retries !== undefined) config.retries = options.retries;
  return config;
}

export function resolveOutput(options: ScanCliOptions): OutputOptions {
  if (options.format !== 'text' && options.format !== 'json') {
    throw new ConfigError([`Invalid format: ${options.format}. Use text or json.`]);
  }
  return { format: options.format, export: options.export, quiet: options.quiet };
}

/**
 * --inventory wins over --domains, which wins over DOMAINS
 */
export function resolveInventory(
  options: Pick<ScanCliOptions, 'inventory' | 'domains'>,
  env: Env = process.env
): InventorySource {
  if (options.inventory) {
    return new JsonFileInventorySource(options.inventory);
  }
  const list = options.domains ?? env.DOMAINS;
  if (list && list.trim()) {
    return DomainListInventorySource.fromCommaList(list);
  }
  throw new ConfigError(['No inventory: pass --inventory <file>, --domains <list> or set DOMAINS']);
}

/**
 * The webhook transport, when --notify is set
 */
export function resolveTransport(
  options: Pick<ScanCliOptions, 'notify'>,
  env: Env = process.env
): WebhookNotifier | undefined {
  if (!options.notify) return undefined;
  const webhook = readWebhookConfigFromEnv(env);
  if (!webhook) {
    throw new ConfigError(['--notify requires WEBHOOK_URL to be set']);
  }
  return new WebhookNotifier(webhook);
}

export function resolveSubject(
  options: Pick<ScanCliOptions, 'subject'>,
  env: Env = process.env
): string | undefined {
  return options.subject ?? (env.EMAIL_SUBJECT?.trim() || undefined);
}

export function applyLogging(options: Pick<ScanCliOptions, 'quiet' | 'logLevel'>) {
  if (!isLogLevel(options.logLevel)) {
    throw new ConfigError([`Invalid log level: ${options.logLevel}`]);
  }
  logger.setLevel(options.logLevel);
  logger.setQuiet(options.quiet);
}
