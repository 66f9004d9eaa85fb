/**
 * Scan and webhook configuration: defaults, environment loading and validation
 */

import { ConfigError } from './errors.js';
import { isValidUrl } from '../utils/http.js';
import { MAX_TIMER_MS } from '../utils/concurrency.js';
import { ABANDON_GRACE_MS } from './scheduler.js';
import type { ScanConfig } from './types.js';

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = {
  thresholdDays: 30,
  probeTimeoutMs: 5000,
  deadlineMs: 120000,
  concurrency: 10,
  defaultPort: 443,
  retries: 0,
  retryDelayMs: 500,
};

export interface WebhookConfig {
  url: string;
  username: string;
  password: string;
  to: string;
  sender: string;
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Read a numeric variable. Unparseable values become NaN so validation rejects
 * them instead of silently using the default.
 */
function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  return Number(raw);
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Merge a partial config over the defaults and validate every field.
 * All issues are reported together.
 */
export function validateScanConfig(input: Partial<ScanConfig> = {}): ScanConfig {
  const merged: ScanConfig = {
    thresholdDays: input.thresholdDays ?? DEFAULT_SCAN_CONFIG.thresholdDays,
    probeTimeoutMs: input.probeTimeoutMs ?? DEFAULT_SCAN_CONFIG.probeTimeoutMs,
    deadlineMs: input.deadlineMs ?? DEFAULT_SCAN_CONFIG.deadlineMs,
    concurrency: input.concurrency ?? DEFAULT_SCAN_CONFIG.concurrency,
    defaultPort: input.defaultPort ?? DEFAULT_SCAN_CONFIG.defaultPort,
    retries: input.retries ?? DEFAULT_SCAN_CONFIG.retries,
    retryDelayMs: input.retryDelayMs ?? DEFAULT_SCAN_CONFIG.retryDelayMs,
  };

  const issues: string[] = [];

  if (!Number.isInteger(merged.thresholdDays) || merged.thresholdDays < 0) {
    issues.push(`thresholdDays must be an integer >= 0 (got ${merged.thresholdDays})`);
  }
  if (!Number.isFinite(merged.probeTimeoutMs) || merged.probeTimeoutMs <= 0) {
    issues.push(`probeTimeoutMs must be > 0 (got ${merged.probeTimeoutMs})`);
  } else if (merged.probeTimeoutMs + ABANDON_GRACE_MS > MAX_TIMER_MS) {
    issues.push(
      `probeTimeoutMs must be <= ${MAX_TIMER_MS - ABANDON_GRACE_MS} (got ${merged.probeTimeoutMs})`
    );
  }
  if (!Number.isFinite(merged.deadlineMs) || merged.deadlineMs <= 0) {
    issues.push(`deadlineMs must be > 0 (got ${merged.deadlineMs})`);
  } else if (merged.deadlineMs > MAX_TIMER_MS) {
    issues.push(`deadlineMs must be <= ${MAX_TIMER_MS} (got ${merged.deadlineMs})`);
  }
  if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
    issues.push(`concurrency must be an integer >= 1 (got ${merged.concurrency})`);
  }
  if (
    !Number.isInteger(merged.defaultPort) ||
    merged.defaultPort < 1 ||
    merged.defaultPort > 65535
  ) {
    issues.push(`defaultPort must be an integer between 1 and 65535 (got ${merged.defaultPort})`);
  }
  if (!Number.isInteger(merged.retries) || merged.retries < 0) {
    issues.push(`retries must be an integer >= 0 (got ${merged.retries})`);
  }
  if (!Number.isFinite(merged.retryDelayMs) || merged.retryDelayMs < 0) {
    issues.push(`retryDelayMs must be >= 0 (got ${merged.retryDelayMs})`);
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return merged;
}

/**
 * Scan settings from environment variables (unset values are omitted)
 */
export function readScanConfigFromEnv(env: Env = process.env): Partial<ScanConfig> {
  const entries: [keyof ScanConfig, number | undefined][] = [
    ['thresholdDays', readNumber(env, 'EXPIRY_THRESHOLD')],
    ['probeTimeoutMs', readNumber(env, 'PROBE_TIMEOUT_MS')],
    ['deadlineMs', readNumber(env, 'SCAN_DEADLINE_MS')],
    ['concurrency', readNumber(env, 'SCAN_CONCURRENCY')],
    ['defaultPort', readNumber(env, 'DEFAULT_PORT')],
    ['retries', readNumber(env, 'PROBE_RETRIES')],
    ['retryDelayMs', readNumber(env, 'PROBE_RETRY_DELAY_MS')],
  ];

  const config: Partial<ScanConfig> = {};
  for (const [key, value] of entries) {
    if (value !== undefined) config[key] = value;
  }
  return config;
}

/**
 * Webhook transport settings. Returns null when WEBHOOK_URL is not set.
 */
export function readWebhookConfigFromEnv(env: Env = process.env): WebhookConfig | null {
  const url = readString(env, 'WEBHOOK_URL');
  if (!url) return null;

  const config: WebhookConfig = {
    url,
    username: readString(env, 'WEBHOOK_USER') ?? '',
    password: readString(env, 'WEBHOOK_PASS') ?? '',
    to: readString(env, 'EMAIL_TO') ?? '',
    sender: readString(env, 'EMAIL_SENDER') ?? '',
    timeoutMs: readNumber(env, 'WEBHOOK_TIMEOUT_MS') ?? 10000,
  };

  const issues: string[] = [];
  if (!isValidUrl(config.url)) {
    issues.push(`WEBHOOK_URL is not a valid URL (got ${config.url})`);
  }
  if (!config.to) {
    issues.push('EMAIL_TO is required when WEBHOOK_URL is set');
  }
  if (!config.sender) {
    issues.push('EMAIL_SENDER is required when WEBHOOK_URL is set');
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0 || config.timeoutMs > MAX_TIMER_MS) {
    issues.push(`WEBHOOK_TIMEOUT_MS must be between 1 and ${MAX_TIMER_MS} (got ${config.timeoutMs})`);
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return config;
}
