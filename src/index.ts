/**
 * certwatch - TLS certificate expiry monitor
 * Main entry point for programmatic usage
 */

import { App, type ScanDependencies } from './core/app.js';
import type { ScanConfig, ScanReport } from './core/types.js';

export { App } from './core/app.js';
export type { ScanDependencies, ScanRun } from './core/app.js';
export { TlsProber, type TlsConnectFn } from './core/probe.js';
export { ScanScheduler, type SchedulerOptions, type ScanOutcome } from './core/scheduler.js';
export { Reconciler, daysUntil, classifyDays, type ReconcileInput } from './core/reconciler.js';
export { ReportBuilder, compareVerdicts } from './core/report.js';
export { parseTarget, planTargets } from './core/target.js';
export { IntervalTrigger, type IntervalTriggerOptions } from './core/trigger.js';
export { describeOutcome } from './core/outcome.js';
export {
  DEFAULT_SCAN_CONFIG,
  validateScanConfig,
  readScanConfigFromEnv,
  readWebhookConfigFromEnv,
  type WebhookConfig,
} from './core/config.js';
export * from './core/errors.js';
export * from './core/types.js';
export {
  StaticInventorySource,
  JsonFileInventorySource,
  DomainListInventorySource,
  parseInventory,
  type InventorySource,
} from './inventory/sources.js';
export { describeInventory, type InventoryTree } from './inventory/describe.js';
export { renderReport, type RenderOptions } from './notify/render.js';
export { WebhookNotifier, type WebhookPayload } from './notify/webhook.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Run one scan and return the report, or null when no certificate needs attention.
 * Invocable without any scheduler; the transport is only called with a report.
 * @example
 * ```typescript
 * import { runScan, JsonFileInventorySource } from 'certwatch';
 *
 * const report = await runScan(
 *   { thresholdDays: 21, concurrency: 20 },
 *   { inventory: new JsonFileInventorySource('inventory.json') }
 * );
 * ```
 */
export async function runScan(
  config: Partial<ScanConfig>,
  deps: ScanDependencies
): Promise<ScanReport | null> {
  const app = new App(config, deps);
  return await app.run();
}
