/**
 * Error taxonomy for run-level failures. Per-domain probe failures are never
 * thrown; they are ProbeOutcome values.
 */

import type { ScanReport } from './types.js';

export type CertwatchErrorCode = 'CONFIG_INVALID' | 'INVENTORY_LOAD_FAILED' | 'TRANSPORT_FAILED';

export class CertwatchError extends Error {
  readonly code: CertwatchErrorCode;

  constructor(code: CertwatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CertwatchError';
    this.code = code;
  }
}

/**
 * Invalid configuration, raised before any probing starts
 */
export class ConfigError extends CertwatchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * The inventory source failed or returned malformed data
 */
export class InventoryError extends CertwatchError {
  constructor(message: string, cause?: unknown) {
    super('INVENTORY_LOAD_FAILED', message, { cause });
    this.name = 'InventoryError';
  }
}

/**
 * Report delivery failed. The report itself was computed and is attached.
 */
export class TransportError extends CertwatchError {
  readonly status?: number;
  report?: ScanReport;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('TRANSPORT_FAILED', message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
