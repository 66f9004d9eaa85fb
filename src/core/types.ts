/**
 * Type definitions for certwatch
 */

/**
 * Scan policy, validated once by validateScanConfig
 */
export interface ScanConfig {
  thresholdDays: number;
  probeTimeoutMs: number;
  deadlineMs: number;
  concurrency: number;
  defaultPort: number;
  retries: number;
  retryDelayMs: number;
}

/**
 * Console/file output options used by the CLI
 */
export interface OutputOptions {
  format: 'text' | 'json';
  export?: string;
  quiet: boolean;
}

export type InventoryId = string;

/**
 * Logical machine or VM grouping certificates
 */
export interface Host {
  id: InventoryId;
  name: string;
}

export type CertificateVisibility = 'public' | 'internal';

/**
 * Named certificate record. A certificate may be unassigned (hostId null).
 */
export interface Certificate {
  id: InventoryId;
  name: string;
  visibility: CertificateVisibility;
  hostId: InventoryId | null;
}

/**
 * DNS name (optionally host:port) that should be serving a certificate.
 * Unassigned domains (certificateId null) are never probed.
 */
export interface Domain {
  id: InventoryId;
  name: string;
  certificateId: InventoryId | null;
}

/**
 * Read-only inventory snapshot loaded at scan start
 */
export interface Inventory {
  hosts: Host[];
  certificates: Certificate[];
  domains: Domain[];
}

/**
 * A parsed domain ready to probe
 */
export interface ProbeTarget {
  domainId: InventoryId;
  domain: string;
  host: string;
  port: number;
}

export interface ExpiryObserved {
  kind: 'expiry-observed';
  expiresAt: Date;
  subject?: string;
  altNames: string[];
  fingerprint?: string;
  // false when the presented certificate does not cover the requested host
  identityMatch: boolean;
}

export interface Unreachable {
  kind: 'unreachable';
  reason: string;
}

export interface TlsFailure {
  kind: 'tls-failure';
  reason: string;
}

export interface ProbeTimeout {
  kind: 'timeout';
  reason: 'probe-timeout' | 'deadline';
}

export type ProbeOutcome = ExpiryObserved | Unreachable | TlsFailure | ProbeTimeout;

export type ProbeOutcomeKind = ProbeOutcome['kind'];

/**
 * Outcome of probing one domain during one scan
 */
export interface ProbeResult {
  domainId: InventoryId;
  domain: string;
  host: string;
  port: number;
  outcome: ProbeOutcome;
  observedAt: Date;
  attempts: number;
  durationMs: number;
}

/**
 * Anything able to probe a single host:port
 */
export interface Prober {
  probe(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export type VerdictKind = 'ok' | 'expiring-soon' | 'expired' | 'unknown';

export interface DomainContribution {
  domainId: InventoryId;
  domain: string;
  outcome: ProbeOutcome;
  observedAt: Date | null;
}

/**
 * Reconciled state of one certificate
 */
export interface CertificateVerdict {
  certificate: Certificate;
  hostName?: string;
  kind: VerdictKind;
  effectiveExpiry: Date | null;
  daysUntilExpiry: number | null;
  /** Domain whose observation set the effective expiry */
  effectiveDomain: string | null;
  subject?: string;
  contributions: DomainContribution[];
  failedProbes: number;
}

/**
 * Scan metadata
 */
export interface ScanMetadata {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  domainsAttempted: number;
  probeFailures: number;
  thresholdDays: number;
  deadlineReached: boolean;
}

export type VerdictSummary = Record<VerdictKind, number>;

/**
 * Certificates requiring attention, ordered for notification
 */
export interface ScanReport {
  entries: CertificateVerdict[];
  summary: VerdictSummary;
  metadata: ScanMetadata;
}

/**
 * Report rendered for a transport
 */
export interface RenderedReport {
  subject: string;
  text: string;
  html: string;
}

export interface NotificationTransport {
  send(message: RenderedReport): Promise<void>;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
