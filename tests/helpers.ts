/**
 * Builders shared by the test suites
 */

import type {
  Certificate,
  CertificateVerdict,
  Domain,
  ProbeOutcome,
  ProbeResult,
  ScanMetadata,
  VerdictKind,
} from '../src/core/types.js';

export const certificate = (id: string, overrides: Partial<Certificate> = {}): Certificate => ({
  id,
  name: `cert-${id}`,
  visibility: 'public',
  hostId: null,
  ...overrides,
});

export const domain = (id: string, name: string, certificateId: string | null): Domain => ({
  id,
  name,
  certificateId,
});

export const observed = (iso: string, identityMatch = true): ProbeOutcome => ({
  kind: 'expiry-observed',
  expiresAt: new Date(iso),
  altNames: [],
  identityMatch,
});

export const result = (
  d: Domain,
  outcome: ProbeOutcome,
  observedAt = new Date('2024-01-01T00:00:00Z')
): ProbeResult => ({
  domainId: d.id,
  domain: d.name,
  host: d.name,
  port: 443,
  outcome,
  observedAt,
  attempts: 1,
  durationMs: 10,
});

export const verdict = (
  id: string,
  kind: VerdictKind,
  daysUntilExpiry: number | null,
  overrides: Partial<CertificateVerdict> = {}
): CertificateVerdict => ({
  certificate: certificate(id),
  kind,
  effectiveExpiry: null,
  daysUntilExpiry,
  effectiveDomain: null,
  contributions: [],
  failedProbes: 0,
  ...overrides,
});

export const metadata = (overrides: Partial<ScanMetadata> = {}): ScanMetadata => ({
  startedAt: new Date('2024-01-01T00:00:00Z'),
  finishedAt: new Date('2024-01-01T00:00:05Z'),
  durationMs: 5000,
  domainsAttempted: 0,
  probeFailures: 0,
  thresholdDays: 19,
  deadlineReached: false,
  ...overrides,
});
