/**
 * Reconciles per-domain probe results into one verdict per certificate
 */

import { isObserved } from './outcome.js';
import { compareStrings } from '../utils/sort.js';
import type {
  Certificate,
  CertificateVerdict,
  Domain,
  DomainContribution,
  ExpiryObserved,
  Host,
  ProbeResult,
  VerdictKind,
} from './types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReconcileInput {
  certificates: readonly Certificate[];
  domains: readonly Domain[];
  results: readonly ProbeResult[];
  thresholdDays: number;
  now: Date;
  hosts?: readonly Host[];
}

type ObservedContribution = DomainContribution & { outcome: ExpiryObserved };

/**
 * Whole days from now until expiry, rounded down (negative once expired)
 */
export function daysUntil(expiry: Date, now: Date): number {
  return Math.floor((expiry.getTime() - now.getTime()) / DAY_MS);
}

export function classifyDays(days: number, thresholdDays: number): VerdictKind {
  if (days < 0) return 'expired';
  if (days <= thresholdDays) return 'expiring-soon';
  return 'ok';
}

function timeOf(date: Date | null): number {
  return date ? date.getTime() : Number.POSITIVE_INFINITY;
}

/**
 * Stable order independent of result arrival order
 */
function compareContributions(a: DomainContribution, b: DomainContribution): number {
  return (
    compareStrings(a.domain, b.domain) ||
    compareStrings(a.domainId, b.domainId) ||
    timeOf(a.observedAt) - timeOf(b.observedAt) ||
    compareStrings(a.outcome.kind, b.outcome.kind)
  );
}

/**
 * Earliest expiry wins; equal expiries fall back to the earliest observation,
 * then domain order. The tie-break is only there to be deterministic.
 */
function isEarlier(candidate: ObservedContribution, current: ObservedContribution): boolean {
  const byExpiry = candidate.outcome.expiresAt.getTime() - current.outcome.expiresAt.getTime();
  if (byExpiry !== 0) return byExpiry < 0;
  return timeOf(candidate.observedAt) < timeOf(current.observedAt);
}

export class Reconciler {
  /**
   * Group results by certificate and resolve each certificate's verdict.
   * Pure: the same input and `now` always give the same output.
   */
  reconcile(input: ReconcileInput): CertificateVerdict[] {
    const { certificates, domains, results, thresholdDays, now } = input;

    const knownCertificates = new Set(certificates.map((c) => c.id));
    const hostNames = new Map((input.hosts ?? []).map((h) => [h.id, h.name] as const));

    const resultsByDomain = new Map<string, ProbeResult[]>();
    for (const result of results) {
      const list = resultsByDomain.get(result.domainId) ?? [];
      list.push(result);
      resultsByDomain.set(result.domainId, list);
    }

    // unassigned domains and dangling references have nothing to attribute to
    const domainsByCertificate = new Map<string, Domain[]>();
    for (const domain of domains) {
      if (domain.certificateId === null || !knownCertificates.has(domain.certificateId)) continue;
      const list = domainsByCertificate.get(domain.certificateId) ?? [];
      list.push(domain);
      domainsByCertificate.set(domain.certificateId, list);
    }

    const verdicts: CertificateVerdict[] = [];
    const seen = new Set<string>();

    for (const certificate of certificates) {
      if (seen.has(certificate.id)) continue;
      seen.add(certificate.id);

      const certificateDomains = domainsByCertificate.get(certificate.id);
      if (!certificateDomains || certificateDomains.length === 0) continue;

      const contributions = certificateDomains
        .flatMap((domain) => this.contributionsFor(domain, resultsByDomain.get(domain.id)))
        .sort(compareContributions);

      const hostName = certificate.hostId === null ? undefined : hostNames.get(certificate.hostId);

      verdicts.push(this.resolve(certificate, hostName, contributions, thresholdDays, now));
    }

    return verdicts;
  }

  /**
   * A domain the scan never reported on counts as cut off by the deadline
   */
  private contributionsFor(
    domain: Domain,
    results: ProbeResult[] | undefined
  ): DomainContribution[] {
    if (!results || results.length === 0) {
      return [
        {
          domainId: domain.id,
          domain: domain.name,
          outcome: { kind: 'timeout', reason: 'deadline' },
          observedAt: null,
        },
      ];
    }
    return results.map((r) => ({
      domainId: domain.id,
      domain: domain.name,
      outcome: r.outcome,
      observedAt: r.observedAt,
    }));
  }

  private resolve(
    certificate: Certificate,
    hostName: string | undefined,
    contributions: DomainContribution[],
    thresholdDays: number,
    now: Date
  ): CertificateVerdict {
    const observed = contributions.filter((c): c is ObservedContribution => isObserved(c.outcome));
    const failedProbes = contributions.length - observed.length;

    let effective: ObservedContribution | undefined;
    for (const contribution of observed) {
      if (!effective || isEarlier(contribution, effective)) {
        effective = contribution;
      }
    }

    if (!effective) {
      return {
        certificate,
        hostName,
        kind: 'unknown',
        effectiveExpiry: null,
        daysUntilExpiry: null,
        effectiveDomain: null,
        contributions,
        failedProbes,
      };
    }

    const effectiveExpiry = effective.outcome.expiresAt;
    const days = daysUntil(effectiveExpiry, now);

    return {
      certificate,
      hostName,
      kind: classifyDays(days, thresholdDays),
      effectiveExpiry,
      daysUntilExpiry: days,
      effectiveDomain: effective.domain,
      subject: effective.outcome.subject,
      contributions,
      failedProbes,
    };
  }
}
