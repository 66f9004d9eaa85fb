/**
 * Turns certificate verdicts into the single report handed to notification
 */

import { logger } from '../utils/logger.js';
import { compareStrings } from '../utils/sort.js';
import type {
  CertificateVerdict,
  ScanMetadata,
  ScanReport,
  VerdictKind,
  VerdictSummary,
} from './types.js';

const SEVERITY_RANK: Record<VerdictKind, number> = {
  expired: 0,
  'expiring-soon': 1,
  unknown: 2,
  ok: 3,
};

export function needsAttention(verdict: CertificateVerdict): boolean {
  return verdict.kind !== 'ok';
}

/**
 * Expired, then expiring soon, then unknown. Dated kinds ascend by days left;
 * unknown sorts by certificate name. Name and id break any remaining ties.
 */
export function compareVerdicts(a: CertificateVerdict, b: CertificateVerdict): number {
  const byRank = SEVERITY_RANK[a.kind] - SEVERITY_RANK[b.kind];
  if (byRank !== 0) return byRank;

  if (a.daysUntilExpiry !== null && b.daysUntilExpiry !== null) {
    const byDays = a.daysUntilExpiry - b.daysUntilExpiry;
    if (byDays !== 0) return byDays;
  }

  return (
    compareStrings(a.certificate.name, b.certificate.name) ||
    compareStrings(a.certificate.id, b.certificate.id)
  );
}

export function summarize(verdicts: readonly CertificateVerdict[]): VerdictSummary {
  const summary: VerdictSummary = { ok: 0, 'expiring-soon': 0, expired: 0, unknown: 0 };
  for (const verdict of verdicts) {
    summary[verdict.kind] += 1;
  }
  return summary;
}

export class ReportBuilder {
  /**
   * Build the report, or null when no certificate needs attention
   */
  build(verdicts: readonly CertificateVerdict[], metadata: ScanMetadata): ScanReport | null {
    // one entry per certificate; a duplicate keeps the more severe verdict
    const byCertificate = new Map<string, CertificateVerdict>();
    for (const verdict of verdicts) {
      const existing = byCertificate.get(verdict.certificate.id);
      if (!existing || compareVerdicts(verdict, existing) < 0) {
        byCertificate.set(verdict.certificate.id, verdict);
      }
    }

    const unique = Array.from(byCertificate.values());
    const entries = unique.filter(needsAttention).sort(compareVerdicts);

    if (entries.length === 0) {
      logger.info('No certificates require attention');
      return null;
    }

    return {
      entries,
      summary: summarize(unique),
      metadata,
    };
  }
}
