/**
 * Renders a scan report as subject, plain-text body and HTML body
 */

import { describeOutcome } from '../core/outcome.js';
import type { CertificateVerdict, RenderedReport, ScanReport, VerdictKind } from '../core/types.js';

export interface RenderOptions {
  subject?: string;
}

const KIND_LABELS: Record<VerdictKind, string> = {
  expired: 'EXPIRED',
  'expiring-soon': 'EXPIRING SOON',
  unknown: 'UNKNOWN',
  ok: 'OK',
};

const KIND_COLORS: Record<VerdictKind, string> = {
  expired: '#b00020',
  'expiring-soon': '#c77700',
  unknown: '#555555',
  ok: '#2e7d32',
};

function plural(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * "in 9 days", "within 1 day", "12 days ago"
 */
export function describeDays(days: number): string {
  if (days < 0) return `${plural(-days, 'day')} ago`;
  if (days === 0) return 'within 1 day';
  return `in ${plural(days, 'day')}`;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function describeExpiry(verdict: CertificateVerdict): string {
  if (verdict.effectiveExpiry === null || verdict.daysUntilExpiry === null) {
    return 'unknown (no successful probe)';
  }
  return `${formatDate(verdict.effectiveExpiry)} (${describeDays(verdict.daysUntilExpiry)})`;
}

export function defaultSubject(report: ScanReport): string {
  return `TLS certificates requiring attention (${report.entries.length})`;
}

function renderText(report: ScanReport): string {
  const { entries, metadata } = report;
  const lines: string[] = [];

  lines.push(
    `${plural(entries.length, 'certificate')} require attention (threshold ${plural(metadata.thresholdDays, 'day')})`
  );

  for (const verdict of entries) {
    lines.push('');
    lines.push(
      `[${KIND_LABELS[verdict.kind]}] ${verdict.certificate.name} (${verdict.hostName ?? 'unassigned'})`
    );
    lines.push(`  expires: ${describeExpiry(verdict)}`);
    for (const contribution of verdict.contributions) {
      lines.push(`  - ${contribution.domain}: ${describeOutcome(contribution.outcome)}`);
    }
  }

  lines.push('');
  lines.push(
    `Scan: ${plural(metadata.domainsAttempted, 'domain')} probed, ` +
      `${plural(metadata.probeFailures, 'failure')}, ` +
      `started ${metadata.startedAt.toISOString()}, finished ${metadata.finishedAt.toISOString()}` +
      (metadata.deadlineReached ? ', deadline reached' : '')
  );

  return lines.join('\n');
}

function renderHtml(report: ScanReport, subject: string): string {
  const { entries, metadata } = report;

  const rows = entries.map((verdict) => {
    const domains = verdict.contributions
      .map(
        (c) => `<li>${escapeHtml(c.domain)}: ${escapeHtml(describeOutcome(c.outcome))}</li>`
      )
      .join('');
    const days = verdict.daysUntilExpiry === null ? '-' : String(verdict.daysUntilExpiry);
    const expires = verdict.effectiveExpiry ? formatDate(verdict.effectiveExpiry) : 'unknown';

    return (
      '<tr>' +
      `<td style="color:${KIND_COLORS[verdict.kind]};font-weight:bold">${KIND_LABELS[verdict.kind]}</td>` +
      `<td>${escapeHtml(verdict.certificate.name)}</td>` +
      `<td>${escapeHtml(verdict.hostName ?? 'unassigned')}</td>` +
      `<td>${expires}</td>` +
      `<td>${days}</td>` +
      `<td><ul>${domains}</ul></td>` +
      '</tr>'
    );
  });

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<body style="font-family:sans-serif">',
    `<h2>${escapeHtml(subject)}</h2>`,
    '<table border="1" cellpadding="6" cellspacing="0">',
    '<thead><tr><th>Status</th><th>Certificate</th><th>Host</th><th>Expires</th><th>Days left</th><th>Domains</th></tr></thead>',
    `<tbody>${rows.join('')}</tbody>`,
    '</table>',
    `<p>Threshold: ${plural(metadata.thresholdDays, 'day')}. ` +
      `${plural(metadata.domainsAttempted, 'domain')} probed, ${plural(metadata.probeFailures, 'failure')}.` +
      (metadata.deadlineReached ? ' Scan deadline reached; some domains were not probed.' : '') +
      '</p>',
    '</body>',
    '</html>',
  ].join('\n');
}

export function renderReport(report: ScanReport, options: RenderOptions = {}): RenderedReport {
  const subject = options.subject ?? defaultSubject(report);
  return {
    subject,
    text: renderText(report),
    html: renderHtml(report, subject),
  };
}
