/**
 * Helpers shared by the scheduler, reconciler and renderers
 */

import type { ExpiryObserved, ProbeOutcome } from './types.js';

export function isObserved(outcome: ProbeOutcome): outcome is ExpiryObserved {
  return outcome.kind === 'expiry-observed';
}

/**
 * One-line description of an outcome for logs and reports
 */
export function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case 'expiry-observed':
      return `expires ${outcome.expiresAt.toISOString()}${outcome.identityMatch ? '' : ' (identity mismatch)'}`;
    case 'unreachable':
      return `unreachable (${outcome.reason})`;
    case 'tls-failure':
      return `TLS failure (${outcome.reason})`;
    case 'timeout':
      return outcome.reason === 'deadline' ? 'timeout (scan deadline)' : 'timeout';
  }
}
