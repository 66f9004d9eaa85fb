/**
 * Probe targets: which domains to probe, and how their names parse.
 * Accepted forms: "host", "host:port", "[ipv6]:port" or a bare IPv6 literal.
 */

import { isIP } from 'net';
import type { Inventory, ProbeResult, ProbeTarget } from './types.js';

const HOSTNAME_REGEX = /^(?=.{1,253}$)(?:[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9])?)(?:\.[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9])?)*\.?$/;

export interface ParsedTarget {
  host: string;
  port: number;
}

function parsePort(raw: string): number | null {
  if (!/^\d{1,5}$/.test(raw)) return null;
  const port = Number(raw);
  return port >= 1 && port <= 65535 ? port : null;
}

/**
 * Parse a domain entry into host and port. Returns null when malformed.
 * Hosts are lower-cased; a trailing dot is dropped.
 */
export function parseTarget(name: string, defaultPort = 443): ParsedTarget | null {
  const input = name.trim();
  if (!input) return null;

  // [v6]:port or [v6]
  if (input.startsWith('[')) {
    const m = /^\[([^\]]+)\](?::(\d+))?$/.exec(input);
    if (!m || isIP(m[1]) !== 6) return null;
    const port = m[2] === undefined ? defaultPort : parsePort(m[2]);
    return port === null ? null : { host: m[1].toLowerCase(), port };
  }

  // bare v6 literal carries no port
  if (isIP(input) === 6) {
    return { host: input.toLowerCase(), port: defaultPort };
  }

  let host = input;
  let port = defaultPort;
  const colon = input.lastIndexOf(':');
  if (colon !== -1) {
    const parsed = parsePort(input.slice(colon + 1));
    if (parsed === null) return null;
    host = input.slice(0, colon);
    port = parsed;
  }

  host = host.toLowerCase().replace(/\.$/, '');
  if (isIP(host) === 4) return { host, port };
  if (!HOSTNAME_REGEX.test(host)) return null;

  return { host, port };
}

/**
 * Canonical "host:port" label, bracketing IPv6 hosts
 */
export function formatTarget(target: ParsedTarget): string {
  const host = isIP(target.host) === 6 ? `[${target.host}]` : target.host;
  return `${host}:${target.port}`;
}

export interface TargetPlan {
  targets: ProbeTarget[];
  /** Results for domains whose names could not be parsed; never probed */
  rejected: ProbeResult[];
}

/**
 * Select the domains to probe: those assigned to a certificate present in the
 * inventory. Malformed names are recorded as unreachable without a probe.
 */
export function planTargets(inventory: Inventory, defaultPort: number, now: Date): TargetPlan {
  const certificateIds = new Set(inventory.certificates.map((c) => c.id));
  const targets: ProbeTarget[] = [];
  const rejected: ProbeResult[] = [];

  for (const domain of inventory.domains) {
    if (domain.certificateId === null || !certificateIds.has(domain.certificateId)) continue;

    const parsed = parseTarget(domain.name, defaultPort);
    if (!parsed) {
      rejected.push({
        domainId: domain.id,
        domain: domain.name,
        host: domain.name,
        port: defaultPort,
        outcome: { kind: 'unreachable', reason: 'invalid domain name' },
        observedAt: now,
        attempts: 0,
        durationMs: 0,
      });
      continue;
    }

    targets.push({ domainId: domain.id, domain: domain.name, ...parsed });
  }

  return { targets, rejected };
}
