/**
 * src/core/probe.ts
 *
 * TLS expiry probe:
 * - one handshake per call, SNI set to the requested host (omitted for IP literals)
 * - chain and hostname verification disabled: only the declared validity window is read
 * - wall-clock timeout from connect to handshake, plus cooperative cancellation via AbortSignal
 * - every failure is returned as a ProbeOutcome; the socket is destroyed on every path
 */

import {
  connect as tlsConnect,
  checkServerIdentity,
  type ConnectionOptions,
  type PeerCertificate,
  type TLSSocket,
} from 'tls';
import { isIP } from 'net';
import { errorMessage } from './errors.js';
import type { ProbeOutcome, Prober } from './types.js';

export type TlsConnectFn = (options: ConnectionOptions) => TLSSocket;

export const DEFAULT_PORT = 443;

export class TlsProber implements Prober {
  private connect: TlsConnectFn;

  constructor(connect: TlsConnectFn = tlsConnect) {
    this.connect = connect;
  }

  /**
   * Probe a single host:port and classify the outcome
   */
  probe(
    host: string,
    port = DEFAULT_PORT,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ProbeOutcome> {
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'timeout', reason: 'deadline' });
    }

    return new Promise<ProbeOutcome>((resolve) => {
      let settled = false;
      let tcpConnected = false;
      let socket: TLSSocket | undefined;

      const onAbort = () => finalize({ kind: 'timeout', reason: 'deadline' });
      const timer = setTimeout(
        () => finalize({ kind: 'timeout', reason: 'probe-timeout' }),
        timeoutMs
      );
      signal?.addEventListener('abort', onAbort, { once: true });

      function finalize(outcome: ProbeOutcome) {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket?.destroy();
        resolve(outcome);
      }

      try {
        socket = this.connect({
          host,
          port,
          servername: isIP(host) ? undefined : host,
          rejectUnauthorized: false,
        });
      } catch (err) {
        finalize({ kind: 'unreachable', reason: errorMessage(err) });
        return;
      }

      const tlsSocket = socket;

      tlsSocket.once('connect', () => {
        tcpConnected = true;
      });

      tlsSocket.once('secureConnect', () => {
        finalize(readLeafCertificate(host, tlsSocket));
      });

      // stays attached after settling so late errors from destroy() are absorbed
      tlsSocket.on('error', (err: NodeJS.ErrnoException) => {
        finalize(classifySocketError(err, tcpConnected));
      });

      tlsSocket.once('close', () => {
        finalize(
          tcpConnected
            ? { kind: 'tls-failure', reason: 'connection closed during handshake' }
            : { kind: 'unreachable', reason: 'connection closed before connect' }
        );
      });
    });
  }
}

/**
 * Map a socket error to an outcome. Anything failing before the TCP connection
 * is established is unreachable; anything after it is a TLS-layer failure.
 */
export function classifySocketError(
  err: NodeJS.ErrnoException,
  tcpConnected: boolean
): ProbeOutcome {
  if (err.code === 'ETIMEDOUT') {
    return { kind: 'timeout', reason: 'probe-timeout' };
  }
  if (!tcpConnected) {
    return { kind: 'unreachable', reason: err.code ?? err.message };
  }
  return { kind: 'tls-failure', reason: err.message || err.code || 'handshake failed' };
}

/**
 * Read the peer's leaf certificate after a completed handshake
 */
export function readLeafCertificate(host: string, socket: TLSSocket): ProbeOutcome {
  const cert = socket.getPeerCertificate();

  if (!cert || Object.keys(cert).length === 0 || !cert.valid_to) {
    return { kind: 'tls-failure', reason: 'no certificate presented' };
  }

  const expiresAt = new Date(cert.valid_to);
  if (Number.isNaN(expiresAt.getTime())) {
    return { kind: 'tls-failure', reason: `unparseable not-after: ${cert.valid_to}` };
  }

  const subject: unknown = cert.subject?.CN;

  return {
    kind: 'expiry-observed',
    expiresAt,
    subject: typeof subject === 'string' ? subject : undefined,
    altNames: parseAltNames(cert.subjectaltname),
    fingerprint: cert.fingerprint256 || undefined,
    identityMatch: matchesIdentity(host, cert),
  };
}

/**
 * "DNS:a.example, DNS:b.example, IP Address:10.0.0.1" -> DNS names only
 */
export function parseAltNames(subjectAltName: string | undefined): string[] {
  if (!subjectAltName) return [];
  return subjectAltName
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.startsWith('DNS:'))
    .map((entry) => entry.slice(4).toLowerCase());
}

function matchesIdentity(host: string, cert: PeerCertificate): boolean {
  try {
    return checkServerIdentity(host, cert) === undefined;
  } catch {
    return false;
  }
}
