/**
 * Bounded-concurrency scan scheduler
 *
 * Every target gets exactly one ProbeResult. Probes run through a fixed-size
 * pool; each has its own timeout, and a shared deadline cancels in-flight probes
 * and marks targets that never started as timed out.
 */

import pLimit from 'p-limit';
import { logger } from '../utils/logger.js';
import { backoffDelay, sleep, startDeadline } from '../utils/concurrency.js';
import { errorMessage } from './errors.js';
import { describeOutcome } from './outcome.js';
import { formatTarget } from './target.js';
import type { ProbeOutcome, ProbeResult, ProbeTarget, Prober, ScanConfig } from './types.js';

export type SchedulerOptions = Pick<
  ScanConfig,
  'concurrency' | 'probeTimeoutMs' | 'deadlineMs' | 'retries' | 'retryDelayMs'
> & {
  now?: () => Date;
};

/** How long past its own timeout a probe may run before it is abandoned */
export const ABANDON_GRACE_MS = 250;

export interface ScanOutcome {
  results: ProbeResult[];
  deadlineReached: boolean;
}

/**
 * Unreachable and per-probe timeouts may be transient; TLS failures are not.
 */
export function isRetryable(outcome: ProbeOutcome): boolean {
  return (
    outcome.kind === 'unreachable' ||
    (outcome.kind === 'timeout' && outcome.reason === 'probe-timeout')
  );
}

export class ScanScheduler {
  private prober: Prober;
  private options: SchedulerOptions;
  private now: () => Date;

  constructor(prober: Prober, options: SchedulerOptions) {
    this.prober = prober;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Probe every target; never throws for per-target failures
   */
  async scan(targets: readonly ProbeTarget[]): Promise<ScanOutcome> {
    const { concurrency, deadlineMs } = this.options;
    logger.info(`Probing ${targets.length} domains`, { concurrency, deadlineMs });

    const deadline = startDeadline(deadlineMs);
    const limit = pLimit(concurrency);
    let completed = 0;

    try {
      const results = await Promise.all(
        targets.map((target) =>
          limit(async () => {
            const result = await this.runTarget(target, deadline.signal);
            completed += 1;
            logger.progress('Probing domains', completed, targets.length);
            return result;
          })
        )
      );

      const deadlineReached = deadline.signal.aborted;
      const failures = results.filter((r) => r.outcome.kind !== 'expiry-observed').length;
      if (deadlineReached) {
        const skipped = results.filter((r) => r.attempts === 0).length;
        logger.warn(`Scan deadline of ${deadlineMs}ms reached`, { skipped });
      }
      logger.info(`Probing finished`, {
        observed: results.length - failures,
        failed: failures,
      });

      return { results, deadlineReached };
    } finally {
      deadline.clear();
    }
  }

  /**
   * Probe one target, retrying transient failures while the deadline allows
   */
  private async runTarget(target: ProbeTarget, signal: AbortSignal): Promise<ProbeResult> {
    const { probeTimeoutMs, retries, retryDelayMs } = this.options;
    const startedAt = Date.now();
    let attempts = 0;
    let outcome: ProbeOutcome = { kind: 'timeout', reason: 'deadline' };

    while (!signal.aborted) {
      attempts += 1;
      outcome = await this.safeProbe(target, probeTimeoutMs, signal);

      if (!isRetryable(outcome) || attempts > retries || signal.aborted) break;

      const delay = backoffDelay(retryDelayMs, attempts - 1);
      logger.debug(`Retrying ${target.domain}`, { attempt: attempts, delayMs: delay });
      await sleep(delay, signal);
    }

    const result: ProbeResult = {
      domainId: target.domainId,
      domain: target.domain,
      host: target.host,
      port: target.port,
      outcome,
      observedAt: this.now(),
      attempts,
      durationMs: Date.now() - startedAt,
    };

    logger.debug(`${target.domain} -> ${describeOutcome(outcome)}`, {
      target: formatTarget(target),
      attempts,
    });
    return result;
  }

  /**
   * Run the prober, but never wait on it past its timeout (plus a grace period)
   * or past the deadline, even when it ignores the signal
   */
  private async safeProbe(
    target: ProbeTarget,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<ProbeOutcome> {
    let settle: (outcome: ProbeOutcome) => void = () => undefined;
    const abandoned = new Promise<ProbeOutcome>((resolve) => {
      settle = resolve;
    });
    const timer = setTimeout(
      () => settle({ kind: 'timeout', reason: 'probe-timeout' }),
      timeoutMs + ABANDON_GRACE_MS
    );
    const onAbort = () => settle({ kind: 'timeout', reason: 'deadline' });
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const probing = this.prober.probe(target.host, target.port, timeoutMs, signal);
      // an abandoned probe that rejects later must not surface as unhandled
      probing.catch((error: unknown) => {
        logger.debug(`Probe rejected for ${target.domain}: ${errorMessage(error)}`);
      });
      return await Promise.race([probing, abandoned]);
    } catch (error) {
      logger.error(`Probe of ${target.domain} threw unexpectedly: ${errorMessage(error)}`);
      return { kind: 'tls-failure', reason: `probe error: ${errorMessage(error)}` };
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }
}
