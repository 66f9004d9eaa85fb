/**
 * Tests for ScanScheduler
 */

import { describe, it, expect } from 'vitest';
import { ScanScheduler, isRetryable, type SchedulerOptions } from '../src/core/scheduler.js';
import type { ProbeOutcome, ProbeTarget, Prober } from '../src/core/types.js';
import { observed } from './helpers.js';

const targets = (count: number): ProbeTarget[] =>
  Array.from({ length: count }, (_, i) => ({
    domainId: String(i + 1),
    domain: `d${i + 1}.example.com`,
    host: `d${i + 1}.example.com`,
    port: 443,
  }));

const options = (overrides: Partial<SchedulerOptions> = {}): SchedulerOptions => ({
  concurrency: 4,
  probeTimeoutMs: 1000,
  deadlineMs: 10000,
  retries: 0,
  retryDelayMs: 1,
  ...overrides,
});

class ScriptedProber implements Prober {
  calls: string[] = [];
  private script: (host: string, call: number) => Promise<ProbeOutcome>;

  constructor(script: (host: string, call: number) => Promise<ProbeOutcome>) {
    this.script = script;
  }

  probe(host: string): Promise<ProbeOutcome> {
    this.calls.push(host);
    return this.script(host, this.calls.length);
  }
}

const never = () => new Promise<ProbeOutcome>(() => undefined);

describe('ScanScheduler', () => {
  it('should return one result per target in target order', async () => {
    const prober = new ScriptedProber(async () => observed('2030-01-01T00:00:00Z'));
    const { results, deadlineReached } = await new ScanScheduler(prober, options()).scan(targets(5));

    expect(results.map((r) => r.domainId)).toEqual(['1', '2', '3', '4', '5']);
    expect(results.every((r) => r.outcome.kind === 'expiry-observed' && r.attempts === 1)).toBe(true);
    expect(deadlineReached).toBe(false);
  });

  it('should never run more probes at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const prober = new ScriptedProber(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 20));
      active -= 1;
      return observed('2030-01-01T00:00:00Z');
    });

    await new ScanScheduler(prober, options({ concurrency: 2 })).scan(targets(6));

    expect(peak).toBe(2);
    expect(prober.calls).toHaveLength(6);
  });

  it('should mark everything unfinished as timed out when the deadline hits', async () => {
    const prober = new ScriptedProber((_, call) =>
      call <= 3 ? Promise.resolve(observed('2030-01-01T00:00:00Z')) : never()
    );

    const started = Date.now();
    const { results, deadlineReached } = await new ScanScheduler(
      prober,
      options({ concurrency: 1, deadlineMs: 300, probeTimeoutMs: 10000 })
    ).scan(targets(10));

    expect(Date.now() - started).toBeLessThan(2000);
    expect(deadlineReached).toBe(true);
    expect(results).toHaveLength(10);
    expect(results.filter((r) => r.outcome.kind === 'expiry-observed')).toHaveLength(3);

    const timedOut = results.filter((r) => r.outcome.kind === 'timeout');
    expect(timedOut).toHaveLength(7);
    expect(timedOut.every((r) => r.outcome.kind === 'timeout' && r.outcome.reason === 'deadline')).toBe(true);
    expect(timedOut.filter((r) => r.attempts === 0)).toHaveLength(6);
    expect(prober.calls).toHaveLength(4);
  });

  it('should abandon a probe that ignores its timeout', async () => {
    const prober = new ScriptedProber(never);

    const { results } = await new ScanScheduler(prober, options({ probeTimeoutMs: 50 })).scan(targets(1));

    expect(results[0].outcome).toEqual({ kind: 'timeout', reason: 'probe-timeout' });
  });

  it('should retry unreachable domains until one attempt succeeds', async () => {
    const prober = new ScriptedProber(async (_, call) =>
      call < 3 ? { kind: 'unreachable', reason: 'ECONNRESET' } : observed('2030-01-01T00:00:00Z')
    );

    const { results } = await new ScanScheduler(prober, options({ retries: 2 })).scan(targets(1));

    expect(results[0].attempts).toBe(3);
    expect(results[0].outcome.kind).toBe('expiry-observed');
  });

  it('should stop after the configured number of retries', async () => {
    const prober = new ScriptedProber(async () => ({ kind: 'unreachable', reason: 'ENOTFOUND' }));

    const { results } = await new ScanScheduler(prober, options({ retries: 1 })).scan(targets(1));

    expect(results[0].attempts).toBe(2);
    expect(results[0].outcome).toEqual({ kind: 'unreachable', reason: 'ENOTFOUND' });
  });

  it('should not retry TLS failures', async () => {
    const prober = new ScriptedProber(async () => ({ kind: 'tls-failure', reason: 'bad record mac' }));

    const { results } = await new ScanScheduler(prober, options({ retries: 3 })).scan(targets(1));

    expect(results[0].attempts).toBe(1);
  });

  it('should turn a throwing prober into a TLS failure for that domain only', async () => {
    const prober = new ScriptedProber(async (host) => {
      if (host === 'd1.example.com') throw new Error('boom');
      return observed('2030-01-01T00:00:00Z');
    });

    const { results } = await new ScanScheduler(prober, options()).scan(targets(2));

    expect(results[0].outcome).toEqual({ kind: 'tls-failure', reason: 'probe error: boom' });
    expect(results[1].outcome.kind).toBe('expiry-observed');
  });

  it('should stamp results with the injected clock', async () => {
    const now = new Date('2024-05-01T00:00:00Z');
    const prober = new ScriptedProber(async () => observed('2030-01-01T00:00:00Z'));

    const { results } = await new ScanScheduler(prober, options({ now: () => now })).scan(targets(1));

    expect(results[0].observedAt).toBe(now);
  });
});

describe('isRetryable', () => {
  it('should only retry transient outcomes', () => {
    expect(isRetryable({ kind: 'unreachable', reason: 'x' })).toBe(true);
    expect(isRetryable({ kind: 'timeout', reason: 'probe-timeout' })).toBe(true);
    expect(isRetryable({ kind: 'timeout', reason: 'deadline' })).toBe(false);
    expect(isRetryable({ kind: 'tls-failure', reason: 'x' })).toBe(false);
    expect(isRetryable(observed('2030-01-01T00:00:00Z'))).toBe(false);
  });
});
