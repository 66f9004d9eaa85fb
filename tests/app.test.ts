/**
 * Tests for the App scan workflow and runScan
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { App } from '../src/core/app.js';
import { runScan } from '../src/index.js';
import { ConfigError, InventoryError, TransportError } from '../src/core/errors.js';
import { StaticInventorySource, type InventorySource } from '../src/inventory/sources.js';
import { logger } from '../src/utils/logger.js';
import type {
  Inventory,
  NotificationTransport,
  ProbeOutcome,
  Prober,
  RenderedReport,
} from '../src/core/types.js';
import { certificate, domain, observed } from './helpers.js';

const NOW = new Date('2024-01-01T00:00:00Z');

class MapProber implements Prober {
  hosts: string[] = [];
  private outcomes: Record<string, ProbeOutcome>;

  constructor(outcomes: Record<string, ProbeOutcome>) {
    this.outcomes = outcomes;
  }

  async probe(host: string): Promise<ProbeOutcome> {
    this.hosts.push(host);
    return this.outcomes[host] ?? { kind: 'unreachable', reason: 'ENOTFOUND' };
  }
}

class RecordingTransport implements NotificationTransport {
  sent: RenderedReport[] = [];
  private failure?: Error;

  constructor(failure?: Error) {
    this.failure = failure;
  }

  async send(message: RenderedReport): Promise<void> {
    this.sent.push(message);
    if (this.failure) throw this.failure;
  }
}

const inventory: Inventory = {
  hosts: [{ id: 'h1', name: 'web-1' }],
  certificates: [
    certificate('c1', { name: 'shop', hostId: 'h1' }),
    certificate('c2', { name: 'api' }),
    certificate('c3', { name: 'blog' }),
  ],
  domains: [
    domain('d1', 'shop.example.com', 'c1'),
    domain('d2', 'www.shop.example.com', 'c1'),
    domain('d3', 'api.example.com', 'c2'),
    domain('d4', 'blog.example.com', 'c3'),
  ],
};

const outcomes: Record<string, ProbeOutcome> = {
  'shop.example.com': observed('2024-01-10T00:00:00Z'),
  'www.shop.example.com': observed('2024-06-01T00:00:00Z'),
  'api.example.com': { kind: 'unreachable', reason: 'ECONNREFUSED' },
  'blog.example.com': observed('2025-01-01T00:00:00Z'),
};

const config = { thresholdDays: 19, probeTimeoutMs: 500, deadlineMs: 5000 };

describe('App', () => {
  beforeAll(() => {
    logger.setQuiet(true);
  });

  afterAll(() => {
    logger.setQuiet(false);
  });

  it('should report certificates needing attention and notify once', async () => {
    const transport = new RecordingTransport();
    const app = new App(config, {
      inventory: new StaticInventorySource(inventory),
      prober: new MapProber(outcomes),
      transport,
      now: () => NOW,
    });

    const report = await app.run();

    expect(report?.entries.map((e) => [e.certificate.name, e.kind, e.daysUntilExpiry])).toEqual([
      ['shop', 'expiring-soon', 9],
      ['api', 'unknown', null],
    ]);
    expect(report?.entries[0].hostName).toBe('web-1');
    expect(report?.summary).toEqual({ ok: 1, 'expiring-soon': 1, expired: 0, unknown: 1 });
    expect(report?.metadata).toMatchObject({ domainsAttempted: 4, probeFailures: 1, deadlineReached: false });
    expect(transport.sent.map((m) => m.subject)).toEqual(['TLS certificates requiring attention (2)']);
  });

  it('should not call the transport when nothing needs attention', async () => {
    const transport = new RecordingTransport();
    const report = await runScan(config, {
      inventory: new StaticInventorySource({
        hosts: [],
        certificates: [certificate('c3', { name: 'blog' })],
        domains: [domain('d4', 'blog.example.com', 'c3')],
      }),
      prober: new MapProber(outcomes),
      transport,
      now: () => NOW,
    });

    expect(report).toBeNull();
    expect(transport.sent).toEqual([]);
  });

  it('should use a custom notification subject', async () => {
    const transport = new RecordingTransport();
    await new App(config, {
      inventory: new StaticInventorySource(inventory),
      prober: new MapProber(outcomes),
      transport,
      now: () => NOW,
      render: { subject: 'Weekly certificate check' },
    }).run();

    expect(transport.sent[0].subject).toBe('Weekly certificate check');
  });

  it('should reject invalid configuration before loading anything', () => {
    let loads = 0;
    const source: InventorySource = {
      description: 'counting source',
      load: async () => {
        loads += 1;
        return inventory;
      },
    };

    expect(() => new App({ concurrency: 0 }, { inventory: source })).toThrow(ConfigError);
    expect(loads).toBe(0);
  });

  it('should refuse a deadline longer than a timer can wait', () => {
    expect(
      () =>
        new App(
          { deadlineMs: 30 * 24 * 3600 * 1000 },
          { inventory: new StaticInventorySource(inventory), prober: new MapProber(outcomes) }
        )
    ).toThrow('Invalid configuration: deadlineMs must be <= 2147483647 (got 2592000000)');
  });

  it('should fail with InventoryError when the source fails', async () => {
    const prober = new MapProber(outcomes);
    const app = new App(config, {
      inventory: {
        description: 'broken source',
        load: () => Promise.reject(new Error('db down')),
      },
      prober,
    });

    await expect(app.run()).rejects.toThrow(InventoryError);
    await expect(app.run()).rejects.toThrow('Inventory load failed: db down');
    expect(prober.hosts).toEqual([]);
  });

  it('should keep the report on a transport failure', async () => {
    const app = new App(config, {
      inventory: new StaticInventorySource(inventory),
      prober: new MapProber(outcomes),
      transport: new RecordingTransport(new Error('relay down')),
      now: () => NOW,
    });

    const failure = await app.run().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    if (failure instanceof TransportError) {
      expect(failure.message).toBe('Notification transport failed: relay down');
      expect(failure.report?.entries).toHaveLength(2);
    }
  });

  it('should record malformed domain names without probing them', async () => {
    const prober = new MapProber(outcomes);
    const { verdicts, metadata } = await new App(config, {
      inventory: new StaticInventorySource({
        hosts: [],
        certificates: [certificate('c9', { name: 'typo' })],
        domains: [domain('d9', 'not a domain', 'c9')],
      }),
      prober,
      now: () => NOW,
    }).scan();

    expect(prober.hosts).toEqual([]);
    expect(verdicts[0].kind).toBe('unknown');
    expect(verdicts[0].contributions[0].outcome).toEqual({
      kind: 'unreachable',
      reason: 'invalid domain name',
    });
    expect(metadata.domainsAttempted).toBe(1);
    expect(metadata.probeFailures).toBe(1);
  });

  describe('export', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'certwatch-export-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the JSON result to the export file', async () => {
      const path = join(dir, 'result.json');
      await new App(
        config,
        {
          inventory: new StaticInventorySource(inventory),
          prober: new MapProber(outcomes),
          now: () => NOW,
        },
        { format: 'json', quiet: true, export: path }
      ).run();

      const exported: unknown = JSON.parse(await readFile(path, 'utf-8'));

      expect(exported).toMatchObject({
        metadata: { domainsAttempted: 4, thresholdDays: 19, startedAt: '2024-01-01T00:00:00.000Z' },
        summary: { ok: 1, 'expiring-soon': 1, expired: 0, unknown: 1 },
        entries: [
          { certificate: { name: 'shop' }, kind: 'expiring-soon', effectiveExpiry: '2024-01-10T00:00:00.000Z' },
          { certificate: { name: 'api' }, kind: 'unknown', effectiveExpiry: null },
        ],
      });
    });
  });
});
