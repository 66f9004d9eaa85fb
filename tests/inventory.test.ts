/**
 * Tests for inventory sources and the inventory tree
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DomainListInventorySource,
  JsonFileInventorySource,
  StaticInventorySource,
  parseInventory,
} from '../src/inventory/sources.js';
import { describeInventory } from '../src/inventory/describe.js';
import { InventoryError } from '../src/core/errors.js';
import { certificate, domain } from './helpers.js';

describe('parseInventory', () => {
  it('should normalize ids and default visibility', () => {
    expect(
      parseInventory({
        hosts: [{ id: 1, name: 'web-1' }],
        certificates: [{ id: 10, name: 'shop', hostId: 1 }],
        domains: [
          { id: 'a', name: 'shop.example.com', certificateId: 10 },
          { id: 'b', name: 'spare.example.com', certificateId: null },
        ],
      })
    ).toEqual({
      hosts: [{ id: '1', name: 'web-1' }],
      certificates: [{ id: '10', name: 'shop', visibility: 'public', hostId: '1' }],
      domains: [
        { id: 'a', name: 'shop.example.com', certificateId: '10' },
        { id: 'b', name: 'spare.example.com', certificateId: null },
      ],
    });
  });

  it('should allow the hosts list to be omitted', () => {
    expect(parseInventory({ certificates: [], domains: [] })).toEqual({
      hosts: [],
      certificates: [],
      domains: [],
    });
  });

  it('should report every field problem at once', () => {
    expect(() =>
      parseInventory({
        certificates: [
          { id: 'c1', name: '', visibility: 'secret' },
          { id: 'c2', name: 'ok' },
        ],
        domains: 'nope',
      })
    ).toThrow(
      'Invalid inventory: certificates[0]: name must be a non-empty string; ' +
        'certificates[0]: visibility must be "public" or "internal"; domains must be an array'
    );
  });

  it('should reject duplicate ids and unknown host references', () => {
    expect(() =>
      parseInventory({
        hosts: [],
        certificates: [
          { id: 'c1', name: 'a', hostId: 'h1' },
          { id: 'c1', name: 'b' },
        ],
        domains: [],
      })
    ).toThrow('Invalid inventory: duplicate certificate id c1; certificate c1 references unknown host h1');
  });

  it('should reject anything but an object', () => {
    expect(() => parseInventory([])).toThrow(InventoryError);
    expect(() => parseInventory(null)).toThrow('Inventory must be a JSON object');
  });
});

describe('JsonFileInventorySource', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'certwatch-inventory-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load and validate a JSON file', async () => {
    const path = join(dir, 'inventory.json');
    await writeFile(
      path,
      JSON.stringify({
        certificates: [{ id: 'c1', name: 'shop', visibility: 'internal' }],
        domains: [{ id: 'd1', name: 'shop.example.com', certificateId: 'c1' }],
      })
    );

    const source = new JsonFileInventorySource(path);

    expect(source.description).toBe(`inventory file ${path}`);
    expect(await source.load()).toEqual({
      hosts: [],
      certificates: [{ id: 'c1', name: 'shop', visibility: 'internal', hostId: null }],
      domains: [{ id: 'd1', name: 'shop.example.com', certificateId: 'c1' }],
    });
  });

  it('should fail with InventoryError for a missing file', async () => {
    const path = join(dir, 'missing.json');
    await expect(new JsonFileInventorySource(path).load()).rejects.toThrow(
      `Cannot read inventory file ${path}: `
    );
  });

  it('should fail with InventoryError for invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "certificates": [');

    await expect(new JsonFileInventorySource(path).load()).rejects.toThrow(
      `Inventory file ${path} is not valid JSON`
    );
  });
});

describe('DomainListInventorySource', () => {
  it('should give each distinct domain its own certificate', async () => {
    const source = DomainListInventorySource.fromCommaList(' a.example.com, b.example.com,,a.example.com ');

    expect(source.description).toBe('domain list (2)');
    expect(await source.load()).toEqual({
      hosts: [],
      certificates: [
        { id: '1', name: 'a.example.com', visibility: 'public', hostId: null },
        { id: '2', name: 'b.example.com', visibility: 'public', hostId: null },
      ],
      domains: [
        { id: '1', name: 'a.example.com', certificateId: '1' },
        { id: '2', name: 'b.example.com', certificateId: '2' },
      ],
    });
  });
});

describe('StaticInventorySource', () => {
  it('should hand out copies', async () => {
    const source = new StaticInventorySource({
      hosts: [],
      certificates: [certificate('c1')],
      domains: [domain('d1', 'a.example.com', 'c1')],
    });

    const first = await source.load();
    first.domains.push(domain('d2', 'b.example.com', 'c1'));

    expect((await source.load()).domains).toHaveLength(1);
  });
});

describe('describeInventory', () => {
  it('should group certificates by host and list loose ends', () => {
    const tree = describeInventory({
      hosts: [
        { id: 'h2', name: 'db' },
        { id: 'h1', name: 'app' },
      ],
      certificates: [
        certificate('c1', { name: 'x', hostId: 'h1' }),
        certificate('c2', { name: 'y' }),
        certificate('c3', { name: 'z', hostId: 'h1' }),
      ],
      domains: [
        domain('d1', 'b.example.com', 'c1'),
        domain('d2', 'a.example.com', 'c1'),
        domain('d3', 'c.example.com', 'c2'),
        domain('d4', 'orphan.example.com', null),
        domain('d5', 'dangling.example.com', 'ghost'),
      ],
    });

    expect(tree.hosts.map((h) => h.host.name)).toEqual(['app', 'db']);
    expect(tree.hosts[0].certificates.map((n) => n.certificate.name)).toEqual(['x', 'z']);
    expect(tree.hosts[0].certificates[0].domains.map((d) => d.name)).toEqual([
      'a.example.com',
      'b.example.com',
    ]);
    expect(tree.hosts[1].certificates).toEqual([]);
    expect(tree.unassignedCertificates.map((n) => n.certificate.id)).toEqual(['c2']);
    expect(tree.unassignedDomains.map((d) => d.name)).toEqual([
      'dangling.example.com',
      'orphan.example.com',
    ]);
    expect(tree.unusedCertificates.map((c) => c.id)).toEqual(['c3']);
  });
});
