/**
 * Inventory sources: read-only providers of hosts, certificates and domains
 */

import { readFile } from 'fs/promises';
import { InventoryError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type {
  Certificate,
  CertificateVisibility,
  Domain,
  Host,
  Inventory,
  InventoryId,
} from '../core/types.js';

export interface InventorySource {
  /** Human-readable origin, used in logs */
  readonly description: string;
  load(): Promise<Inventory>;
}

/**
 * In-memory inventory
 */
export class StaticInventorySource implements InventorySource {
  readonly description = 'in-memory inventory';
  private inventory: Inventory;

  constructor(inventory: Inventory) {
    this.inventory = inventory;
  }

  async load(): Promise<Inventory> {
    await Promise.resolve();
    return {
      hosts: [...this.inventory.hosts],
      certificates: [...this.inventory.certificates],
      domains: [...this.inventory.domains],
    };
  }
}

/**
 * Flat domain list (the DOMAINS environment variable): one certificate per domain
 */
export class DomainListInventorySource implements InventorySource {
  readonly description: string;
  private names: string[];

  constructor(names: readonly string[]) {
    this.names = Array.from(new Set(names.map((n) => n.trim()).filter(Boolean)));
    this.description = `domain list (${this.names.length})`;
  }

  static fromCommaList(list: string): DomainListInventorySource {
    return new DomainListInventorySource(list.split(','));
  }

  async load(): Promise<Inventory> {
    await Promise.resolve();
    const certificates: Certificate[] = [];
    const domains: Domain[] = [];

    this.names.forEach((name, index) => {
      const id = String(index + 1);
      certificates.push({ id, name, visibility: 'public', hostId: null });
      domains.push({ id, name, certificateId: id });
    });

    return { hosts: [], certificates, domains };
  }
}

/**
 * JSON inventory file: { hosts?, certificates, domains }
 */
export class JsonFileInventorySource implements InventorySource {
  readonly description: string;
  private path: string;

  constructor(path: string) {
    this.path = path;
    this.description = `inventory file ${path}`;
  }

  async load(): Promise<Inventory> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new InventoryError(
        `Cannot read inventory file ${this.path}: ${errorMessage(error)}`,
        error
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new InventoryError(`Inventory file ${this.path} is not valid JSON`, error);
    }

    const inventory = parseInventory(data);
    logger.debug(`Loaded ${this.description}`, {
      hosts: inventory.hosts.length,
      certificates: inventory.certificates.length,
      domains: inventory.domains.length,
    });
    return inventory;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ids may be non-empty strings or integers; both normalize to strings
 */
function readId(value: unknown, where: string, issues: string[]): InventoryId | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  issues.push(`${where}: id must be a non-empty string or an integer`);
  return undefined;
}

function readRef(value: unknown, where: string, issues: string[]): InventoryId | null | undefined {
  if (value === null || value === undefined) return null;
  return readId(value, where, issues);
}

function readName(value: unknown, where: string, issues: string[]): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  issues.push(`${where}: name must be a non-empty string`);
  return undefined;
}

function readVisibility(
  value: unknown,
  where: string,
  issues: string[]
): CertificateVisibility | undefined {
  if (value === undefined || value === null) return 'public';
  if (value === 'public' || value === 'internal') return value;
  issues.push(`${where}: visibility must be "public" or "internal"`);
  return undefined;
}

function readList(
  data: Record<string, unknown>,
  key: string,
  issues: string[],
  optional = false
): unknown[] {
  const value = data[key];
  if (value === undefined && optional) return [];
  if (!Array.isArray(value)) {
    issues.push(`${key} must be an array`);
    return [];
  }
  return value;
}

function checkUnique(ids: InventoryId[], label: string, issues: string[]) {
  const seen = new Set<InventoryId>();
  for (const id of ids) {
    if (seen.has(id)) issues.push(`duplicate ${label} id ${id}`);
    seen.add(id);
  }
}

/**
 * Validate untrusted inventory data. Domain references to unknown certificates
 * are kept (the reconciler skips them); certificate references to unknown hosts
 * are rejected.
 */
export function parseInventory(data: unknown): Inventory {
  if (!isRecord(data)) {
    throw new InventoryError('Inventory must be a JSON object');
  }

  const issues: string[] = [];
  const hosts: Host[] = [];
  const certificates: Certificate[] = [];
  const domains: Domain[] = [];

  readList(data, 'hosts', issues, true).forEach((item, i) => {
    const where = `hosts[${i}]`;
    if (!isRecord(item)) {
      issues.push(`${where}: must be an object`);
      return;
    }
    const id = readId(item.id, where, issues);
    const name = readName(item.name, where, issues);
    if (id !== undefined && name !== undefined) hosts.push({ id, name });
  });

  readList(data, 'certificates', issues).forEach((item, i) => {
    const where = `certificates[${i}]`;
    if (!isRecord(item)) {
      issues.push(`${where}: must be an object`);
      return;
    }
    const id = readId(item.id, where, issues);
    const name = readName(item.name, where, issues);
    const visibility = readVisibility(item.visibility, where, issues);
    const hostId = readRef(item.hostId, `${where}.hostId`, issues);
    if (id !== undefined && name !== undefined && visibility && hostId !== undefined) {
      certificates.push({ id, name, visibility, hostId });
    }
  });

  readList(data, 'domains', issues).forEach((item, i) => {
    const where = `domains[${i}]`;
    if (!isRecord(item)) {
      issues.push(`${where}: must be an object`);
      return;
    }
    const id = readId(item.id, where, issues);
    const name = readName(item.name, where, issues);
    const certificateId = readRef(item.certificateId, `${where}.certificateId`, issues);
    if (id !== undefined && name !== undefined && certificateId !== undefined) {
      domains.push({ id, name, certificateId });
    }
  });

  checkUnique(
    hosts.map((h) => h.id),
    'host',
    issues
  );
  checkUnique(
    certificates.map((c) => c.id),
    'certificate',
    issues
  );
  checkUnique(
    domains.map((d) => d.id),
    'domain',
    issues
  );

  const hostIds = new Set(hosts.map((h) => h.id));
  for (const certificate of certificates) {
    if (certificate.hostId !== null && !hostIds.has(certificate.hostId)) {
      issues.push(`certificate ${certificate.id} references unknown host ${certificate.hostId}`);
    }
  }

  if (issues.length > 0) {
    throw new InventoryError(`Invalid inventory: ${issues.join('; ')}`);
  }

  return { hosts, certificates, domains };
}
