/**
 * Tree view of an inventory: hosts -> certificates -> domains
 */

import { compareStrings } from '../utils/sort.js';
import type { Certificate, Domain, Host, Inventory } from '../core/types.js';

export interface CertificateNode {
  certificate: Certificate;
  domains: Domain[];
}

export interface HostNode {
  host: Host;
  certificates: CertificateNode[];
}

export interface InventoryTree {
  hosts: HostNode[];
  /** Certificates with no host */
  unassignedCertificates: CertificateNode[];
  /** Domains with no certificate, or a certificate missing from the inventory */
  unassignedDomains: Domain[];
  /** Certificates that no domain points at; they are never probed */
  unusedCertificates: Certificate[];
}

const byName = <T extends { name: string; id: string }>(a: T, b: T) =>
  compareStrings(a.name, b.name) || compareStrings(a.id, b.id);

export function describeInventory(inventory: Inventory): InventoryTree {
  const certificateIds = new Set(inventory.certificates.map((c) => c.id));
  const domainsByCertificate = new Map<string, Domain[]>();
  const unassignedDomains: Domain[] = [];

  for (const domain of inventory.domains) {
    if (domain.certificateId === null || !certificateIds.has(domain.certificateId)) {
      unassignedDomains.push(domain);
      continue;
    }
    const list = domainsByCertificate.get(domain.certificateId) ?? [];
    list.push(domain);
    domainsByCertificate.set(domain.certificateId, list);
  }

  const nodeFor = (certificate: Certificate): CertificateNode => ({
    certificate,
    domains: (domainsByCertificate.get(certificate.id) ?? []).sort(byName),
  });

  const hostIds = new Set(inventory.hosts.map((h) => h.id));
  const hosts = [...inventory.hosts].sort(byName).map((host) => ({
    host,
    certificates: inventory.certificates
      .filter((c) => c.hostId === host.id)
      .sort(byName)
      .map(nodeFor),
  }));

  const unassignedCertificates = inventory.certificates
    .filter((c) => c.hostId === null || !hostIds.has(c.hostId))
    .sort(byName)
    .map(nodeFor);

  const unusedCertificates = inventory.certificates
    .filter((c) => !domainsByCertificate.has(c.id))
    .sort(byName);

  return {
    hosts,
    unassignedCertificates,
    unassignedDomains: unassignedDomains.sort(byName),
    unusedCertificates,
  };
}
