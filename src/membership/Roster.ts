import { ConfigurationError } from '../common/errors';
import {
  BootstrapDirective,
  BootstrapMode,
  InventoryEntry,
  Member,
  MemberUrlConfig,
  Roster
} from './types';

/**
 * Build a member URL from schema, address and port. IPv6 literals are bracketed.
 */
export function buildUrl(schema: string, address: string, port: number): string {
  const host = address.includes(':') && !address.startsWith('[') ? `[${address}]` : address;
  return `${schema}://${host}:${port}`;
}

/**
 * Derive a Member from an inventory entry
 */
export function deriveMember(entry: InventoryEntry, urls: MemberUrlConfig): Member {
  return {
    name: entry.name,
    clientURL: buildUrl(urls.clientSchema, entry.address, urls.clientPort),
    peerURL: buildUrl(urls.peerSchema, entry.address, urls.peerPort)
  };
}

/**
 * Derive the expected roster, preserving inventory order
 */
export function deriveExpectedRoster(entries: ReadonlyArray<InventoryEntry>, urls: MemberUrlConfig): Member[] {
  const roster = entries.map(entry => deriveMember(entry, urls));
  assertUniqueNames(roster, 'expected roster');
  return roster;
}

export function assertUniqueNames(roster: Roster, label: string): void {
  const seen = new Set<string>();
  for (const member of roster) {
    if (seen.has(member.name)) {
      throw new ConfigurationError(`Duplicate member name "${member.name}" in ${label}`);
    }
    seen.add(member.name);
  }
}

export function findByName(roster: Roster, name: string): Member | undefined {
  return roster.find(member => member.name === name);
}

/**
 * Members of `actual` whose name is absent from `expected`, in `actual` order
 */
export function staleMembers(expected: Roster, actual: Roster): Member[] {
  const expectedNames = new Set(expected.map(member => member.name));
  return actual.filter(member => !expectedNames.has(member.name));
}

/**
 * Comma-separated `name=peerURL` pairs, as consumed by ETCD_INITIAL_CLUSTER
 */
export function renderInitialCluster(directive: BootstrapDirective): string {
  return directive.initialCluster.join(',');
}

export function createDirective(expected: Roster, mode: BootstrapMode): BootstrapDirective {
  return {
    initialCluster: expected.map(member => `${member.name}=${member.peerURL}`),
    mode
  };
}
