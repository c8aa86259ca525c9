import { Resolver } from 'dns/promises';
import { withTimeout } from './net/timeout';
import { CONFIG } from './config';
import type { AddressSet, Resolve } from './types';

const EMPTY: AddressSet = [];

export function toAddressSet(addresses: Iterable<string>): AddressSet {
  return Array.from(new Set(addresses)).sort();
}

/** Canonical string form of an address set; equal sets share a key. */
export function addressSetKey(set: AddressSet): string {
  return toAddressSet(set).join(',');
}

export function sameAddressSet(a: AddressSet, b: AddressSet): boolean {
  return addressSetKey(a) === addressSetKey(b);
}

export interface ResolverOptions {
  timeoutMs?: number;
  servers?: string[]; // nameserver IPs; system configuration when empty
}

/**
 * Hostname -> address set (A and AAAA, queried in parallel).
 * Timeouts, NXDOMAIN, NODATA and every other failure count as "no addresses".
 */
export function createResolver(opts?: ResolverOptions): Resolve {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  const servers = opts?.servers ?? CONFIG.DNS_SERVERS;

  // One try per lookup: the outer timeout bounds it, and nothing runs past a freed worker slot.
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  if (servers.length > 0) resolver.setServers(servers);

  return async (host: string): Promise<AddressSet> => {
    const [v4, v6] = await Promise.all([
      withTimeout(resolver.resolve4(host), timeoutMs, 'resolve4').catch(() => EMPTY),
      withTimeout(resolver.resolve6(host), timeoutMs, 'resolve6').catch(() => EMPTY),
    ]);
    return toAddressSet([...v4, ...v6]);
  };
}
