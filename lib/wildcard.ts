import logger from './logger';
import { CONFIG } from './config';
import { addressSetKey } from './dns';
import type { AddressSet, Resolve } from './types';

const LABEL_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export function randomLabel(length: number, random: () => number = Math.random): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += LABEL_ALPHABET[Math.floor(random() * LABEL_ALPHABET.length)];
  }
  return out;
}

export interface WildcardOptions {
  probes?: number;
  labelLength?: number;
  random?: () => number;
}

/**
 * Detect wildcard DNS by resolving random labels that should not exist.
 *
 * Returns the address set the zone hands out for unknown names, or `null`.
 * At least two probes must resolve, and the most common answer must be shared
 * by two or more of them; one odd answer out of three is tolerated.
 */
export async function detectWildcard(domain: string, resolve: Resolve, opts?: WildcardOptions): Promise<AddressSet | null> {
  const probes = opts?.probes ?? CONFIG.WILDCARD.PROBES;
  const labelLength = opts?.labelLength ?? CONFIG.WILDCARD.LABEL_LENGTH;

  const hosts = Array.from({ length: probes }, () => `${randomLabel(labelLength, opts?.random)}.${domain}`);
  const answers = await Promise.all(hosts.map((h) => resolve(h)));
  const observed = answers.filter((set) => set.length > 0);

  if (observed.length < 2) {
    logger.debug({ domain, resolved: observed.length }, 'wildcard probes mostly unresolved, no wildcard');
    return null;
  }

  const groups = new Map<string, { set: AddressSet; count: number }>();
  for (const set of observed) {
    const key = addressSetKey(set);
    const group = groups.get(key);
    if (group) group.count++;
    else groups.set(key, { set, count: 1 });
  }

  let best: { set: AddressSet; count: number } | undefined;
  for (const group of groups.values()) {
    if (!best || group.count > best.count) best = group;
  }

  if (!best || best.count < 2) {
    logger.debug({ domain, distinct: groups.size }, 'wildcard probes disagree, no wildcard');
    return null;
  }

  logger.info({ domain, addresses: best.set, matched: best.count, probes }, 'wildcard DNS detected');
  return best.set;
}
