import { requestJson, RequestJsonOptions, RequestPayload } from '../net/fetchWithRetry';
import { extractCandidates } from '../extract';
import { describeError } from '../errors';
import { expandRawName } from '../subdomain';
import logger from '../logger';
import { CONFIG } from '../config';
import type { CandidateSource } from '../types';

export interface FetchSourceOptions extends RequestJsonOptions {
  /** Extra mapping keys holding hostnames, checked after the built-in ones. */
  hostKeys?: string[];
}

/**
 * Common wrapper for one-shot secondary sources.
 * One GET, heuristic extraction, name expansion. Any failure means "no names".
 */
export async function fetchSource(
  url: string,
  payload: RequestPayload,
  domain: string,
  sourceName: string,
  opts?: FetchSourceOptions,
): Promise<string[]> {
  try {
    const tree = await requestJson('GET', url, payload, {
      ...opts,
      retries: opts?.retries ?? CONFIG.RETRY.SECONDARY_ATTEMPTS,
    });
    const names = new Set<string>();
    for (const raw of extractCandidates(tree, opts?.hostKeys)) {
      for (const name of expandRawName(raw)) names.add(name);
    }
    return Array.from(names);
  } catch (err) {
    logger.warn({ source: sourceName, domain, err: describeError(err) }, 'secondary source failed, continuing without it');
    return [];
  }
}

export interface SecondarySourceDefinition {
  name: string;
  url: (domain: string) => string;
  params?: (domain: string) => RequestPayload;
  hostKeys?: string[];
}

export function createSecondarySource(def: SecondarySourceDefinition, opts?: FetchSourceOptions): CandidateSource {
  return {
    name: def.name,
    kind: 'secondary',
    async *pages(domain: string) {
      const names = await fetchSource(def.url(domain), def.params?.(domain) ?? {}, domain, def.name, {
        hostKeys: def.hostKeys,
        ...opts,
      });
      logger.debug({ source: def.name, domain, count: names.length }, 'secondary source fetched');
      yield { source: def.name, names };
    },
  };
}

export default fetchSource;
