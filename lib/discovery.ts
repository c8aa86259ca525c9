import logger from './logger';
import { InvalidDomainError } from './errors';
import { incCandidate } from './metrics';
import { ResolutionPipeline } from './pipeline';
import { detectWildcard, WildcardOptions } from './wildcard';
import { inScope, isValidHost, normalizeCandidate, normalizeDomain } from './subdomain';
import type { AddressSet, CandidateSource, Resolve, ResultSink } from './types';

export interface DiscoveryOptions {
  sources: CandidateSource[];
  resolve: Resolve;
  sink: ResultSink;
  workers?: number;
  maxInFlight?: number;
  wildcard?: WildcardOptions;
}

export interface DiscoverySummary {
  domain: string;
  wildcard: AddressSet | null;
  pages: number;
  candidates: number; // unique in-scope names submitted
  live: number;
  unresolved: number;
  wildcardSuppressed: number;
  peakInFlight: number;
  durationMs: number;
}

/**
 * Validate and normalize the target domain.
 * Accepts URLs and IDNs ("https://Пример.рф/x" -> "xn--e1afmkfd.xn--p1ai").
 */
export function parseTarget(input: string): string {
  let domain: string;
  try {
    domain = normalizeDomain(input);
  } catch {
    throw new InvalidDomainError(input);
  }
  if (!isValidHost(domain)) throw new InvalidDomainError(input);
  return domain;
}

/**
 * Stream candidates from every source, in order, into the resolution pipeline.
 *
 * The seen set belongs to this loop alone. Fatal source errors close the
 * pipeline and propagate; the caller decides how the process ends.
 */
export async function runDiscovery(target: string, opts: DiscoveryOptions): Promise<DiscoverySummary> {
  const domain = parseTarget(target);
  const started = Date.now();

  const wildcard = await detectWildcard(domain, opts.resolve, opts.wildcard);
  const pipeline = new ResolutionPipeline({
    resolve: opts.resolve,
    sink: opts.sink,
    wildcard,
    workers: opts.workers,
    maxInFlight: opts.maxInFlight,
  });

  const seen = new Set<string>();
  let pages = 0;

  try {
    for (const source of opts.sources) {
      const before = seen.size;
      for await (const page of source.pages(domain)) {
        pages++;
        for (const raw of page.names) {
          const host = normalizeCandidate(raw);
          if (!host || !inScope(host, domain) || seen.has(host)) continue;
          seen.add(host);
          incCandidate(page.source);
          await pipeline.submit(host);
        }
        pipeline.drainReady();
      }
      logger.debug({ source: source.name, added: seen.size - before }, 'source exhausted');
    }
    await pipeline.flush();
  } catch (err) {
    pipeline.close();
    throw err;
  }

  return {
    domain,
    wildcard,
    pages,
    candidates: seen.size,
    live: pipeline.stats.live,
    unresolved: pipeline.stats.unresolved,
    wildcardSuppressed: pipeline.stats.wildcard,
    peakInFlight: pipeline.stats.peakInFlight,
    durationMs: Date.now() - started,
  };
}
