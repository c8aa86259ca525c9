import { createSecondarySource, FetchSourceOptions } from './fetchSource';
import type { CandidateSource } from '../types';

/**
 * Anubis (jldc.me): returns a JSON array of subdomains directly. No auth.
 */
export function createAnubisSource(opts?: FetchSourceOptions): CandidateSource {
  return createSecondarySource(
    {
      name: 'anubis',
      url: (domain) => `https://jldc.me/anubis/subdomains/${encodeURIComponent(domain)}`,
    },
    opts,
  );
}

export default createAnubisSource;
