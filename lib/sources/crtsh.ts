import { createSecondarySource, FetchSourceOptions } from './fetchSource';
import { CONFIG } from '../config';
import type { CandidateSource } from '../types';

/**
 * crt.sh: Certificate Transparency log search.
 * A record's `name_value` may hold several newline-separated names, some of them `*.` wildcards.
 */
export function createCrtShSource(opts?: FetchSourceOptions): CandidateSource {
  return createSecondarySource(
    {
      name: 'crtsh',
      url: () => 'https://crt.sh/',
      params: (domain) => ({ q: `%.${domain}`, output: 'json' }),
      hostKeys: ['name_value', 'common_name'],
    },
    { timeoutMs: CONFIG.HTTP_TIMEOUT_MS * 2, ...opts },
  );
}

export default createCrtShSource;
