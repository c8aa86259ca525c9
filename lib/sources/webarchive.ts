import { createSecondarySource, FetchSourceOptions } from './fetchSource';
import { CONFIG } from '../config';
import type { CandidateSource } from '../types';

/**
 * Wayback Machine CDX API: archived URLs under the domain, reduced to their hosts.
 * The row ceiling bounds a single response; the first row is the `["original"]` header.
 */
export function createWebArchiveSource(opts?: FetchSourceOptions): CandidateSource {
  return createSecondarySource(
    {
      name: 'webarchive',
      url: () => 'https://web.archive.org/cdx/search/cdx',
      params: (domain) => ({
        url: `*.${domain}/*`,
        output: 'json',
        fl: 'original',
        collapse: 'urlkey',
        limit: CONFIG.ARCHIVE_ROW_LIMIT,
      }),
    },
    { timeoutMs: CONFIG.HTTP_TIMEOUT_MS * 2, ...opts },
  );
}

export default createWebArchiveSource;
