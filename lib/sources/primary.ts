import { requestJson, FetchRetryOptions } from '../net/fetchWithRetry';
import { extractCandidates, extractCursor } from '../extract';
import logger from '../logger';
import { CONFIG } from '../config';
import type { CandidatePage, CandidateSource } from '../types';

export interface PrimarySourceOptions extends FetchRetryOptions {
  url?: string;
  pageSize?: number;
  pageDelayMs?: number;
}

/**
 * Paginated passive DNS lookup (ip.thc.org by default).
 *
 * One POST per page carrying `{ domain, limit, page_state }`; the first page
 * uses an empty cursor. Stops when the response has no cursor or repeats the
 * one just sent. Transport errors are fatal and propagate to the caller.
 */
export function createPrimarySource(opts?: PrimarySourceOptions): CandidateSource {
  const url = opts?.url ?? CONFIG.PRIMARY.URL;
  const pageSize = opts?.pageSize ?? CONFIG.PRIMARY.PAGE_SIZE;
  const pageDelayMs = opts?.pageDelayMs ?? CONFIG.PRIMARY.PAGE_DELAY_MS;
  const name = 'thc';

  async function* pages(domain: string): AsyncGenerator<CandidatePage> {
    let cursor = '';
    for (let page = 1; ; page++) {
      const tree = await requestJson('POST', url, { domain, limit: pageSize, page_state: cursor }, {
        retries: opts?.retries,
        backoffMs: opts?.backoffMs,
        maxBackoffMs: opts?.maxBackoffMs,
        timeoutMs: opts?.timeoutMs,
        contentType: 'application/x-www-form-urlencoded',
      });

      yield { source: name, names: extractCandidates(tree) };

      const next = extractCursor(tree);
      if (!next) {
        logger.debug({ domain, pages: page }, 'primary source: last page');
        return;
      }
      if (next === cursor) {
        logger.warn({ domain, pages: page, cursor }, 'primary source repeated its cursor, stopping pagination');
        return;
      }
      cursor = next;
      await sleep(pageDelayMs);
    }
  }

  return { name, kind: 'primary', pages };
}

function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}
