import pLimit from 'p-limit';
import { CONFIG } from '../config';
import logger from '../logger';
import { TransportError, describeError } from '../errors';
import { fromJson, TreeNode } from '../extract';
import { incHttpAttempt, incHttpRetry } from '../metrics';

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string): ReturnType<typeof pLimit> {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(CONFIG.CONCURRENCY.HTTP_PER_HOST);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base backoff
  maxBackoffMs?: number; // cap before jitter
  timeoutMs?: number; // per-attempt timeout
}

type RetryConfig = Required<FetchRetryOptions>;

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || (status >= 500 && status <= 599);
}

/**
 * Delay before the attempt following failed attempt `attempt` (0-based):
 * `min(maxBackoffMs, backoffMs * 2^attempt)` scaled by a jitter factor in [0.85, 1.15].
 */
export function backoffDelay(
  attempt: number,
  cfg: Pick<RetryConfig, 'backoffMs' | 'maxBackoffMs'>,
  random: () => number = Math.random,
): number {
  const base = Math.min(cfg.maxBackoffMs, cfg.backoffMs * Math.pow(2, attempt));
  return base * (0.85 + random() * 0.3);
}

/**
 * Retry-After as milliseconds. Accepts delta-seconds or an HTTP date; `undefined` if unusable.
 */
export function parseRetryAfter(val: string): number | undefined {
  const trimmed = val.trim();
  if (!trimmed) return undefined;
  const n = Number(trimmed);
  if (Number.isFinite(n)) return Math.max(0, n * 1000);
  const t = Date.parse(trimmed);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return undefined;
}

/**
 * Fetch `url`, retrying network failures and transient statuses with exponential backoff.
 * Resolves only with a 2xx response, its body already read within the attempt deadline;
 * every other outcome is a `TransportError`.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const cfg: RetryConfig = {
    retries: Math.max(1, opts?.retries ?? CONFIG.RETRY.ATTEMPTS),
    backoffMs: opts?.backoffMs ?? CONFIG.RETRY.BACKOFF_MS,
    maxBackoffMs: opts?.maxBackoffMs ?? CONFIG.RETRY.MAX_BACKOFF_MS,
    timeoutMs: opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS,
  };
  const limit = getLimitForHost(getHostFromUrl(url));

  return limit(() => execWithRetry(url, init, cfg));
}

async function execWithRetry(url: string, init: RequestInit | undefined, cfg: RetryConfig): Promise<Response> {
  let lastError = 'no attempt made';

  for (let attempt = 0; attempt < cfg.retries; attempt++) {
    const isLast = attempt + 1 >= cfg.retries;
    const res = await attemptOnce(url, init, cfg.timeoutMs);

    if (res instanceof Error) {
      // timeout, connection failure, or a body that broke off mid-read
      lastError = describeError(res);
      incHttpAttempt('network');
      logger.debug({ url, attempt: attempt + 1, err: lastError }, 'fetchWithRetry network error');
      if (!isLast) await backOff(url, attempt, cfg, backoffDelay(attempt, cfg));
      continue;
    }

    if (res.ok) {
      incHttpAttempt('ok');
      return res;
    }

    if (!isTransientStatus(res.status)) {
      incHttpAttempt('fatal');
      throw new TransportError('status', `${url} answered HTTP ${res.status}`, {
        url,
        attempts: attempt + 1,
        status: res.status,
      });
    }

    incHttpAttempt('transient');
    lastError = `HTTP ${res.status}`;
    if (isLast) break;

    let delay = backoffDelay(attempt, cfg);
    if (res.status === 429) {
      const ra = res.headers.get('retry-after');
      const hinted = ra ? parseRetryAfter(ra) : undefined;
      if (hinted !== undefined) delay = Math.max(delay, hinted);
    }
    await backOff(url, attempt, cfg, delay, res.status);
  }

  throw new TransportError('exhausted', `${url} failed after ${cfg.retries} attempts: ${lastError}`, {
    url,
    attempts: cfg.retries,
    lastError,
  });
}

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * One attempt: headers and, for a 2xx, the whole body, under a single deadline.
 * A 2xx comes back as a buffered Response; any other status with its body cancelled.
 */
async function attemptOnce(url: string, init: RequestInit | undefined, timeoutMs: number): Promise<Response | Error> {
  const controller = new AbortController();
  const id = setTimeout(() => {
    const reason = new Error(`no complete response within ${timeoutMs}ms`);
    reason.name = 'TimeoutError';
    controller.abort(reason);
  }, timeoutMs);

  try {
    return await untilAborted(receive(url, init, controller.signal), controller.signal);
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  } finally {
    clearTimeout(id);
  }
}

async function receive(url: string, init: RequestInit | undefined, signal: AbortSignal): Promise<Response> {
  const res = await fetch(url, { ...init, signal });
  if (!res.ok) {
    await res.body?.cancel();
    return res;
  }
  const text = await res.text();
  return new Response(NULL_BODY_STATUSES.has(res.status) ? null : text, {
    status: res.status,
    statusText: res.statusText,
    headers: res.headers,
  });
}

function untilAborted<T>(p: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    p.then(
      (v) => { signal.removeEventListener('abort', onAbort); resolve(v); },
      (e) => { signal.removeEventListener('abort', onAbort); reject(e); },
    );
  });
}

async function backOff(url: string, attempt: number, cfg: RetryConfig, delay: number, status?: number): Promise<void> {
  incHttpRetry();
  logger.debug({ url, attempt: attempt + 1, of: cfg.retries, status, delay: Math.round(delay) }, 'fetchWithRetry backing off');
  await delayMs(delay);
}

function delayMs(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

export type RequestPayload = Record<string, string | number>;

export interface RequestJsonOptions extends FetchRetryOptions {
  headers?: Record<string, string>;
  /** Content-Type of a POST body. The body is JSON-encoded either way. */
  contentType?: string;
}

/**
 * One logical JSON request: `payload` becomes the JSON body of a POST or the
 * query string of a GET. A 2xx body that does not parse is fatal.
 */
export async function requestJson(
  method: 'GET' | 'POST',
  url: string,
  payload: RequestPayload = {},
  opts?: RequestJsonOptions,
): Promise<TreeNode> {
  const headers: Record<string, string> = {
    Accept: 'application/json, */*',
    'User-Agent': CONFIG.USER_AGENT,
    ...opts?.headers,
  };
  let target = url;
  let body: string | undefined;

  if (method === 'POST') {
    headers['Content-Type'] = opts?.contentType ?? 'application/json';
    body = JSON.stringify(payload);
  } else {
    const u = new URL(url);
    for (const [k, v] of Object.entries(payload)) u.searchParams.set(k, String(v));
    target = u.toString();
  }

  const res = await fetchWithRetry(target, { method, headers, body }, opts);
  const text = await res.text();
  try {
    return fromJson(JSON.parse(text));
  } catch {
    const snippet = text.slice(0, 200).replace(/\n/g, '\\n');
    throw new TransportError('parse', `Unexpected response (not JSON) from ${target}. First 200 chars: ${snippet}`, {
      url: target,
      status: res.status,
    });
  }
}
