import {
  backoffDelay,
  fetchWithRetry,
  isTransientStatus,
  parseRetryAfter,
  requestJson,
} from '../lib/net/fetchWithRetry';
import { TransportError } from '../lib/errors';

const URL_ = 'https://api.test/lookup';
const FAST = { retries: 6, backoffMs: 1, maxBackoffMs: 2, timeoutMs: 1000 };

function jsonResponse(body: unknown, status = 200, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

const encoder = new TextEncoder();

/** Body that delivers one chunk and then fails like a reset connection. */
async function* brokenBody(): AsyncGenerator<Uint8Array> {
  yield encoder.encode('{"subdomains":["a.exa');
  throw new TypeError('terminated');
}

/** Body that delivers one chunk and then never finishes. */
async function* stalledBody(): AsyncGenerator<Uint8Array> {
  yield encoder.encode('{"subdomains":[');
  await new Promise<never>(() => undefined);
}

async function captureError(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}

describe('fetchWithRetry', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => jest.restoreAllMocks());

  test('returns the first 2xx response without retrying', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ ok: true }));
    const res = await fetchWithRetry(URL_, undefined, FAST);
    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('a source that always answers 503 gets exactly the configured attempts', async () => {
    fetchMock.mockImplementation(async () => textResponse('busy', 503));
    const err = await captureError(fetchWithRetry(URL_, undefined, FAST));
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 6, lastError: 'HTTP 503' });
    expect(fetchMock).toHaveBeenCalledTimes(6);
  });

  test('honours a smaller attempt budget', async () => {
    fetchMock.mockImplementation(async () => textResponse('busy', 502));
    const err = await captureError(fetchWithRetry(URL_, undefined, { ...FAST, retries: 2 }));
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test.each([400, 401, 403, 404])('HTTP %d is fatal on the first attempt', async (status) => {
    fetchMock.mockImplementation(async () => textResponse('nope', status));
    const err = await captureError(fetchWithRetry(URL_, undefined, FAST));
    expect(err).toMatchObject({ kind: 'status', status, attempts: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('recovers after transient statuses', async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse('', 503))
      .mockResolvedValueOnce(textResponse('', 429))
      .mockResolvedValueOnce(jsonResponse({ done: true }));
    const res = await fetchWithRetry(URL_, undefined, FAST);
    expect(await res.json()).toEqual({ done: true });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test('retries network failures and reports the last one', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const err = await captureError(fetchWithRetry(URL_, undefined, { ...FAST, retries: 3 }));
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 3, lastError: 'fetch failed' });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test('aborts an attempt that exceeds the timeout', async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })),
          );
        }),
    );
    const err = await captureError(fetchWithRetry(URL_, undefined, { ...FAST, retries: 2, timeoutMs: 5 }));
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 2, lastError: 'timeout' });
  });

  test('a body that breaks off mid-read is retried as a network failure', async () => {
    fetchMock.mockImplementation(async () => new Response(brokenBody(), { status: 200 }));
    const err = await captureError(fetchWithRetry(URL_, undefined, { ...FAST, retries: 3 }));
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 3, lastError: 'terminated' });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test('a body that never finishes is bounded by the attempt timeout', async () => {
    fetchMock.mockImplementation(async () => new Response(stalledBody(), { status: 200 }));
    const err = await captureError(fetchWithRetry(URL_, undefined, { ...FAST, retries: 2, timeoutMs: 30 }));
    expect(err).toMatchObject({ kind: 'exhausted', attempts: 2, lastError: 'timeout' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test('the body of a transient response is released before backing off', async () => {
    const busy = textResponse('busy', 503);
    fetchMock.mockResolvedValueOnce(busy).mockResolvedValueOnce(jsonResponse({ done: true }));
    const res = await fetchWithRetry(URL_, undefined, FAST);
    expect(busy.bodyUsed).toBe(true);
    expect(await res.json()).toEqual({ done: true });
  });

  test('waits at least the Retry-After hint on a 429', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'Retry-After': '0.1' } }))
      .mockResolvedValueOnce(jsonResponse({}));
    const started = Date.now();
    await fetchWithRetry(URL_, undefined, FAST);
    expect(Date.now() - started).toBeGreaterThanOrEqual(90);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('isTransientStatus', () => {
  test('transient set and any 5xx', () => {
    for (const s of [408, 425, 429, 500, 501, 502, 503, 504, 599]) expect(isTransientStatus(s)).toBe(true);
    for (const s of [200, 301, 400, 401, 404, 410, 422]) expect(isTransientStatus(s)).toBe(false);
  });
});

describe('backoffDelay', () => {
  const cfg = { backoffMs: 500, maxBackoffMs: 20_000 };

  test('doubles per attempt within the jitter band', () => {
    expect(backoffDelay(0, cfg, () => 0)).toBeCloseTo(425);
    expect(backoffDelay(0, cfg, () => 1)).toBeCloseTo(575);
    expect(backoffDelay(2, cfg, () => 0.5)).toBeCloseTo(2000);
  });

  test('caps before applying jitter', () => {
    expect(backoffDelay(10, cfg, () => 0)).toBeCloseTo(17_000);
    expect(backoffDelay(10, cfg, () => 1)).toBeCloseTo(23_000);
  });
});

describe('parseRetryAfter', () => {
  test('delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(' 0 ')).toBe(0);
  });

  test('HTTP date in the future', () => {
    const when = new Date(Date.now() + 60_000).toUTCString();
    const ms = parseRetryAfter(when);
    expect(ms).toBeGreaterThan(50_000);
    expect(ms).toBeLessThanOrEqual(60_000);
  });

  test('unusable values', () => {
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('requestJson', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => jest.restoreAllMocks());

  test('POST sends the payload as a JSON body', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ subdomains: ['a.example.com'] }));
    const tree = await requestJson('POST', URL_, { domain: 'example.com', limit: 500, page_state: '' }, {
      ...FAST,
      contentType: 'application/x-www-form-urlencoded',
    });

    expect(tree.kind).toBe('mapping');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(URL_);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"domain":"example.com","limit":500,"page_state":""}');
    expect(init?.headers).toMatchObject({ 'Content-Type': 'application/x-www-form-urlencoded' });
  });

  test('GET puts the payload in the query string', async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]));
    await requestJson('GET', 'https://crt.test/', { q: '%.example.com', output: 'json' }, FAST);
    expect(fetchMock.mock.calls[0][0]).toBe('https://crt.test/?q=%25.example.com&output=json');
    expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
  });

  test('a truncated body is fetched again before parsing', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(brokenBody(), { status: 200 }))
      .mockResolvedValueOnce(jsonResponse({ subdomains: ['a.example.com'] }));
    const tree = await requestJson('GET', URL_, {}, FAST);
    expect(tree.kind).toBe('mapping');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test('a 2xx body that is not JSON is fatal and not retried', async () => {
    fetchMock.mockImplementation(async () => textResponse('<html>maintenance</html>'));
    const err = await captureError(requestJson('GET', URL_, {}, FAST));
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'parse', status: 200 });
    expect(err).toHaveProperty('message', expect.stringContaining('First 200 chars: <html>maintenance</html>'));
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
