// Runtime configuration: timeouts, retries, paging and concurrency.
// Read once from the environment; CLI flags override per run.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

function envList(name: string): string[] {
  const v = process.env[name];
  if (!v) return [];
  return v.split(/[\s,]+/).map((s) => s.trim()).filter(Boolean);
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 30_000),
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),
  DNS_SERVERS: envList('DNS_SERVERS'),

  USER_AGENT: process.env.USER_AGENT || 'subsweep/0.1',

  RETRY: {
    ATTEMPTS: envInt('RETRY_ATTEMPTS', 6),
    BACKOFF_MS: envInt('RETRY_BACKOFF_MS', 500),
    MAX_BACKOFF_MS: envInt('RETRY_MAX_BACKOFF_MS', 20_000),
    SECONDARY_ATTEMPTS: envInt('SECONDARY_RETRY_ATTEMPTS', 2),
  },

  PRIMARY: {
    URL: process.env.PRIMARY_SOURCE_URL || 'https://ip.thc.org/api/v1/lookup/subdomains',
    PAGE_SIZE: envInt('PAGE_SIZE', 500),
    PAGE_DELAY_MS: envInt('PAGE_DELAY_MS', 150),
  },

  CONCURRENCY: {
    HTTP_PER_HOST: envInt('HTTP_PER_HOST', 4) || 1,
    RESOLVE_WORKERS: envInt('RESOLVE_WORKERS', 60) || 1,
    MAX_IN_FLIGHT: envInt('MAX_IN_FLIGHT', 2500) || 1,
  },

  WILDCARD: {
    PROBES: 3,
    LABEL_LENGTH: 18,
  },

  ARCHIVE_ROW_LIMIT: envInt('ARCHIVE_ROW_LIMIT', 10_000),
};

export default CONFIG;
