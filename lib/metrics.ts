/**
 * Run metrics using `prom-client`.
 *
 * Metrics:
 * - `subsweep_http_attempts_total{outcome}` (Counter): ok | transient | fatal | network
 * - `subsweep_http_retries_total` (Counter)
 * - `subsweep_candidates_total{source}` (Counter): in-scope, first-seen names per source
 * - `subsweep_resolutions_total{outcome}` (Counter): live | unresolved | wildcard | duplicate
 * - `subsweep_resolutions_in_flight` (Gauge)
 *
 * The CLI dumps `register.metrics()` to a file when `--metrics` is given.
 */

import { Counter, Gauge, register } from 'prom-client';

export type HttpOutcome = 'ok' | 'transient' | 'fatal' | 'network';
export type ResolutionOutcome = 'live' | 'unresolved' | 'wildcard' | 'duplicate';

export const httpAttempts = new Counter({
  name: 'subsweep_http_attempts_total',
  help: 'HTTP attempts made against candidate sources, by outcome',
  labelNames: ['outcome'],
});

export const httpRetries = new Counter({
  name: 'subsweep_http_retries_total',
  help: 'HTTP attempts that were followed by a backoff and another attempt',
});

export const candidatesTotal = new Counter({
  name: 'subsweep_candidates_total',
  help: 'In-scope, previously unseen candidates submitted for resolution, by source',
  labelNames: ['source'],
});

export const resolutionsTotal = new Counter({
  name: 'subsweep_resolutions_total',
  help: 'Completed resolutions, by outcome',
  labelNames: ['outcome'],
});

export const resolutionsInFlight = new Gauge({
  name: 'subsweep_resolutions_in_flight',
  help: 'Resolution tasks submitted and not yet drained',
});

export function incHttpAttempt(outcome: HttpOutcome): void {
  httpAttempts.inc({ outcome });
}

export function incHttpRetry(): void {
  httpRetries.inc();
}

export function incCandidate(source: string): void {
  candidatesTotal.inc({ source });
}

export function incResolution(outcome: ResolutionOutcome): void {
  resolutionsTotal.inc({ outcome });
}

export function setInFlight(count: number): void {
  resolutionsInFlight.set(count);
}

export { register };
