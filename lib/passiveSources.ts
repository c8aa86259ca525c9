/**
 * passiveSources.ts
 *
 * Source registry. The paginated primary source always runs first and is
 * authoritative; the one-shot secondary sources are opt-in, best-effort coverage.
 */
import { createPrimarySource, PrimarySourceOptions } from './sources/primary';
import { FetchSourceOptions } from './sources/fetchSource';
import { createCrtShSource } from './sources/crtsh';
import { createWebArchiveSource } from './sources/webarchive';
import { createAnubisSource } from './sources/anubis';
import { createAlienVaultSource } from './sources/alienvault';
import type { CandidateSource } from './types';

export const SECONDARY_SOURCES = {
  crtsh: createCrtShSource,
  webarchive: createWebArchiveSource,
  anubis: createAnubisSource,
  alienvault: createAlienVaultSource,
} satisfies Record<string, (opts?: FetchSourceOptions) => CandidateSource>;

export interface BuildSourcesOptions {
  includeSecondary?: boolean;
  primary?: PrimarySourceOptions;
  secondary?: FetchSourceOptions;
}

export function buildSources(opts?: BuildSourcesOptions): CandidateSource[] {
  const sources: CandidateSource[] = [createPrimarySource(opts?.primary)];
  if (opts?.includeSecondary) {
    for (const create of Object.values(SECONDARY_SOURCES)) {
      sources.push(create(opts.secondary));
    }
  }
  return sources;
}

export default buildSources;
