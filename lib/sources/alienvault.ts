import { createSecondarySource, FetchSourceOptions } from './fetchSource';
import type { CandidateSource } from '../types';

// OTX passive DNS: { passive_dns: [{ hostname, address, ... }] }
export function createAlienVaultSource(opts?: FetchSourceOptions): CandidateSource {
  return createSecondarySource(
    {
      name: 'alienvault',
      url: (domain) => `https://otx.alienvault.com/api/v1/indicators/domain/${encodeURIComponent(domain)}/passive_dns`,
      hostKeys: ['hostname'],
    },
    opts,
  );
}

export default createAlienVaultSource;
