/** Address set of a hostname: sorted, unique IP strings. Empty means "did not resolve". */
export type AddressSet = readonly string[];

/** Resolution primitive. Never rejects in practice; failures come back as an empty set. */
export type Resolve = (host: string) => Promise<AddressSet>;

export interface LiveHost {
  host: string; // normalized hostname, e.g. "api.example.com"
  addresses: AddressSet;
}

export interface CandidatePage {
  source: string;
  names: Iterable<string>; // raw, not yet normalized or scope-checked
}

export interface CandidateSource {
  readonly name: string;
  readonly kind: 'primary' | 'secondary';
  pages(domain: string): AsyncIterable<CandidatePage>;
}

export interface ResultSink {
  accept(result: LiveHost): void;
}
