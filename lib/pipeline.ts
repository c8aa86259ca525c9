import pLimit from 'p-limit';
import { CONFIG } from './config';
import logger from './logger';
import { sameAddressSet } from './dns';
import { incResolution, setInFlight } from './metrics';
import type { AddressSet, LiveHost, Resolve, ResultSink } from './types';

const EMPTY: AddressSet = [];

export interface PipelineOptions {
  resolve: Resolve;
  sink: ResultSink;
  wildcard?: AddressSet | null;
  workers?: number; // concurrent lookups
  maxInFlight?: number; // submitted and not yet completed
}

export interface PipelineStats {
  submitted: number;
  live: number;
  unresolved: number;
  wildcard: number;
  duplicates: number;
  peakInFlight: number;
}

/**
 * Bounded-concurrency resolution stage.
 *
 * `submit` is the only producer entry point; it blocks once `maxInFlight` tasks
 * are outstanding. Worker tasks never touch the found set or the sink: completed
 * lookups are queued and handed over in `drainReady`, which runs on the producer
 * side. That single-writer rule is what keeps the found set consistent.
 */
export class ResolutionPipeline {
  readonly stats: PipelineStats = {
    submitted: 0,
    live: 0,
    unresolved: 0,
    wildcard: 0,
    duplicates: 0,
    peakInFlight: 0,
  };

  private readonly limit: ReturnType<typeof pLimit>;
  private readonly maxInFlight: number;
  private readonly wildcard: AddressSet | null;
  private readonly completed: LiveHost[] = [];
  private readonly found = new Set<string>();
  private outstanding = 0;
  private waiter: (() => void) | null = null;
  private closed = false;

  constructor(private readonly opts: PipelineOptions) {
    this.limit = pLimit(opts.workers ?? CONFIG.CONCURRENCY.RESOLVE_WORKERS);
    this.maxInFlight = Math.max(1, opts.maxInFlight ?? CONFIG.CONCURRENCY.MAX_IN_FLIGHT);
    this.wildcard = opts.wildcard && opts.wildcard.length > 0 ? opts.wildcard : null;
  }

  get inFlightCount(): number {
    return this.outstanding;
  }

  /** Schedule resolution of a normalized, in-scope, first-seen host. */
  async submit(host: string): Promise<void> {
    if (this.closed) throw new Error('ResolutionPipeline is closed');

    this.drainReady();
    while (this.outstanding >= this.maxInFlight) {
      await this.drainOne();
    }
    if (this.closed) throw new Error('ResolutionPipeline is closed');

    void this.limit(() => this.opts.resolve(host))
      .catch((err: unknown) => {
        logger.debug({ err, host }, 'resolve failed, treating as unresolved');
        return EMPTY;
      })
      .then((addresses) => this.complete({ host, addresses }));

    this.outstanding++;
    this.stats.submitted++;
    this.stats.peakInFlight = Math.max(this.stats.peakInFlight, this.outstanding);
    setInFlight(this.outstanding);
  }

  /** Hand every already-completed lookup to the result step without waiting. */
  drainReady(): number {
    const batch = this.completed.splice(0, this.completed.length);
    for (const result of batch) this.handle(result);
    return batch.length;
  }

  /** Wait for every outstanding lookup, streaming results as they complete. */
  async flush(): Promise<void> {
    while (this.outstanding > 0) {
      await this.drainOne();
    }
    this.drainReady();
  }

  /**
   * Teardown after a fatal error. Queued lookups are dropped; running ones are
   * abandoned and their answers ignored.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.limit.clearQueue();
    const abandoned = this.outstanding;
    this.outstanding = 0;
    this.completed.length = 0;
    this.wake();
    setInFlight(0);
    if (abandoned > 0) logger.debug({ abandoned }, 'resolution pipeline closed with lookups outstanding');
  }

  private complete(result: LiveHost): void {
    if (this.closed) return;
    this.outstanding--;
    this.completed.push(result);
    setInFlight(this.outstanding);
    this.wake();
  }

  private wake(): void {
    const resume = this.waiter;
    this.waiter = null;
    resume?.();
  }

  /** Wait until at least one lookup has completed, then drain. One waiter at a time: only the producer calls this. */
  private async drainOne(): Promise<void> {
    if (this.completed.length === 0 && this.outstanding > 0) {
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    this.drainReady();
  }

  private handle({ host, addresses }: LiveHost): void {
    if (addresses.length === 0) {
      this.stats.unresolved++;
      incResolution('unresolved');
      return;
    }
    if (this.wildcard !== null && sameAddressSet(addresses, this.wildcard)) {
      this.stats.wildcard++;
      incResolution('wildcard');
      logger.debug({ host }, 'suppressed wildcard answer');
      return;
    }
    if (this.found.has(host)) {
      this.stats.duplicates++;
      incResolution('duplicate');
      return;
    }
    this.found.add(host);
    this.stats.live++;
    incResolution('live');
    this.opts.sink.accept({ host, addresses });
  }
}
