#!/usr/bin/env node

/**
 * subsweep CLI.
 *
 * stdout carries validated hostnames only, streamed as they are confirmed.
 * Diagnostics go to stderr: console.error for the final error line, the pino
 * logger for everything else.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { writeFile } from 'fs/promises';
import { CONFIG } from '../lib/config';
import logger from '../lib/logger';
import { TransportError, describeError } from '../lib/errors';
import { runDiscovery, DiscoverySummary } from '../lib/discovery';
import { buildSources } from '../lib/passiveSources';
import { createResolver } from '../lib/dns';
import { ReportCollector, StreamSink, fanOut } from '../lib/sinks';
import { reportRows, writeReport } from '../lib/report';
import { register } from '../lib/metrics';

export type CliOptions = {
  output?: string;
  allSources: boolean;
  workers: number;
  maxInFlight: number;
  dnsTimeout: number;
  resolver?: string[];
  metrics?: string;
  verbose: boolean;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('subsweep')
    .description('Discover live subdomains from passive DNS sources, filtering wildcard answers')
    .argument('<domain>', 'target domain, e.g. example.com')
    .option('-o, --output <path>', 'also write a results table to <path> (.json for JSON)')
    .option('-a, --all-sources', 'query secondary sources too (broader, slower)', false)
    .option('-w, --workers <n>', 'concurrent DNS lookups', parsePositiveInt, CONFIG.CONCURRENCY.RESOLVE_WORKERS)
    .option('--max-in-flight <n>', 'cap on submitted, unfinished lookups', parsePositiveInt, CONFIG.CONCURRENCY.MAX_IN_FLIGHT)
    .option('--dns-timeout <ms>', 'per-lookup timeout', parsePositiveInt, CONFIG.DNS_TIMEOUT_MS)
    .option('--resolver <ip...>', 'nameserver(s) to query instead of the system ones')
    .option('--metrics <path>', 'write Prometheus metrics text to <path> after the run')
    .option('-v, --verbose', 'debug logging', false);
}

/** Exit status for an error that ended the run. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof TransportError && err.kind === 'parse') return 2;
  return 1;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram().exitOverride();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const [target] = program.args;
  const opts = program.opts<CliOptions>();
  if (opts.verbose) logger.level = 'debug';

  const collector = new ReportCollector();
  const sink = opts.output ? fanOut(new StreamSink(), collector) : new StreamSink();

  let summary: DiscoverySummary;
  try {
    summary = await runDiscovery(target, {
      sources: buildSources({ includeSecondary: opts.allSources }),
      resolve: createResolver({ timeoutMs: opts.dnsTimeout, servers: opts.resolver }),
      sink,
      workers: opts.workers,
      maxInFlight: opts.maxInFlight,
    });
  } catch (err) {
    console.error(`subsweep: ${describeError(err)}`);
    return exitCodeFor(err);
  }

  logger.info({ ...summary }, 'discovery finished');

  if (opts.output) {
    await writeReport(opts.output, reportRows(collector.results));
  }
  if (opts.metrics) {
    try {
      await writeFile(opts.metrics, await register.metrics(), 'utf8');
    } catch (err) {
      logger.warn({ err, file: opts.metrics }, 'could not write metrics');
    }
  }
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
