import { writeFile } from 'fs/promises';
import path from 'path';
import Table from 'cli-table3';
import logger from './logger';
import { toAddressSet } from './dns';
import type { LiveHost } from './types';

export interface ReportRow {
  host: string;
  addresses: string; // sorted, comma-joined without spaces
}

export type ReportFormat = 'table' | 'json';

/** One row per host, sorted by hostname. */
export function reportRows(hosts: Iterable<LiveHost>): ReportRow[] {
  return Array.from(hosts, (h) => ({ host: h.host, addresses: toAddressSet(h.addresses).join(',') })).sort(
    (a, b) => (a.host < b.host ? -1 : a.host > b.host ? 1 : 0),
  );
}

export function formatFor(file: string): ReportFormat {
  return path.extname(file).toLowerCase() === '.json' ? 'json' : 'table';
}

export function renderReport(rows: ReportRow[], format: ReportFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(rows, null, 2)}\n`;
  }
  const table = new Table({
    head: ['Hostname', 'Addresses'],
    style: { head: [], border: [] },
  });
  for (const row of rows) table.push([row.host, row.addresses]);
  return `${table.toString()}\n`;
}

/**
 * Write the report next to the streamed output. Failure is logged as a warning
 * and reported as `false`; results already went to stdout.
 */
export async function writeReport(file: string, rows: ReportRow[]): Promise<boolean> {
  try {
    await writeFile(file, renderReport(rows, formatFor(file)), 'utf8');
    logger.info({ file, rows: rows.length }, 'report written');
    return true;
  } catch (err) {
    logger.warn({ err, file }, 'could not write report');
    return false;
  }
}
