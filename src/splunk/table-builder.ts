/**
 * Splunk table builder.
 *
 * Lines up the unique domains, IPs and URLs of a batch side by side: row
 * `i` holds the `i`-th value of each sorted column. Shorter columns are
 * padded with empty cells and only the first row carries the date stamp.
 */

import type {
  AlignedRow,
  IndicatorBatch,
  TableColumnType,
  TableResult,
} from '../types/indicator.js';
import { uniqueSorted } from '../utils/collections.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('splunk');

export const TABLE_HEADER = ['Domain', 'IP', 'URL', 'Date'] as const;

const TABLE_COLUMNS: readonly TableColumnType[] = ['domain', 'ip_address', 'url'];

/**
 * Format a date as `yyyyMMdd` in local time.
 */
export function formatDateStamp(date: Date): string {
  const yyyy = String(date.getFullYear()).padStart(4, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}

/**
 * Group a batch into the three table columns, each deduplicated and sorted.
 */
export function groupTableColumns(batch: IndicatorBatch): Record<TableColumnType, string[]> {
  const raw: Record<TableColumnType, string[]> = { domain: [], ip_address: [], url: [] };

  for (const indicator of batch.indicators) {
    switch (indicator.type) {
      case 'domain':
      case 'ip_address':
      case 'url':
        raw[indicator.type].push(indicator.value);
        break;
      default:
        break;
    }
  }

  return {
    domain: uniqueSorted(raw.domain),
    ip_address: uniqueSorted(raw.ip_address),
    url: uniqueSorted(raw.url),
  };
}

/**
 * Build the aligned rows for the Splunk CSV.
 *
 * With no domains, IPs or URLs the table is a single row with every
 * field empty, the date included.
 */
export function buildTable(batch: IndicatorBatch, now: Date = new Date()): TableResult {
  const groups = groupTableColumns(batch);
  const maxLen = Math.max(...TABLE_COLUMNS.map((column) => groups[column].length));
  const rowCount = Math.max(maxLen, 1);
  const stamp = maxLen > 0 ? formatDateStamp(now) : '';

  const rows: AlignedRow[] = [];
  for (let i = 0; i < rowCount; i++) {
    rows.push({
      Domain: groups.domain[i] ?? '',
      IP: groups.ip_address[i] ?? '',
      URL: groups.url[i] ?? '',
      Date: i === 0 ? stamp : '',
    });
  }

  const counts = {
    domain: groups.domain.length,
    ip_address: groups.ip_address.length,
    url: groups.url.length,
  };

  log.debug('Built Splunk table', { ...counts, rows: rows.length });

  return { rows, counts, maxLen };
}
