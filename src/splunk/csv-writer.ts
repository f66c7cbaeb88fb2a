/**
 * CSV serialization for the Splunk table.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import Papa from 'papaparse';

import type { AlignedRow } from '../types/indicator.js';
import { TABLE_HEADER } from './table-builder.js';

/**
 * Render rows as CSV text with the `Domain,IP,URL,Date` header.
 * Cells are quoted only when they contain a delimiter, quote or newline.
 */
export function renderTableCsv(rows: readonly AlignedRow[]): string {
  const body = Papa.unparse(
    {
      fields: [...TABLE_HEADER],
      data: rows.map((row) => TABLE_HEADER.map((column) => row[column])),
    },
    { newline: '\n', quotes: false },
  );
  return `${body}\n`;
}

/**
 * Write rows to `path`, creating the parent directory if needed.
 * Returns the absolute path written.
 */
export function writeTableCsv(rows: readonly AlignedRow[], path: string): string {
  const target = resolve(path);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, renderTableCsv(rows), 'utf-8');
  return target;
}
