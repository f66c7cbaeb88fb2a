/**
 * Shared fixture builders: in-memory indicator batches and workbooks
 * written to throwaway temp directories.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';

import type { IndicatorBatch, IndicatorType } from '@/types/index.js';

export type SheetRows = (string | number)[][];

export function makeBatch(entries: Array<[IndicatorType, string]>): IndicatorBatch {
  return {
    source: '/tmp/test.xlsx',
    indicators: entries.map(([type, value]) => ({ type, value, fields: {} })),
    sheets: [],
    skipped: 0,
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'ioc-convert-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a workbook with one worksheet per entry, in insertion order.
 */
export function writeWorkbook(
  path: string,
  sheets: Record<string, SheetRows>,
  bookType: XLSX.BookType = 'xlsx',
): string {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType });
  writeFileSync(path, data);
  return path;
}
