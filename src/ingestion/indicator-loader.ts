/**
 * Spreadsheet loader for indicator batches.
 *
 * Reads every worksheet of the source workbook in order. The first row of
 * each sheet is its header and must name a `type` and an `indicator`
 * column; remaining columns are carried along as passthrough fields.
 */

import { readFileSync, statSync } from 'fs';
import { basename, extname, resolve } from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';

import {
  INDICATOR_TYPES,
  type Indicator,
  type IndicatorBatch,
  type SheetSummary,
} from '../types/indicator.js';
import {
  InvalidPathError,
  MissingColumnError,
  UnsupportedFormatError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('loader');

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.xlsm', '.xlsb', '.xls', '.ods', '.csv'] as const;

const TYPE_COLUMN = 'type';
const VALUE_COLUMN = 'indicator';

const IndicatorRowSchema = z.object({
  type: z.string().trim().toLowerCase().pipe(z.enum(INDICATOR_TYPES)),
  indicator: z.string().trim().min(1),
});

/**
 * Check the extension against the formats the workbook reader handles.
 */
export function isSupportedSpreadsheet(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Load every indicator row from a spreadsheet file.
 *
 * @throws InvalidPathError when the file is missing or unreadable
 * @throws UnsupportedFormatError for a non-spreadsheet extension or unparseable bytes
 * @throws MissingColumnError when a sheet with data lacks the required headers
 */
export function loadIndicators(path: string): IndicatorBatch {
  const source = resolve(path);

  let isFile: boolean;
  try {
    isFile = statSync(source).isFile();
  } catch (err) {
    throw new InvalidPathError(source, 'does not exist', { cause: err });
  }
  if (!isFile) {
    throw new InvalidPathError(source, 'is not a file');
  }

  if (!isSupportedSpreadsheet(source)) {
    throw new UnsupportedFormatError(
      source,
      `expected one of ${SUPPORTED_EXTENSIONS.join(', ')}`,
    );
  }

  let data: Buffer;
  try {
    data = readFileSync(source);
  } catch (err) {
    throw new InvalidPathError(source, 'could not be read', { cause: err });
  }

  let workbook: XLSX.WorkBook;
  try {
    // raw keeps text-source cells as written, e.g. `1-2` is not read as a date
    workbook = XLSX.read(data, { type: 'buffer', cellDates: false, raw: true });
  } catch (err) {
    throw new UnsupportedFormatError(
      source,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
  }

  const indicators: Indicator[] = [];
  const sheets: SheetSummary[] = [];
  let skipped = 0;

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;

    const result = readSheet(sheetName, sheet);
    indicators.push(...result.indicators);
    skipped += result.skipped;
    sheets.push({
      name: sheetName,
      rows: result.rows,
      indicators: result.indicators.length,
    });
  }

  log.info(`Loaded ${indicators.length} indicators from ${basename(source)}`, {
    sheets: sheets.length,
    skipped,
  });

  return { source, indicators, sheets, skipped };
}

// --- Helpers ---

interface SheetResult {
  indicators: Indicator[];
  rows: number;
  skipped: number;
}

function readSheet(sheetName: string, sheet: XLSX.WorkSheet): SheetResult {
  const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: false,
  });

  const [headerRow, ...dataRows] = table;
  if (!headerRow) {
    log.debug(`Sheet "${sheetName}" is empty, skipping`);
    return { indicators: [], rows: 0, skipped: 0 };
  }

  const headers = headerRow.map((cell) => cellText(cell));
  const lowered = headers.map((h) => h.toLowerCase());
  const typeIndex = lowered.indexOf(TYPE_COLUMN);
  const valueIndex = lowered.indexOf(VALUE_COLUMN);

  const missing: string[] = [];
  if (typeIndex === -1) missing.push(TYPE_COLUMN);
  if (valueIndex === -1) missing.push(VALUE_COLUMN);
  if (missing.length > 0) {
    throw new MissingColumnError(sheetName, missing);
  }

  const indicators: Indicator[] = [];
  let skipped = 0;

  for (const row of dataRows) {
    const parsed = IndicatorRowSchema.safeParse({
      type: cellText(row[typeIndex]),
      indicator: cellText(row[valueIndex]),
    });

    if (!parsed.success) {
      skipped++;
      log.debug(`Skipping row in "${sheetName}"`, row);
      continue;
    }

    const fields: Record<string, string> = {};
    headers.forEach((header, i) => {
      if (i !== typeIndex && i !== valueIndex && header !== '') {
        fields[header] = cellText(row[i]);
      }
    });

    indicators.push({
      type: parsed.data.type,
      value: parsed.data.indicator,
      fields,
    });
  }

  return { indicators, rows: dataRows.length, skipped };
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return String(cell).trim();
}
