/**
 * Types for indicators loaded from a source spreadsheet and the two
 * output shapes built from them.
 */

// --- Indicator Types ---

export const INDICATOR_TYPES = [
  'domain',
  'ip_address',
  'url',
  'hash_md5',
  'hash_sha1',
  'hash_sha256',
  'email',
] as const;

export type IndicatorType = (typeof INDICATOR_TYPES)[number];

export interface Indicator {
  readonly type: IndicatorType;
  readonly value: string;
  readonly fields: Readonly<Record<string, string>>;  // Passthrough columns
}

export interface IndicatorBatch {
  readonly source: string;
  readonly indicators: readonly Indicator[];
  readonly sheets: readonly SheetSummary[];
  readonly skipped: number;         // Rows with an empty value or unknown type
}

export interface SheetSummary {
  name: string;
  rows: number;
  indicators: number;
}

// --- Splunk Table ---

export interface AlignedRow {
  Domain: string;
  IP: string;
  URL: string;
  Date: string;
}

export type TableColumnType = 'domain' | 'ip_address' | 'url';

export interface TableResult {
  rows: AlignedRow[];
  counts: Record<TableColumnType, number>;
  maxLen: number;
}

// --- HX Chunks ---

export interface ChunkFile {
  index: number;                    // 1-based
  fileName: string;
  values: readonly string[];
}

export interface ChunkPlan {
  values: readonly string[];
  chunks: ChunkFile[];
}

export interface ChunkWriteResult {
  directory: string;
  files: string[];
  removed: number;                  // Stale chunk files replaced
}
