/**
 * HX chunk exporter.
 *
 * Collects the unique hashes, IPs and domains of a batch into one sorted
 * list and splits it into fixed-size plain-text files. Writing replaces
 * whatever chunk set an earlier run left in the output directory.
 */

import {
  mkdirSync,
  mkdtempSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { basename, dirname, join, resolve } from 'path';

import type {
  ChunkFile,
  ChunkPlan,
  ChunkWriteResult,
  IndicatorBatch,
  IndicatorType,
} from '../types/indicator.js';
import { uniqueSorted } from '../utils/collections.js';
import { EncodingError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hx');

export const HX_INDICATOR_TYPES: ReadonlySet<IndicatorType> = new Set<IndicatorType>([
  'hash_md5',
  'ip_address',
  'domain',
]);

export const DEFAULT_MAX_CHUNK_SIZE = 10000;

const CHUNK_FILE_PREFIX = 'hx_indicators_';
const CHUNK_FILE_EXTENSION = '.txt';
const CHUNK_FILE_PATTERN = /^hx_indicators_\d+\.txt$/;

// eslint-disable-next-line no-control-regex
const ASCII_ONLY = /^[\x00-\x7F]*$/;

export function chunkFileName(index: number): string {
  return `${CHUNK_FILE_PREFIX}${index}${CHUNK_FILE_EXTENSION}`;
}

export function isChunkFileName(name: string): boolean {
  return CHUNK_FILE_PATTERN.test(name);
}

/**
 * Split a list into consecutive slices of at most `size` elements.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Select, deduplicate, sort and split the HX-eligible values of a batch.
 */
export function buildChunks(
  batch: IndicatorBatch,
  maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE,
): ChunkPlan {
  const values = uniqueSorted(
    batch.indicators
      .filter((indicator) => HX_INDICATOR_TYPES.has(indicator.type))
      .map((indicator) => indicator.value),
  );

  const chunks: ChunkFile[] = chunk(values, maxChunkSize).map((slice, i) => ({
    index: i + 1,
    fileName: chunkFileName(i + 1),
    values: slice,
  }));

  log.debug(`Planned ${chunks.length} chunk(s) for ${values.length} unique indicators`);

  return { values, chunks };
}

/**
 * @throws EncodingError on the first value that is not plain ASCII
 */
export function assertAsciiPlan(plan: ChunkPlan): void {
  for (const value of plan.values) {
    if (!ASCII_ONLY.test(value)) {
      throw new EncodingError(value);
    }
  }
}

export function renderChunk(file: ChunkFile): string {
  return file.values.map((value) => `${value}\n`).join('');
}

/**
 * Write a chunk plan into `directory`, replacing any earlier chunk files.
 *
 * Files are first staged in a sibling directory and only moved into place
 * once all of them have been written. Files in `directory` that do not
 * follow the chunk naming convention are left untouched.
 *
 * @throws EncodingError if a value cannot be written as ASCII; nothing on
 *   disk is changed in that case
 */
export function writeChunks(plan: ChunkPlan, directory: string): ChunkWriteResult {
  const target = resolve(directory);
  assertAsciiPlan(plan);

  mkdirSync(dirname(target), { recursive: true });
  const staging = mkdtempSync(join(dirname(target), `.${basename(target)}-staging-`));

  try {
    for (const file of plan.chunks) {
      writeFileSync(join(staging, file.fileName), renderChunk(file), 'ascii');
    }

    mkdirSync(target, { recursive: true });

    const stale = readdirSync(target).filter(isChunkFileName);
    for (const name of stale) {
      rmSync(join(target, name), { force: true });
    }

    const files: string[] = [];
    for (const file of plan.chunks) {
      const destination = join(target, file.fileName);
      renameSync(join(staging, file.fileName), destination);
      files.push(destination);
    }

    log.debug(`Wrote ${files.length} chunk file(s) to ${target}`, { removed: stale.length });

    return { directory: target, files, removed: stale.length };
  } finally {
    rmSync(staging, { recursive: true, force: true });
  }
}
