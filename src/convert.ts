/**
 * Conversion entry point: load a spreadsheet once, then produce the
 * Splunk table, the HX chunk files, or both.
 */

import { extname } from 'path';

import { resolveConfig } from './config.js';
import { assertAsciiPlan, buildChunks, writeChunks } from './hx/chunk-exporter.js';
import { loadIndicators } from './ingestion/indicator-loader.js';
import { buildTable } from './splunk/table-builder.js';
import { writeTableCsv } from './splunk/csv-writer.js';
import type {
  ConversionSummary,
  ConvertOptions,
  IndicatorBatch,
} from './types/index.js';
import { InvalidOutputFormatError } from './utils/errors.js';
import { uniqueSorted } from './utils/collections.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('convert');

/**
 * Reject a Splunk output name that is not a `.csv` file.
 */
export function assertCsvOutput(output: string): void {
  if (extname(output).toLowerCase() !== '.csv') {
    throw new InvalidOutputFormatError(output);
  }
}

/**
 * Number of distinct `hash_md5` values in a batch.
 */
export function countUniqueHashes(batch: IndicatorBatch): number {
  return uniqueSorted(
    batch.indicators.filter((i) => i.type === 'hash_md5').map((i) => i.value),
  ).length;
}

/**
 * Run a conversion.
 *
 * All option checks happen before the source is read, and the HX plan is
 * checked for non-ASCII values before either output is written, so a
 * failed run never leaves partial output behind.
 *
 * `totalProcessed` keeps the historical report definition: with both
 * paths it is the table row count plus the unique MD5 count, otherwise
 * the count of whichever path ran.
 */
export function convertIndicators(options: ConvertOptions): ConversionSummary {
  const config = resolveConfig(options);

  if (config.runSplunk) {
    assertCsvOutput(config.splunkOutput);
  }

  const batch = loadIndicators(config.input);
  const plan = config.runHx ? buildChunks(batch, config.chunkSize) : undefined;
  if (plan) {
    assertAsciiPlan(plan);
  }

  const summary: ConversionSummary = {
    source: batch.source,
    indicatorsLoaded: batch.indicators.length,
    skippedRows: batch.skipped,
    totalProcessed: 0,
  };

  if (config.runSplunk) {
    const table = buildTable(batch, config.now);
    const output = writeTableCsv(table.rows, config.splunkOutput);
    summary.splunk = { output, rows: table.rows.length, counts: table.counts };
    log.info(`Splunk table written: ${output}`, { rows: table.rows.length });
  }

  if (plan) {
    const written = writeChunks(plan, config.hxDir);
    summary.hx = {
      directory: written.directory,
      uniqueIndicators: plan.values.length,
      chunks: plan.chunks.length,
      files: written.files,
    };
    log.info(`HX chunks written: ${written.directory}`, { chunks: plan.chunks.length });
  }

  if (summary.splunk && summary.hx) {
    summary.totalProcessed = summary.splunk.rows + countUniqueHashes(batch);
  } else if (summary.hx) {
    summary.totalProcessed = summary.hx.uniqueIndicators;
  } else if (summary.splunk) {
    summary.totalProcessed = summary.splunk.rows;
  }

  return summary;
}
