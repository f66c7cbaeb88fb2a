/**
 * Convert command: Splunk CSV and HX chunk export.
 *
 * Reads an indicator spreadsheet and writes the aligned Splunk table, the
 * HX chunk files, or both when neither is asked for explicitly.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { DEFAULT_HX_DIR, DEFAULT_SPLUNK_OUTPUT } from '../../config.js';
import { convertIndicators } from '../../convert.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import type { ConversionSummary } from '../../types/index.js';
import {
  addQuietOption,
  addVerboseOption,
  applyLogLevel,
  parsePositiveInt,
  printInfo,
  printSuccess,
  printWarning,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConvertCommandOptions {
  input: string;
  splunk?: boolean;
  hx?: boolean;
  splunkOutput: string;
  hxDir: string;
  chunkSize?: number;
  quiet?: boolean;
  verbose?: boolean;
  count?: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConvertCommand(program: Command): void {
  const cmd = program
    .command('convert', { isDefault: true })
    .description('Convert an indicator spreadsheet to a Splunk CSV and HX chunk files')
    .requiredOption('-i, --input <path>', 'Path to the indicator spreadsheet')
    .option('--splunk', 'Write the Splunk CSV table')
    .option('--hx', 'Write the HX chunk files')
    .option('--splunk-output <file>', 'Splunk CSV output file', DEFAULT_SPLUNK_OUTPUT)
    .option('--hx-dir <dir>', 'HX chunk output directory', DEFAULT_HX_DIR)
    .option('--chunk-size <n>', 'Maximum indicators per HX file', parsePositiveInt)
    .option('-c, --count', 'Reserved, currently has no effect');

  addQuietOption(cmd);
  addVerboseOption(cmd);

  cmd.action((options: ConvertCommandOptions) => {
    runConvert(options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export function runConvert(options: ConvertCommandOptions): ConversionSummary {
  const startTime = Date.now();
  const quiet = options.quiet === true;
  applyLogLevel(options);

  if (!quiet) {
    console.log('');
    console.log(chalk.bold.cyan('  IOC Convert: Splunk / HX Export'));
    console.log(chalk.gray('  ─────────────────────────────────────────'));
    console.log('');
    printInfo(`Input: ${resolve(options.input)}`);
    if (options.count) {
      printWarning('--count is reserved and has no effect');
    }
    console.log('');
  }

  const spinner = ora({ text: 'Converting indicators...', isSilent: quiet }).start();
  let summary: ConversionSummary;
  try {
    summary = convertIndicators({
      input: options.input,
      splunk: options.splunk,
      hx: options.hx,
      splunkOutput: options.splunkOutput,
      hxDir: options.hxDir,
      chunkSize: options.chunkSize,
    });
    spinner.succeed(chalk.green(`Loaded ${summary.indicatorsLoaded} indicators`));
  } catch (err) {
    spinner.fail(chalk.red('Conversion failed'));
    throw err;
  }

  if (!quiet) {
    console.log('');
    printSummary({ conversion: summary, processingTimeMs: Date.now() - startTime });
    console.log('');
    printSuccess('Conversion complete');
    console.log('');
  }

  return summary;
}
