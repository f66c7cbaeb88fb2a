#!/usr/bin/env node

/**
 * ioc-convert CLI: threat indicator spreadsheet export
 *
 * Usage:
 *   ioc-convert --input indicators.xlsx
 *   ioc-convert convert --input indicators.xlsx --splunk --splunk-output weekly.csv
 *   ioc-convert convert --input indicators.xlsx --hx --hx-dir ./hx --chunk-size 5000
 */

import 'dotenv/config';

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerConvertCommand } from './commands/convert.js';
import { printError } from './options.js';
import { isConvertError } from '../utils/errors.js';

const pkg: unknown = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('ioc-convert')
  .description('Convert threat indicator spreadsheets to Splunk CSV and HX chunk files')
  .version(version);

registerConvertCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected, not a failure
    if (err instanceof Error && 'code' in err) {
      const { code } = err;
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return;
      }
      if (typeof code === 'string' && code.startsWith('commander.')) {
        // Commander already printed its own message
        process.exit(1);
      }
    }

    printError(
      err instanceof Error ? err.message : String(err),
      isConvertError(err) ? err.code : undefined,
    );
    console.error(chalk.gray('Run "ioc-convert --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
