/**
 * Shared CLI option helpers for ioc-convert commands.
 *
 * Option registration, argument parsers and colored console output used
 * by the command modules.
 */

import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';

import { setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the -q/--quiet flag to a command.
 */
export function addQuietOption(cmd: Command): Command {
  return cmd.option('-q, --quiet', 'Suppress progress and summary output');
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

/**
 * Map the --quiet/--verbose flags to a log level. Quiet wins.
 */
export function applyLogLevel(options: { quiet?: boolean; verbose?: boolean }): void {
  if (options.quiet) {
    setLogLevel('error');
  } else if (options.verbose) {
    setLogLevel('debug');
  }
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

/**
 * Commander argument parser for a positive integer option.
 *
 * @example parsePositiveInt('5000') => 5000
 */
export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Console output
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

/**
 * Print an informational message.
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
