/**
 * Terminal summary table renderer.
 *
 * Produces a boxed, colorized summary of a conversion run, printed to
 * stdout once both output paths have finished.
 */

import { basename } from 'path';
import chalk from 'chalk';

import type { ConversionSummary } from '../types/index.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface SummaryData {
  conversion: ConversionSummary;
  processingTimeMs: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 56;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format the summary data into a colorized terminal table string.
 *
 * Sections for the Splunk table and HX chunks only appear for the paths
 * that ran. Paths longer than the box are shortened from the left.
 */
export function formatSummaryTable(data: SummaryData): string {
  const { conversion } = data;
  const lines: string[] = [];

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine('IOC Conversion Summary', true));
  lines.push(separator());

  lines.push(formatLine(`Source: ${basename(conversion.source)}`));
  lines.push(formatLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));
  lines.push(
    formatLine(
      `Indicators: ${formatNumber(conversion.indicatorsLoaded)}  │  Skipped rows: ${formatNumber(conversion.skippedRows)}`,
    ),
  );

  if (conversion.splunk) {
    const { counts } = conversion.splunk;
    lines.push(separator());
    lines.push(formatSectionHeader('SPLUNK TABLE'));
    lines.push(
      formatLine(
        `  Domains: ${counts.domain}  │  IPs: ${counts.ip_address}  │  URLs: ${counts.url}`,
      ),
    );
    lines.push(formatLine(`  Rows: ${formatNumber(conversion.splunk.rows)}`));
    lines.push(formatLine(`  ${fitText(conversion.splunk.output, BOX_WIDTH - 4)}`));
  }

  if (conversion.hx) {
    lines.push(separator());
    lines.push(formatSectionHeader('HX CHUNKS'));
    lines.push(
      formatLine(
        `  Unique: ${formatNumber(conversion.hx.uniqueIndicators)}  │  Files: ${conversion.hx.chunks}`,
      ),
    );
    lines.push(formatLine(`  ${fitText(conversion.hx.directory, BOX_WIDTH - 4)}`));
  }

  lines.push(separator());
  lines.push(
    formatLineRaw(
      `Total unique indicators processed: ${chalk.green(formatNumber(conversion.totalProcessed))}`,
    ),
  );
  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));

  return lines.join('\n');
}

/**
 * Print the formatted summary table to stdout.
 */
export function printSummary(data: SummaryData): void {
  console.log(formatSummaryTable(data));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function separator(): string {
  return chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);
}

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments.
 *
 * Padding is computed from the visible length, since ANSI escapes add
 * invisible characters.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

/**
 * Keep the tail of a long string, prefixed with an ellipsis.
 */
export function fitText(text: string, width: number): string {
  if (text.length <= width) return text;
  return `…${text.slice(text.length - width + 1)}`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
