/**
 * Unit tests for the summary reporter.
 *
 * Tests: formatSummaryTable, printSummary, fitText
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  fitText,
  formatSummaryTable,
  printSummary,
  type SummaryData,
} from '@/reporting/summary-reporter.js';
import type { ConversionSummary } from '@/types/index.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeSummaryData(overrides?: Partial<ConversionSummary>): SummaryData {
  return {
    processingTimeMs: 1500,
    conversion: {
      source: '/data/feeds/week-12.xlsx',
      indicatorsLoaded: 1200,
      skippedRows: 4,
      splunk: {
        output: '/data/out/MSOC 2 Week.csv',
        rows: 300,
        counts: { domain: 300, ip_address: 120, url: 45 },
      },
      hx: {
        directory: '/data/out/hx',
        uniqueIndicators: 950,
        chunks: 1,
        files: ['/data/out/hx/hx_indicators_1.txt'],
      },
      totalProcessed: 830,
      ...overrides,
    },
  };
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('formatSummaryTable', () => {
  it('includes source, counts and the total', () => {
    const output = stripAnsi(formatSummaryTable(makeSummaryData()));

    expect(output).toContain('IOC Conversion Summary');
    expect(output).toContain('Source: week-12.xlsx');
    expect(output).toContain('Processing Time: 1.5s');
    expect(output).toContain('Indicators: 1,200  │  Skipped rows: 4');
    expect(output).toContain('Domains: 300  │  IPs: 120  │  URLs: 45');
    expect(output).toContain('Unique: 950  │  Files: 1');
    expect(output).toContain('Total unique indicators processed: 830');
  });

  it('omits sections for paths that did not run', () => {
    const output = stripAnsi(formatSummaryTable(makeSummaryData({ splunk: undefined })));

    expect(output).not.toContain('SPLUNK TABLE');
    expect(output).toContain('HX CHUNKS');
  });

  it('keeps every line the same visible width', () => {
    const lines = stripAnsi(formatSummaryTable(makeSummaryData())).split('\n');
    const widths = new Set(lines.map((line) => line.length));

    expect(widths.size).toBe(1);
  });

  it('reports sub-second durations in milliseconds', () => {
    const data = { ...makeSummaryData(), processingTimeMs: 240 };

    expect(stripAnsi(formatSummaryTable(data))).toContain('Processing Time: 240ms');
  });
});

describe('fitText', () => {
  it('returns short text unchanged', () => {
    expect(fitText('/tmp/hx', 20)).toBe('/tmp/hx');
  });

  it('keeps the tail of long text', () => {
    expect(fitText('/very/long/path/to/hx', 10)).toBe('…ath/to/hx');
  });
});

describe('printSummary', () => {
  it('writes the table to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printSummary(makeSummaryData());

    expect(log).toHaveBeenCalledTimes(1);
  });
});
