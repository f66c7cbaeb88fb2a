import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { assertCsvOutput, convertIndicators, countUniqueHashes } from '@/convert.js';
import {
  EncodingError,
  InvalidOutputFormatError,
  InvalidPathError,
  UnsupportedFormatError,
} from '@/utils/errors.js';
import {
  makeBatch,
  makeTempDir,
  removeTempDir,
  writeWorkbook,
  type SheetRows,
} from '../helpers/fixtures.js';

const NOW = new Date(2024, 2, 5);

const FEED: SheetRows = [
  ['type', 'indicator'],
  ['domain', 'a.com'],
  ['domain', 'b.com'],
  ['ip_address', '1.1.1.1'],
  ['url', 'http://x'],
  ['url', 'http://y'],
  ['url', 'http://z'],
  ['hash_md5', 'h1'],
  ['hash_md5', 'h2'],
  ['hash_md5', 'h1'],
];

let dir: string;
let input: string;
let splunkOutput: string;
let hxDir: string;

beforeEach(() => {
  dir = makeTempDir();
  input = writeWorkbook(join(dir, 'feed.xlsx'), { Sheet1: FEED });
  splunkOutput = join(dir, 'out.csv');
  hxDir = join(dir, 'hx');
});

afterEach(() => {
  removeTempDir(dir);
});

describe('assertCsvOutput', () => {
  it('accepts .csv names in any case', () => {
    expect(() => assertCsvOutput('MSOC 2 Week.csv')).not.toThrow();
    expect(() => assertCsvOutput('WEEKLY.CSV')).not.toThrow();
  });

  it('rejects other extensions', () => {
    expect(() => assertCsvOutput('report.txt')).toThrow(InvalidOutputFormatError);
    expect(() => assertCsvOutput('csv')).toThrow(InvalidOutputFormatError);
  });
});

describe('countUniqueHashes', () => {
  it('counts distinct md5 values only', () => {
    const batch = makeBatch([
      ['hash_md5', 'h1'],
      ['hash_md5', 'h1'],
      ['hash_md5', 'h2'],
      ['hash_sha1', 'h3'],
      ['domain', 'a.com'],
    ]);

    expect(countUniqueHashes(batch)).toBe(2);
  });
});

describe('convertIndicators', () => {
  it('runs both paths by default', () => {
    const summary = convertIndicators({ input, splunkOutput, hxDir, now: NOW });

    expect(summary.indicatorsLoaded).toBe(9);
    expect(summary.splunk).toEqual({
      output: splunkOutput,
      rows: 3,
      counts: { domain: 2, ip_address: 1, url: 3 },
    });
    expect(summary.hx).toEqual({
      directory: hxDir,
      uniqueIndicators: 5,
      chunks: 1,
      files: [join(hxDir, 'hx_indicators_1.txt')],
    });
    // 3 table rows + 2 unique md5 hashes
    expect(summary.totalProcessed).toBe(5);

    expect(readFileSync(splunkOutput, 'utf-8')).toBe(
      'Domain,IP,URL,Date\n' +
        'a.com,1.1.1.1,http://x,20240305\n' +
        'b.com,,http://y,\n' +
        ',,http://z,\n',
    );
    expect(readFileSync(join(hxDir, 'hx_indicators_1.txt'), 'ascii')).toBe(
      '1.1.1.1\na.com\nb.com\nh1\nh2\n',
    );
  });

  it('reports the table row count when only the Splunk path runs', () => {
    const summary = convertIndicators({ input, splunk: true, splunkOutput, hxDir, now: NOW });

    expect(summary.hx).toBeUndefined();
    expect(summary.totalProcessed).toBe(3);
    expect(existsSync(hxDir)).toBe(false);
  });

  it('reports the unique count when only the HX path runs', () => {
    const summary = convertIndicators({ input, hx: true, splunkOutput, hxDir, chunkSize: 2 });

    expect(summary.splunk).toBeUndefined();
    expect(summary.hx?.chunks).toBe(3);
    expect(summary.totalProcessed).toBe(5);
    expect(existsSync(splunkOutput)).toBe(false);
  });

  it('aborts on a non-csv Splunk output before writing anything', () => {
    expect(() =>
      convertIndicators({ input, splunkOutput: join(dir, 'report.txt'), hxDir }),
    ).toThrow(InvalidOutputFormatError);

    expect(readdirSync(dir)).toEqual(['feed.xlsx']);
  });

  it('ignores the Splunk output name when only the HX path runs', () => {
    const summary = convertIndicators({ input, hx: true, splunkOutput: 'report.txt', hxDir });

    expect(summary.hx?.uniqueIndicators).toBe(5);
  });

  it('aborts on a non-ASCII HX value before writing the Splunk table', () => {
    const unicodeInput = writeWorkbook(join(dir, 'unicode.xlsx'), {
      Sheet1: [
        ['type', 'indicator'],
        ['domain', 'a.com'],
        ['domain', 'bücher.example'],
      ],
    });

    expect(() => convertIndicators({ input: unicodeInput, splunkOutput, hxDir })).toThrow(
      EncodingError,
    );
    expect(readdirSync(dir).sort()).toEqual(['feed.xlsx', 'unicode.xlsx']);
  });

  it('writes the Splunk table with non-ASCII values when HX does not run', () => {
    const unicodeInput = writeWorkbook(join(dir, 'unicode.xlsx'), {
      Sheet1: [
        ['type', 'indicator'],
        ['domain', 'bücher.example'],
      ],
    });

    const summary = convertIndicators({ input: unicodeInput, splunk: true, splunkOutput, now: NOW });

    expect(summary.splunk?.rows).toBe(1);
    expect(readFileSync(splunkOutput, 'utf-8')).toBe('Domain,IP,URL,Date\nbücher.example,,,20240305\n');
  });

  it('aborts on a missing input before writing anything', () => {
    expect(() =>
      convertIndicators({ input: join(dir, 'missing.xlsx'), splunkOutput, hxDir }),
    ).toThrow(InvalidPathError);

    expect(readdirSync(dir)).toEqual(['feed.xlsx']);
  });

  it('aborts on an unsupported input extension', () => {
    const notes = join(dir, 'feed.json');
    writeFileSync(notes, '[]');

    expect(() => convertIndicators({ input: notes, splunkOutput, hxDir })).toThrow(
      UnsupportedFormatError,
    );
    expect(readdirSync(dir).sort()).toEqual(['feed.json', 'feed.xlsx']);
  });
});
