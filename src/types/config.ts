/**
 * Configuration types for ioc-convert.
 */

export interface ConvertOptions {
  input: string;
  splunk?: boolean;
  hx?: boolean;
  splunkOutput?: string;
  hxDir?: string;
  chunkSize?: number;
  now?: Date;
}

export interface ResolvedConvertConfig {
  input: string;
  runSplunk: boolean;
  runHx: boolean;
  splunkOutput: string;
  hxDir: string;
  chunkSize: number;
  now: Date;
}

export interface ConversionSummary {
  source: string;
  indicatorsLoaded: number;
  skippedRows: number;
  splunk?: {
    output: string;
    rows: number;
    counts: Record<'domain' | 'ip_address' | 'url', number>;
  };
  hx?: {
    directory: string;
    uniqueIndicators: number;
    chunks: number;
    files: string[];
  };
  totalProcessed: number;
}
