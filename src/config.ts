/**
 * Option defaults and validation for a conversion run.
 *
 * CLI flags take precedence over environment variables, which take
 * precedence over the built-in defaults below.
 */

import { z } from 'zod';

import type { ConvertOptions, ResolvedConvertConfig } from './types/index.js';
import { DEFAULT_MAX_CHUNK_SIZE } from './hx/chunk-exporter.js';
import { ConfigError } from './utils/errors.js';

export const DEFAULT_SPLUNK_OUTPUT = 'MSOC 2 Week.csv';
export const DEFAULT_HX_DIR = 'hx';

const ConvertConfigSchema = z.object({
  input: z.string().trim().min(1, 'input path is required'),
  splunk: z.boolean().default(false),
  hx: z.boolean().default(false),
  splunkOutput: z.string().trim().min(1, 'splunk output name must not be empty').default(DEFAULT_SPLUNK_OUTPUT),
  hxDir: z.string().trim().min(1, 'hx directory must not be empty').default(DEFAULT_HX_DIR),
  chunkSize: z.coerce
    .number()
    .int('chunk size must be an integer')
    .positive('chunk size must be positive')
    .default(DEFAULT_MAX_CHUNK_SIZE),
  now: z.date().default(() => new Date()),
});

/**
 * Apply defaults and the default-both policy: when neither output path is
 * requested explicitly, both run.
 */
export function resolveConfig(
  options: ConvertOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConvertConfig {
  const parsed = ConvertConfigSchema.safeParse({
    ...options,
    chunkSize: options.chunkSize ?? env.IOC_CONVERT_CHUNK_SIZE,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid options: ${detail}`);
  }

  const { splunk, hx, ...rest } = parsed.data;
  const neither = !splunk && !hx;

  return {
    ...rest,
    runSplunk: splunk || neither,
    runHx: hx || neither,
  };
}
