/**
 * ioc-convert public API.
 */

export { convertIndicators, assertCsvOutput, countUniqueHashes } from './convert.js';
export {
  resolveConfig,
  DEFAULT_HX_DIR,
  DEFAULT_SPLUNK_OUTPUT,
} from './config.js';
export * from './ingestion/index.js';
export * from './splunk/index.js';
export * from './hx/index.js';
export * from './utils/errors.js';
export * from './types/index.js';
