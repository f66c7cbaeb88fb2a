/**
 * Indicator ingestion.
 */

export {
  loadIndicators,
  isSupportedSpreadsheet,
  SUPPORTED_EXTENSIONS,
} from './indicator-loader.js';

