/**
 * Error types for ioc-convert.
 *
 * Every failure the conversion can hit is one of these, each with a stable
 * `code` for programmatic handling. None is retried; the run stops at the
 * first one thrown.
 */

export abstract class ConvertError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Source spreadsheet is missing, not a regular file, or unreadable.
 */
export class InvalidPathError extends ConvertError {
  readonly code = 'INVALID_PATH';

  constructor(
    public readonly path: string,
    reason = 'does not exist',
    options?: ErrorOptions,
  ) {
    super(`Input path ${reason}: ${path}`, options);
  }
}

/**
 * Source file extension is not a spreadsheet format, or its bytes
 * could not be parsed as a workbook.
 */
export class UnsupportedFormatError extends ConvertError {
  readonly code = 'UNSUPPORTED_FORMAT';

  constructor(
    public readonly path: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Unsupported input format for ${path}: ${detail}`, options);
  }
}

/**
 * Table output name does not carry the `.csv` extension.
 */
export class InvalidOutputFormatError extends ConvertError {
  readonly code = 'INVALID_OUTPUT_FORMAT';

  constructor(public readonly output: string) {
    super(`Splunk output must be a .csv file: ${output}`);
  }
}

/**
 * A worksheet with data lacks the `type` or `indicator` header.
 */
export class MissingColumnError extends ConvertError {
  readonly code = 'MISSING_COLUMN';

  constructor(
    public readonly sheet: string,
    public readonly columns: string[],
  ) {
    super(`Sheet "${sheet}" is missing required column(s): ${columns.join(', ')}`);
  }
}

export class EncodingError extends ConvertError {
  readonly code = 'ENCODING';

  constructor(public readonly value: string) {
    super(`Indicator contains non-ASCII characters: ${JSON.stringify(value)}`);
  }
}

export class ConfigError extends ConvertError {
  readonly code = 'INVALID_CONFIG';
}

export function isConvertError(err: unknown): err is ConvertError {
  return err instanceof ConvertError;
}
