/**
 * Error Classes
 *
 * Failures that must reach a caller carry a stable code and the HTTP status
 * the API answers with. Document and page failures never use these: they are
 * recorded as outcomes and the batch continues.
 */

export class QuoteCompareError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

/**
 * 400 - request body or arguments failed validation
 */
export class ValidationError extends QuoteCompareError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message, 'validation_failed', 400, { errors });
    this.errors = errors;
  }
}

/**
 * 400 - scoring was asked to rank nothing
 */
export class EmptyBatchError extends QuoteCompareError {
  constructor() {
    super('At least one quote is required for ranking', 'empty_batch', 400);
  }
}

/**
 * 415 - a tabular file with an extension we do not read
 */
export class UnsupportedFormatError extends QuoteCompareError {
  constructor(filename: string, hint?: string) {
    super(
      `Unsupported file format: ${filename}${hint ? ` (${hint})` : ''}`,
      'unsupported_format',
      415,
      { filename }
    );
  }
}

/**
 * 422 - a tabular file in a supported format whose content could not be read
 */
export class TabularParseError extends QuoteCompareError {
  constructor(filename: string, reason: string) {
    super(`Could not parse ${filename}: ${reason}`, 'tabular_parse_failed', 422, {
      filename,
    });
  }
}

export function isQuoteCompareError(error: unknown): error is QuoteCompareError {
  return error instanceof QuoteCompareError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
