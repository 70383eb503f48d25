// src/core/errors.ts
export enum ErrorCode {
  LISTING_FAILED = 'listing_failed',
  FETCH_FAILED = 'fetch_failed',
  MALFORMED_RECORD = 'malformed_record',
  INVALID_CONFIG = 'invalid_config',
  INVALID_INPUT = 'invalid_input',
}

export class DecensorError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DecensorError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The remote batch listing could not be retrieved or did not parse. */
export class ListingError extends DecensorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      ErrorCode.LISTING_FAILED,
      message,
      true,
      'Check your network connection or the --listing-url setting',
      context
    );
    this.name = 'ListingError';
  }
}

/** A single batch could not be downloaded. */
export class FetchError extends DecensorError {
  constructor(
    message: string,
    public readonly batch: string,
    public readonly status?: number
  ) {
    super(ErrorCode.FETCH_FAILED, message, true, undefined, { batch, status });
    this.name = 'FetchError';
  }
}

export class MalformedRecordError extends DecensorError {
  constructor(
    message: string,
    public readonly batch: string,
    public readonly line: number
  ) {
    super(
      ErrorCode.MALFORMED_RECORD,
      message,
      false,
      'Remove the damaged batch file and run `booru-decensor sync --force`',
      { batch, line }
    );
    this.name = 'MalformedRecordError';
  }
}

export class ConfigError extends DecensorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_CONFIG, message, false, undefined, context);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends DecensorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_INPUT, message, false, undefined, context);
    this.name = 'InvalidInputError';
  }
}

export function formatError(error: unknown): string {
  if (error instanceof DecensorError && error.suggestion) {
    return `${error.message}\nHint: ${error.suggestion}`;
  }
  return errorMessage(error);
}

/**
 * Message of anything thrown. Errors raised by Node built-ins may come from
 * another realm, where `instanceof Error` is false, so this checks the shape.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
