/**
 * Processing Errors
 *
 * Tagged errors raised by the table, dedupe and reconciliation modules.
 * They carry no HTTP knowledge; the error handler middleware decodes them
 * into the `{ error, ...context }` wire format.
 */

export type ProcessingErrorKind = 'InvalidInput' | 'EmptyInput' | 'InvalidConfiguration';

export type ErrorContext = Record<string, unknown>;

export interface ErrorResponseBody {
  error: string;
  [key: string]: unknown;
}

export class ProcessingError extends Error {
  public readonly kind: ProcessingErrorKind;
  public readonly context: ErrorContext;

  constructor(kind: ProcessingErrorKind, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'ProcessingError';
    this.kind = kind;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  static invalidInput(message: string, context?: ErrorContext): ProcessingError {
    return new ProcessingError('InvalidInput', message, context);
  }

  static emptyInput(message: string, context?: ErrorContext): ProcessingError {
    return new ProcessingError('EmptyInput', message, context);
  }

  static invalidConfiguration(message: string, context?: ErrorContext): ProcessingError {
    return new ProcessingError('InvalidConfiguration', message, context);
  }

  toResponseBody(): ErrorResponseBody {
    return { error: this.message, ...this.context };
  }
}

export const INVALID_FILE_MESSAGE = 'Invalid file. Upload .xlsx or .csv';
export const EMPTY_FILE_MESSAGE = 'File contains no rows to process.';
