/**
 * Custom Error Classes for Tagsmith
 *
 * Categorized error types for each collaborator boundary, so that per-item
 * failures can be recorded, logged and reported with their context.
 */

/**
 * Error categories matching the collaborator boundaries.
 */
export type ErrorCategory =
  | 'FileReadError'
  | 'LookupError'
  | 'APIError'
  | 'WriteError'
  | 'TranscodeError';

/** Context attached to a PipelineError */
export interface ErrorContext {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all Tagsmith errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The file being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  override readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: ErrorContext) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    filePath: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      filePath: this.filePath,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a user-facing error message (no stack traces).
   */
  toUserMessage(): string {
    const fileInfo = this.filePath ? ` [${this.filePath}]` : '';
    return `${this.category}${fileInfo}: ${this.message}`;
  }
}

/**
 * Reading tags or listing files failed.
 * Examples: file not found, unsupported format, corrupt file, permission denied.
 */
export class FileReadError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'FileReadError', { step: 'reading', ...options });
  }
}

/**
 * A lyrics, cover or romanization collaborator failed for one item.
 */
export class LookupError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'LookupError', { step: 'lookup', ...options });
  }
}

/**
 * An HTTP API call failed after retries.
 */
export class APIError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;
  /** Name of the API service that failed */
  readonly service: string | null;

  constructor(message: string, options?: ErrorContext & { statusCode?: number; service?: string }) {
    super(message, 'APIError', { step: 'api_call', ...options });
    this.statusCode = options?.statusCode ?? null;
    this.service = options?.service ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    statusCode: number | null;
    service: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      service: this.service,
    };
  }
}

/**
 * Writing tags, sidecars or renaming files failed.
 */
export class WriteError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'WriteError', { step: 'writing', ...options });
  }
}

/**
 * The transcoder process failed.
 */
export class TranscodeError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'TranscodeError', { step: 'transcoding', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Returns the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a generic error in the appropriate PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: {
    filePath?: string;
    step?: string;
  },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'FileReadError':
      return new FileReadError(message, { ...options, cause });
    case 'LookupError':
      return new LookupError(message, { ...options, cause });
    case 'APIError':
      return new APIError(message, { ...options, cause });
    case 'WriteError':
      return new WriteError(message, { ...options, cause });
    case 'TranscodeError':
      return new TranscodeError(message, { ...options, cause });
  }
}
