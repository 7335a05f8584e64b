/**
 * Custom Error Classes for the sidecar pipeline
 *
 * Categorized error types for each pipeline stage, so failures can be logged
 * with context and counted per track without stopping a scan.
 */

/**
 * Error categories matching the pipeline stages.
 */
export type ErrorCategory =
  | 'ClassificationError'
  | 'ResolutionAmbiguity'
  | 'ProviderError'
  | 'WriteError'
  | 'ConfigError';

/** Context shared by every pipeline error */
export interface PipelineErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all pipeline errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The track being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The processing step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  override readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: PipelineErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    // Ensure prototype chain works correctly
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
   * Returns a one-line message without stack traces.
   */
  toUserMessage(): string {
    const fileInfo = this.filePath ? ` [${this.filePath}]` : '';
    return `${this.category}${fileInfo}: ${this.message}`;
  }
}

/**
 * A library entry could not be inspected (permission denied, vanished, broken link).
 * The entry is skipped; the walk continues.
 */
export class ClassificationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ClassificationError', { step: 'classifying', ...options });
  }
}

/**
 * Identity resolution had to guess (e.g. a filename with several " - " separators).
 * Never thrown; logged as a warning while the best guess is used.
 */
export class ResolutionAmbiguity extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ResolutionAmbiguity', { step: 'resolving', ...options });
  }
}

/**
 * A provider request failed after all retries (network error, timeout, non-2xx).
 * Treated as "nothing found" for the affected fetch.
 */
export class ProviderError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;
  /** Name of the provider that failed */
  readonly provider: string | null;

  constructor(
    message: string,
    options?: PipelineErrorOptions & { statusCode?: number; provider?: string },
  ) {
    super(message, 'ProviderError', { step: 'provider_call', ...options });
    this.statusCode = options?.statusCode ?? null;
    this.provider = options?.provider ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    statusCode: number | null;
    provider: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      provider: this.provider,
    };
  }
}

/**
 * Writing a sidecar file or updating embedded tags failed (disk full, permission,
 * unsupported container). Aborts only that track's writes.
 */
export class WriteError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'WriteError', { step: 'writing', ...options });
  }
}

/**
 * Configuration is unusable (missing library root, unknown provider).
 * The only fatal category.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ConfigError', { step: 'configuration', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
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
    case 'ClassificationError':
      return new ClassificationError(message, { ...options, cause });
    case 'ResolutionAmbiguity':
      return new ResolutionAmbiguity(message, { ...options, cause });
    case 'ProviderError':
      return new ProviderError(message, { ...options, cause });
    case 'WriteError':
      return new WriteError(message, { ...options, cause });
    case 'ConfigError':
      return new ConfigError(message, { ...options, cause });
  }
}
