/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints consumed by RetryStrategy
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // File System Errors
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  // Network Errors (retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  NETWORK_HTTP_STATUS = 'NETWORK_HTTP_STATUS',

  // Download Errors
  DOWNLOAD_MIRRORS_EXHAUSTED = 'DOWNLOAD_MIRRORS_EXHAUSTED',
  DOWNLOAD_RESUME_INCONSISTENT = 'DOWNLOAD_RESUME_INCONSISTENT',
  DOWNLOAD_CANCELLED = 'DOWNLOAD_CANCELLED',

  // Configuration Errors (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors (permanent)
  SYSTEM_MUXER_FAILED = 'SYSTEM_MUXER_FAILED',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'fetch', 'merge') */
  operation?: string;

  /** Entity being operated on (episode filename, stream kind) */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// Network Errors
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      true, // Network errors are retryable
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    public readonly timeoutMs: number,
    url?: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Operation timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      url,
      { ...context, durationMs: timeoutMs }
    );
  }
}

export class ConnectionError extends NetworkError {
  constructor(url: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Connection failed: ${url}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      url,
      context,
      cause
    );
  }
}

/**
 * Non-2xx answer from one source. Treated as transient: the next mirror may serve it.
 */
export class HttpStatusError extends NetworkError {
  constructor(
    public readonly httpStatusCode: number,
    url: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Unexpected HTTP status ${httpStatusCode}: ${url}`,
      ErrorCode.NETWORK_HTTP_STATUS,
      url,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } }
    );
  }
}

// Download Errors

/**
 * Every source of a stream failed for one block
 */
export class StreamDownloadError extends OperationalError {
  constructor(
    public readonly urls: readonly string[],
    public readonly offset: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `All ${urls.length} source(s) failed for block at offset ${offset}`,
      ErrorCode.DOWNLOAD_MIRRORS_EXHAUSTED,
      false, // Escalated: the orchestrator aborts the job
      { ...context, metadata: { ...context?.metadata, urls, offset } },
      cause
    );
  }
}

export class DownloadCancelledError extends OperationalError {
  constructor(message?: string, context?: ErrorContext) {
    super(message || 'Download cancelled', ErrorCode.DOWNLOAD_CANCELLED, false, context);
  }
}

// ============================================
// PERMANENT ERRORS
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class InvalidStateError extends PermanentError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { ...context, metadata: { ...context?.metadata, expectedState, actualState } }
    );
  }
}

/**
 * Resume offset lies beyond the known total size. Never clamped.
 */
export class ResumeInconsistencyError extends PermanentError {
  constructor(
    public readonly resumeFrom: number,
    public readonly totalSize: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Resume offset ${resumeFrom} is beyond total size ${totalSize}`,
      ErrorCode.DOWNLOAD_RESUME_INCONSISTENT,
      { ...context, metadata: { ...context?.metadata, resumeFrom, totalSize } }
    );
  }
}

// ============================================
// SYSTEM ERRORS
// ============================================

export class SystemError extends PermanentError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, context, cause);
  }
}

/**
 * The muxer exited non-zero. Inputs are kept for inspection.
 */
export class MuxerError extends SystemError {
  constructor(
    public readonly exitCode: number,
    public readonly stderr: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Muxer failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_MUXER_FAILED,
      { ...context, metadata: { ...context?.metadata, exitCode, stderr } },
      cause
    );
  }
}

export class DependencyError extends SystemError {
  constructor(
    public readonly dependency: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Missing or invalid dependency: ${dependency}`,
      ErrorCode.SYSTEM_DEPENDENCY_MISSING,
      { ...context, metadata: { ...context?.metadata, dependency } }
    );
  }
}
