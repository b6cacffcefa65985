/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  FileSystemError,
  NetworkError,
  TimeoutError,
  ConnectionError,
  HttpStatusError,
  StreamDownloadError,
  DownloadCancelledError,
} from './ApplicationError.js';

// Permanent errors
export {
  PermanentError,
  ConfigurationError,
  InvalidStateError,
  ResumeInconsistencyError,
} from './ApplicationError.js';

// System errors
export {
  SystemError,
  MuxerError,
  DependencyError,
} from './ApplicationError.js';

// Retry strategies
export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  MIRROR_RETRY_POLICY,
} from './RetryStrategy.js';

export type {
  RetryPolicy,
  RetryResult,
} from './RetryStrategy.js';
