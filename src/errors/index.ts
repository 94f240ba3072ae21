/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  ResourceLoadError,
  DecodingError,
  ConfigurationError,
  FileSystemError,
  isDomainError,
  wrapError,
} from './DomainError';
