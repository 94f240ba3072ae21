/**
 * Domain Error Base Class
 * Provides structured error handling with error codes, context,
 * and retry capability information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Resource Errors
  | 'RESOURCE_001' // Resource missing or unreadable
  // Decoding Errors
  | 'DECODE_001' // Unknown charset
  | 'DECODE_002' // Bytes invalid for charset
  // Configuration Errors
  | 'CONFIG_001' // Invalid tuning parameter or environment
  // File System Errors
  | 'FILE_001' // File not found
  | 'FILE_002' // Permission denied
  | 'FILE_003' // Read failed
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...rest } = this.context;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      context: cause ? { ...rest, cause: cause.message } : rest,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create a user-friendly error message (without stack or context).
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Resource Errors
// ============================================================================

/**
 * A bundled resource (the title list) could not be loaded. Fatal at startup.
 */
export class ResourceLoadError extends DomainError {
  readonly code: ErrorCode = 'RESOURCE_001';

  constructor(
    message: string,
    public readonly resource: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, resource });
  }

  static unreadable(resource: string, filePath: string, cause?: Error): ResourceLoadError {
    return new ResourceLoadError(
      `Unable to load ${resource} from ${filePath}${cause ? ': ' + cause.message : ''}`,
      resource,
      { filePath, cause }
    );
  }
}

// ============================================================================
// Decoding Errors
// ============================================================================

export class DecodingError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly charset: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, charset });
    this.code = code;
  }

  static unknownCharset(charset: string, filePath?: string): DecodingError {
    return new DecodingError(
      `Unknown charset: ${charset}`,
      'DECODE_001',
      charset,
      { filePath }
    );
  }

  static invalidBytes(charset: string, filePath?: string, cause?: Error): DecodingError {
    return new DecodingError(
      `Content is not valid ${charset}`,
      'DECODE_002',
      charset,
      { filePath, cause }
    );
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends DomainError {
  readonly code: ErrorCode = 'CONFIG_001';

  constructor(
    message: string,
    public readonly setting: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, setting });
  }

  static notPositiveInteger(setting: string, value: unknown): ConfigurationError {
    return new ConfigurationError(
      `${setting} must be a positive integer (received ${String(value)})`,
      setting,
      { value }
    );
  }
}

// ============================================================================
// File System Errors
// ============================================================================

export class FileSystemError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    filePath: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, filePath });
    this.code = code;
  }

  static notFound(filePath: string): FileSystemError {
    return new FileSystemError(`File not found: ${filePath}`, 'FILE_001', filePath);
  }

  static permissionDenied(filePath: string): FileSystemError {
    return new FileSystemError(`Permission denied: ${filePath}`, 'FILE_002', filePath);
  }

  static readFailed(filePath: string, cause: Error): FileSystemError {
    return new FileSystemError(
      `Failed to read ${filePath}: ${cause.message}`,
      'FILE_003',
      filePath,
      { cause }
    );
  }

  /**
   * Map a Node.js fs error onto the matching FileSystemError.
   */
  static fromNodeError(filePath: string, error: unknown): FileSystemError {
    const code = hasErrnoCode(error) ? error.code : undefined;
    if (code === 'ENOENT') return FileSystemError.notFound(filePath);
    if (code === 'EACCES' || code === 'EPERM') return FileSystemError.permissionDenied(filePath);
    return FileSystemError.readFailed(
      filePath,
      error instanceof Error ? error : new Error(String(error))
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

function hasErrnoCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new UnknownError(message, { cause });
}
