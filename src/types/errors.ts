/**
 * Custom error types for the tiered image cache
 * Provides structured error handling with context and categorization
 */

export enum ErrorCode {
  // Disk tier errors
  DISK_CACHE_OPEN_FAILED = "DISK_CACHE_OPEN_FAILED",
  DISK_CACHE_IO = "DISK_CACHE_IO",
  DISK_CACHE_FULL = "DISK_CACHE_FULL",
  DISK_CACHE_CLOSED = "DISK_CACHE_CLOSED",
  DISK_CACHE_CORRUPT_JOURNAL = "DISK_CACHE_CORRUPT_JOURNAL",
  DISK_CACHE_INCOMPLETE_EDIT = "DISK_CACHE_INCOMPLETE_EDIT",
  DISK_CACHE_PERMISSION_DENIED = "DISK_CACHE_PERMISSION_DENIED",

  // Decode errors
  DECODE_FAILED = "DECODE_FAILED",
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
  METADATA_UNREADABLE = "METADATA_UNREADABLE",

  // Fetch errors
  FETCH_FAILED = "FETCH_FAILED",
  FETCH_CANCELLED = "FETCH_CANCELLED",
  FETCH_HTTP_STATUS = "FETCH_HTTP_STATUS",

  // Validation errors
  VALIDATION_FAILED = "VALIDATION_FAILED",
  INVALID_KEY = "INVALID_KEY",

  // Configuration errors
  CONFIG_INVALID = "CONFIG_INVALID",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface ErrorContext {
  operation?: string;
  service?: string;
  identifier?: string;
  timestamp?: Date;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all image cache errors
 */
export abstract class ImageCacheError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isRetryable = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...context,
      timestamp: context.timestamp || new Date(),
    };
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a serializable representation of the error
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }
}

/**
 * Disk tier errors (open, journal, edit and file I/O failures)
 */
export class DiskCacheError extends ImageCacheError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DISK_CACHE_IO,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(
      message,
      code,
      context,
      code !== ErrorCode.DISK_CACHE_CLOSED &&
        code !== ErrorCode.DISK_CACHE_PERMISSION_DENIED,
      options,
    );
  }

  getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.DISK_CACHE_OPEN_FAILED:
        return "The disk cache could not be opened. Images will be served without persistence.";
      case ErrorCode.DISK_CACHE_FULL:
        return "The disk cache device is out of space.";
      case ErrorCode.DISK_CACHE_CLOSED:
        return "The disk cache has been closed.";
      case ErrorCode.DISK_CACHE_PERMISSION_DENIED:
        return "The disk cache directory is not writable.";
      case ErrorCode.DISK_CACHE_CORRUPT_JOURNAL:
        return "The disk cache journal was corrupt and has been rebuilt.";
      default:
        return "A disk cache operation failed.";
    }
  }
}

/**
 * Image decoding errors
 */
export class DecodeError extends ImageCacheError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DECODE_FAILED,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, code, context, false, options);
  }

  getUserMessage(): string {
    if (this.code === ErrorCode.UNSUPPORTED_FORMAT) {
      return "The image format is not supported.";
    }
    return "The image could not be decoded.";
  }
}

/**
 * Image metadata (EXIF) read failures
 */
export class MetadataError extends ImageCacheError {
  constructor(
    message: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.METADATA_UNREADABLE, context, false, options);
  }

  getUserMessage(): string {
    return "Image metadata could not be read.";
  }
}

/**
 * Download failures reported by, or raised from, a Downloader
 */
export class FetchError extends ImageCacheError {
  public readonly status?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FETCH_FAILED,
    status?: number,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, code, context, code !== ErrorCode.FETCH_CANCELLED, options);
    this.status = status;
  }

  getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.FETCH_CANCELLED:
        return "The download was cancelled.";
      case ErrorCode.FETCH_HTTP_STATUS:
        return `The server responded with status ${this.status ?? "unknown"}.`;
      default:
        return "The image could not be downloaded.";
    }
  }
}

/**
 * Input validation errors
 */
export class ValidationError extends ImageCacheError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    context: ErrorContext = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, context, false);
    this.field = field;
    this.value = value;
  }

  getUserMessage(): string {
    if (this.field) {
      return `Invalid value for field '${this.field}': ${this.message}`;
    }
    return `Validation failed: ${this.message}`;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ImageCacheError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_INVALID, context, false);
    this.configKey = configKey;
  }

  getUserMessage(): string {
    if (this.configKey) {
      return `Configuration error for '${this.configKey}': ${this.message}`;
    }
    return `Configuration error: ${this.message}`;
  }
}

class InternalError extends ImageCacheError {
  constructor(error: Error, context: ErrorContext) {
    super(error.message, ErrorCode.INTERNAL_ERROR, context, false, {
      cause: error,
    });
    this.stack = error.stack;
  }
}

/**
 * Read the `code` property Node attaches to system errors
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof ImageCacheError) {
    return error.isRetryable;
  }

  const code = getSystemErrorCode(error);
  return code === "EAGAIN" || code === "EBUSY" || code === "EMFILE";
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: Error): ErrorCode {
  if (error instanceof ImageCacheError) {
    return error.code;
  }
  return ErrorCode.INTERNAL_ERROR;
}

/**
 * Get user-friendly message from any error
 */
export function getUserMessage(error: Error): string {
  if (error instanceof ImageCacheError) {
    return error.getUserMessage();
  }
  return "An unexpected error occurred. Please try again.";
}

/**
 * Convert any thrown value to an ImageCacheError
 */
export function toImageCacheError(
  error: unknown,
  context: ErrorContext = {},
): ImageCacheError {
  if (error instanceof ImageCacheError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  if (cause.name === "AbortError") {
    return new FetchError(
      cause.message,
      ErrorCode.FETCH_CANCELLED,
      undefined,
      context,
      { cause },
    );
  }

  switch (getSystemErrorCode(cause)) {
    case "ENOSPC":
    case "EDQUOT":
      return new DiskCacheError(cause.message, ErrorCode.DISK_CACHE_FULL, context, {
        cause,
      });
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return new DiskCacheError(
        cause.message,
        ErrorCode.DISK_CACHE_PERMISSION_DENIED,
        context,
        { cause },
      );
    case "ENOENT":
    case "ENOTDIR":
    case "EISDIR":
    case "EEXIST":
    case "EIO":
      return new DiskCacheError(cause.message, ErrorCode.DISK_CACHE_IO, context, {
        cause,
      });
    default:
      return new InternalError(cause, context);
  }
}
