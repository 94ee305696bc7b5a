/**
 * Error Classes for the assets core
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Cache errors (1xxx)
  CACHE_READ_FAILED = "E1000",
  CACHE_WRITE_FAILED = "E1001",
  CACHE_LIST_FAILED = "E1002",
  CACHE_DELETE_FAILED = "E1003",
  CACHE_DIRECTORY_FAILED = "E1004",

  // Resolution errors (2xxx)
  RESOLUTION_SCHEMA_NOT_FOUND = "E2000",
  RESOLUTION_OBJECT_TYPE_NOT_FOUND = "E2001",
  RESOLUTION_REFRESH_FAILED = "E2002",

  // Metadata errors (3xxx)
  METADATA_FETCH_FAILED = "E3000",
  METADATA_INVALID = "E3001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all assets-core errors
 */
export class AssetsError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AssetsError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

export type CacheOperation = "read" | "write" | "list" | "delete" | "mkdir";

/**
 * Filesystem-level cache failures (permission, disk full, directory creation).
 * Cache misses are never reported through this class.
 */
export class CacheError extends AssetsError {
  public readonly path: string;
  public readonly operation: CacheOperation;

  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> & { path: string; operation: CacheOperation },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "CacheError";
    this.path = context.path;
    this.operation = context.operation;
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message} (${this.operation} ${this.path})`;
  }
}

/**
 * Attribute metadata could not be retrieved for an object type
 */
export class MetadataError extends AssetsError {
  public readonly objectTypeId: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.METADATA_FETCH_FAILED,
    context: Record<string, unknown> & { objectTypeId: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "MetadataError";
    this.objectTypeId = context.objectTypeId;
  }
}

/**
 * A schema or object type reference could not be translated
 */
export class ResolutionError extends AssetsError {
  public readonly reference: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RESOLUTION_SCHEMA_NOT_FOUND,
    context: Record<string, unknown> & { reference: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "ResolutionError";
    this.reference = context.reference;
  }
}

export class ConfigurationError extends AssetsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Normalizes an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
