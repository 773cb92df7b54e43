/**
 * corpuslint error classes
 *
 * Provides hierarchical error classes with:
 * - Error codes (enum)
 * - Default messages per code
 * - Original cause tracking
 * - Recovery hints
 *
 * Errors here are failures of the run itself (bad arguments, unreadable
 * manifest, cancellation). Inconsistencies found inside the data are
 * reported as findings, never thrown.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Usage errors (2000-2099)
  USAGE_INVALID_ARGUMENT = 2000,
  USAGE_MISSING_ARGUMENT = 2001,
  USAGE_UNKNOWN_CONFIG = 2002,
  USAGE_INVALID_TASKS = 2003,

  // Config errors (3000-3099)
  CONFIG_NOT_FOUND = 3000,
  CONFIG_PARSE_ERROR = 3001,
  CONFIG_INVALID_VALUE = 3002,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_DIRECTORY_NOT_FOUND = 4002,
  FS_READ_ERROR = 4003,
  FS_NO_MATCHING_FILES = 4004,

  // Validation run errors (5000-5099)
  VALIDATION_TIMEOUT = 5000,
  VALIDATION_CANCELLED = 5001,
}

// ============================================================================
// Default messages
// ============================================================================

const DEFAULT_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN]: "An unknown error occurred",
  [ErrorCode.INTERNAL]: "Internal error",
  [ErrorCode.USAGE_INVALID_ARGUMENT]: "Invalid command line argument",
  [ErrorCode.USAGE_MISSING_ARGUMENT]: "Missing required command line argument",
  [ErrorCode.USAGE_UNKNOWN_CONFIG]: "Unknown dataset config",
  [ErrorCode.USAGE_INVALID_TASKS]: "Malformed declared task list",
  [ErrorCode.CONFIG_NOT_FOUND]: "Dataset manifest not found",
  [ErrorCode.CONFIG_PARSE_ERROR]: "Dataset manifest could not be parsed",
  [ErrorCode.CONFIG_INVALID_VALUE]: "Dataset manifest contains an invalid value",
  [ErrorCode.FS_FILE_NOT_FOUND]: "File not found",
  [ErrorCode.FS_PERMISSION_DENIED]: "Permission denied",
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: "Directory not found",
  [ErrorCode.FS_READ_ERROR]: "File could not be read",
  [ErrorCode.FS_NO_MATCHING_FILES]: "No file matches the split pattern",
  [ErrorCode.VALIDATION_TIMEOUT]: "Validation timed out",
  [ErrorCode.VALIDATION_CANCELLED]: "Validation was cancelled",
};

const RECOVERY_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.USAGE_UNKNOWN_CONFIG]: "List the configs in dataset.yaml and pass one of them with --config.",
  [ErrorCode.USAGE_INVALID_TASKS]:
    "Use task names such as named_entity_recognition, RELATION_EXTRACTION or short codes such as NER.",
  [ErrorCode.CONFIG_NOT_FOUND]: "Pass a directory containing dataset.yaml, or the manifest file itself.",
  [ErrorCode.FS_NO_MATCHING_FILES]: "Check the split pattern in dataset.yaml or the --data-dir option.",
  [ErrorCode.VALIDATION_TIMEOUT]: "Raise --timeout or validate fewer splits at once.",
};

// Codes the CLI reports with exit status 2
const USAGE_CODES = new Set<ErrorCode>([
  ErrorCode.USAGE_INVALID_ARGUMENT,
  ErrorCode.USAGE_MISSING_ARGUMENT,
  ErrorCode.USAGE_UNKNOWN_CONFIG,
  ErrorCode.USAGE_INVALID_TASKS,
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.CONFIG_INVALID_VALUE,
  ErrorCode.FS_FILE_NOT_FOUND,
  ErrorCode.FS_PERMISSION_DENIED,
  ErrorCode.FS_DIRECTORY_NOT_FOUND,
  ErrorCode.FS_READ_ERROR,
  ErrorCode.FS_NO_MATCHING_FILES,
]);

interface ErrorOptions {
  cause?: Error;
  recoveryHint?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

export class CorpusLintError extends Error {
  public readonly code: ErrorCode;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions) {
    super(message || DEFAULT_MESSAGES[code]);

    this.name = "CorpusLintError";
    this.code = code;
    this.cause = options?.cause;
    this.recoveryHint = options?.recoveryHint ?? RECOVERY_HINTS[code];
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Bad command line usage
 */
export class UsageError extends CorpusLintError {
  public readonly argument?: string;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions & { argument?: string }) {
    super(code, message, options);
    this.name = "UsageError";
    this.argument = options?.argument;
  }
}

/**
 * Dataset manifest errors
 */
export class ConfigError extends CorpusLintError {
  public readonly configKey?: string;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions & { configKey?: string }) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

/**
 * File system errors
 */
export class FileSystemError extends CorpusLintError {
  public readonly path?: string;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions & { path?: string }) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(error: NodeJS.ErrnoException, path?: string): FileSystemError {
    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, `File not found: ${path ?? error.path ?? "?"}`, {
          cause: error,
          path,
        });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, `Permission denied: ${path ?? "?"}`, {
          cause: error,
          path,
        });
      default:
        return new FileSystemError(ErrorCode.FS_READ_ERROR, error.message, { cause: error, path });
    }
  }
}

/**
 * Validation run aborted by timeout or by the caller
 */
export class CancellationError extends CorpusLintError {
  public readonly documentsChecked: number;

  constructor(code: ErrorCode.VALIDATION_TIMEOUT | ErrorCode.VALIDATION_CANCELLED, documentsChecked: number, options?: ErrorOptions) {
    super(code, `${DEFAULT_MESSAGES[code]} after ${documentsChecked} documents`, options);
    this.name = "CancellationError";
    this.documentsChecked = documentsChecked;
  }
}

// ============================================================================
// Utilities
// ============================================================================

export function isCorpusLintError(error: unknown): error is CorpusLintError {
  return error instanceof CorpusLintError;
}

/**
 * True for errors that happen before validation can start (exit status 2)
 */
export function isUsageError(error: unknown): boolean {
  return isCorpusLintError(error) && USAGE_CODES.has(error.code);
}

/**
 * Errors from Node's own modules are not instances of the caller's `Error`
 * when the code runs in another realm (a vm context, Jest), so check the shape.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    "message" in error &&
    typeof error.message === "string"
  );
}

/**
 * Format an error for one-line console output, with its recovery hint
 */
export function formatErrorMessage(error: unknown): string {
  if (isCorpusLintError(error)) {
    return error.recoveryHint ? `${error.message}\n  Hint: ${error.recoveryHint}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
