/**
 * Base error class for all configuration errors.
 * Provides consistent error handling with error codes, process exit codes,
 * user-facing suggestions and structured logging support.
 */

export enum ErrorCode {
  // Usage errors (the caller supplied bad input)
  FLAG_PARSE_ERROR = 1001,
  HELP_REQUESTED = 1002,
  DOCUMENT_PARSE_ERROR = 1003,
  VALIDATION_ERROR = 1004,

  // Environment errors
  CONFIG_SOURCE_ERROR = 2001,
  INTERNAL_ERROR = 2002,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  internalMessage?: string;
  stack?: string;
}

export interface ConfigErrorOptions {
  details?: Record<string, unknown>;
  suggestion?: string;
  internalMessage?: string;
  exitCode?: number;
  cause?: Error;
}

/**
 * Base class for all configuration errors.
 * Extends Error with additional metadata for reporting at startup.
 */
export class ConfigError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly suggestion?: string;
  public readonly internalMessage?: string;
  public readonly exitCode: number;

  constructor(message: string, code: ErrorCode, options?: ConfigErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options?.details;
    this.suggestion = options?.suggestion;
    this.internalMessage = options?.internalMessage;
    this.exitCode = options?.exitCode ?? this.mapErrorCodeToExitCode(code);

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Preserve the original error if provided
    if (options?.cause) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }

  /**
   * Map error codes to process exit codes
   */
  private mapErrorCodeToExitCode(code: ErrorCode): number {
    switch (code) {
      case ErrorCode.HELP_REQUESTED:
        return 0;
      case ErrorCode.FLAG_PARSE_ERROR:
        return 2;
      case ErrorCode.DOCUMENT_PARSE_ERROR:
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.CONFIG_SOURCE_ERROR:
      case ErrorCode.INTERNAL_ERROR:
      default:
        return 1;
    }
  }

  /**
   * Get full error details for logging (includes everything)
   */
  public toLogDetails(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      internalMessage: this.internalMessage,
      stack: this.stack,
    };
  }

  /**
   * Check if this is a user error (bad flags, documents or values)
   * vs an environment error (unreadable files, bugs)
   */
  public isUserError(): boolean {
    return [
      ErrorCode.FLAG_PARSE_ERROR,
      ErrorCode.HELP_REQUESTED,
      ErrorCode.DOCUMENT_PARSE_ERROR,
      ErrorCode.VALIDATION_ERROR,
    ].includes(this.code);
  }
}
