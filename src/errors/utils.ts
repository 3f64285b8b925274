/**
 * Utility functions for error handling.
 * Provides helpers for error conversion and logging.
 */

import { ConfigError, ErrorCode } from "./base.js";
import { ConfigSourceError } from "./config-errors.js";
import { getLogger } from "../utils/logger.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Convert a generic error to an appropriate ConfigError.
 * This is useful for wrapping Node.js fs errors raised while reading sources.
 */
export function toConfigError(error: unknown, operation: string, path?: string): ConfigError {
  // If it's already a ConfigError, return it
  if (error instanceof ConfigError) {
    return error;
  }

  // Handle Node.js system errors
  if (isErrnoException(error)) {
    const where = path ?? error.path ?? "unknown";

    switch (error.code) {
      case "ENOENT":
        return new ConfigSourceError(where, "no such file or directory", error);

      case "EACCES":
      case "EPERM":
        return new ConfigSourceError(where, `permission denied while trying to ${operation}`, error);

      case "EISDIR":
        return new ConfigSourceError(where, "expected a file but found a directory", error);

      case "ENOTDIR":
        return new ConfigSourceError(where, "path component is not a directory", error);

      default:
        return new ConfigSourceError(where, `${operation} failed (${error.code ?? "unknown error"})`, error);
    }
  }

  return new ConfigError(`${operation} failed: ${getErrorMessage(error)}`, ErrorCode.INTERNAL_ERROR, {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Log an error with full server-side details.
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const logger = getLogger();

  if (error instanceof ConfigError) {
    const details = error.toLogDetails();
    if (error.isUserError()) {
      logger.warn({ ...context, error: details }, error.message);
    } else {
      logger.error({ ...context, error: details }, error.message);
    }
    return;
  }

  logger.error({ ...context, error: getErrorMessage(error) }, "Unexpected error");
}

/**
 * Get a readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
