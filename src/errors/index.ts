/**
 * Error handling module for the configuration resolver.
 *
 * This module provides:
 * - A small error hierarchy, one class per resolution stage
 * - Process exit codes for each error kind
 * - Conversion of Node.js fs errors into config source errors
 *
 * Usage:
 * ```typescript
 * import { ConfigError, logError } from "./errors/index.js";
 *
 * try {
 *   await loadConfig({ args });
 * } catch (error) {
 *   logError(error);
 *   process.exit(error instanceof ConfigError ? error.exitCode : 1);
 * }
 * ```
 */

// Base error class and types
export { ConfigError, ErrorCode } from "./base.js";
export type { ErrorDetails, ConfigErrorOptions } from "./base.js";

// Specific error classes
export {
  FlagParseError,
  HelpRequestedError,
  DocumentParseError,
  ConfigSourceError,
  ConfigValidationError,
} from "./config-errors.js";

// Error utilities
export { toConfigError, logError, getErrorMessage } from "./utils.js";
