/**
 * Specific error classes for each stage of configuration resolution.
 */

import { ConfigError, ErrorCode } from "./base.js";

/**
 * Error thrown when the command line cannot be parsed.
 */
export class FlagParseError extends ConfigError {
  constructor(reason: string, flag?: string) {
    super(reason, ErrorCode.FLAG_PARSE_ERROR, {
      details: flag !== undefined ? { flag } : undefined,
      suggestion: "Run with -help to list the supported flags.",
    });
  }
}

/**
 * Thrown when -help is given. Not a failure: the caller prints usage.
 */
export class HelpRequestedError extends ConfigError {
  constructor() {
    super("help requested", ErrorCode.HELP_REQUESTED);
  }
}

/**
 * Error thrown when a configuration document is not valid JSON or YAML,
 * or does not match the document schema.
 */
export class DocumentParseError extends ConfigError {
  public readonly source: string;
  public readonly issues: string[];
  private readonly parseCause?: Error;

  constructor(source: string, issues: string[], cause?: Error) {
    super(`Failed to parse ${source}:\n${issues.map((i) => `  - ${i}`).join("\n")}`, ErrorCode.DOCUMENT_PARSE_ERROR, {
      details: { source, issues },
      suggestion: "Check the document syntax and key names.",
      cause,
    });
    this.source = source;
    this.issues = issues;
    this.parseCause = cause;
  }

  /**
   * Same issues, attributed to a named source (usually a file path).
   */
  withSource(source: string): DocumentParseError {
    return new DocumentParseError(source, this.issues, this.parseCause);
  }
}

/**
 * Error thrown when a configuration file or directory cannot be read.
 */
export class ConfigSourceError extends ConfigError {
  constructor(path: string, reason: string, cause?: Error) {
    super(`Cannot read config source ${path}: ${reason}`, ErrorCode.CONFIG_SOURCE_ERROR, {
      details: { path },
      suggestion: "Check that the path exists and is readable.",
      internalMessage: cause?.message,
      cause,
    });
  }
}

/**
 * Error thrown when a merged fragment cannot be turned into a runtime configuration.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, field?: string) {
    super(message, ErrorCode.VALIDATION_ERROR, {
      details: field !== undefined ? { field } : undefined,
    });
  }
}
