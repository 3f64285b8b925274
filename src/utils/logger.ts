import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

// Fields that must never reach a log line
const REDACTED_PATHS = [
  "encryptKey",
  "config.encryptKey",
  "*.secretAccessKey",
  "config.*.secretAccessKey",
  "deprecated.atlasToken",
];

/**
 * Map an agent log level ("TRACE", "DEBUG", "INFO", "WARN", "ERR") onto a
 * logger level. Unknown values fall back to info.
 */
export function toLogLevel(agentLevel: string): LogLevel {
  const normalized = agentLevel.trim().toLowerCase();
  if (normalized === "trace") {
    return "debug";
  }
  if (normalized === "err") {
    return "error";
  }
  if (normalized === "warning") {
    return "warn";
  }
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

// Create logger instance. Output goes to stderr so stdout stays free for results.
function createLogger(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    // Base context that will be included in every log
    base: {
      service: "agent-config",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACTED_PATHS,
      censor: "***REDACTED***",
    },
  };

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname,service",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

// Logger wrapper accepting either a message or a context object and a message
export class Logger {
  private logger: pino.Logger;

  constructor(config: LoggerConfig) {
    this.logger = createLogger(config);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  debug(msg: string): void;
  debug(obj: object, msg: string): void;
  debug(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.debug(msgOrObj);
    } else {
      this.logger.debug(msgOrObj, msg);
    }
  }

  info(msg: string): void;
  info(obj: object, msg: string): void;
  info(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.info(msgOrObj);
    } else {
      this.logger.info(msgOrObj, msg);
    }
  }

  warn(msg: string): void;
  warn(obj: object, msg: string): void;
  warn(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.warn(msgOrObj);
    } else {
      this.logger.warn(msgOrObj, msg);
    }
  }

  error(msg: string): void;
  error(obj: object, msg: string): void;
  error(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.error(msgOrObj);
    } else {
      this.logger.error(msgOrObj, msg);
    }
  }
}

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

/**
 * Get the process logger. Falls back to a json logger at warn level until
 * initLogger() runs.
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: "warn", format: "json" });
  }
  return globalLogger;
}
