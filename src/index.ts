#!/usr/bin/env node
/**
 * Command-line entry point: resolves the agent configuration from the
 * process arguments and prints it as JSON on stdout.
 */

import { displayHelp, formatConfigForDisplay, loadConfig } from "./config/index.js";
import { ConfigError, ErrorCode, logError } from "./errors/index.js";
import { initLogger, toLogLevel } from "./utils/logger.js";

async function main(): Promise<number> {
  const format = process.stderr.isTTY ? "pretty" : "json";
  const logger = initLogger({ level: "info", format });

  try {
    const { config } = await loadConfig({ args: process.argv.slice(2) });
    logger.setLevel(toLogLevel(config.logLevel));
    logger.debug({ datacenter: config.datacenter, node: config.nodeName }, "Configuration loaded");
    process.stdout.write(`${formatConfigForDisplay(config)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError && error.code === ErrorCode.HELP_REQUESTED) {
      displayHelp();
      return error.exitCode;
    }
    logError(error);
    return error instanceof ConfigError ? error.exitCode : 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("agent-config failed:", error);
    process.exitCode = 1;
  }
);
