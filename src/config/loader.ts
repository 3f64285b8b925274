import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { minimatch } from "minimatch";
import { DocumentParseError, toConfigError } from "../errors/index.js";
import { getLogger } from "../utils/logger.js";
import { deprecatedFlagNames, flagsFragment, parseFlags, type Flags } from "./cli.js";
import { parseFile, type DocumentFormat } from "./decoder.js";
import { defaultFragment } from "./defaults.js";
import type { ConfigFragment } from "./fragment.js";
import { merge } from "./merge.js";
import { newConfig, type RuntimeConfig } from "./runtime.js";

/**
 * Files picked up from a -config-dir directory
 */
export const CONFIG_DIR_PATTERN = "*.{json,yaml,yml}";

/**
 * One configuration document read from disk.
 */
export interface ConfigSource {
  path: string;
  format?: DocumentFormat;
  text: string;
}

/**
 * Format implied by a file extension, or undefined to sniff the content
 */
export function formatFromPath(filePath: string): DocumentFormat | undefined {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") {
    return "json";
  }
  if (ext === ".yaml" || ext === ".yml") {
    return "yaml";
  }
  return undefined;
}

async function readSource(filePath: string): Promise<ConfigSource> {
  try {
    const text = await fs.readFile(filePath, "utf-8");
    return { path: filePath, format: formatFromPath(filePath), text };
  } catch (error) {
    throw toConfigError(error, "read config file", filePath);
  }
}

async function readDirectory(dirPath: string): Promise<ConfigSource[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true }).catch((error: unknown) => {
    throw toConfigError(error, "read config directory", dirPath);
  });

  const candidates = entries.filter((entry) => minimatch(entry.name, CONFIG_DIR_PATTERN, { dot: true, nocase: true }));
  const kept = await Promise.all(candidates.map((entry) => isConfigFile(dirPath, entry)));
  const names = candidates
    .filter((_, index) => kept[index])
    .map((entry) => entry.name)
    .sort();

  return Promise.all(names.map((name) => readSource(path.join(dirPath, name))));
}

// Symlinked entries count when their target is a regular file
async function isConfigFile(dirPath: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  const target = path.join(dirPath, entry.name);
  const stats = await fs.stat(target).catch((error: unknown) => {
    throw toConfigError(error, "stat config path", target);
  });
  return stats.isFile();
}

async function readPath(sourcePath: string): Promise<ConfigSource[]> {
  const stats = await fs.stat(sourcePath).catch((error: unknown) => {
    throw toConfigError(error, "stat config path", sourcePath);
  });

  if (stats.isDirectory()) {
    return readDirectory(sourcePath);
  }
  return [await readSource(sourcePath)];
}

/**
 * Read every -config-file / -config-dir path. Paths are read concurrently;
 * the result keeps path order, and within a directory sorted file-name order.
 */
export async function readConfigSources(paths: readonly string[]): Promise<ConfigSource[]> {
  const perPath = await Promise.all(paths.map((p) => readPath(p)));
  return perPath.flat();
}

/**
 * Decode every source into a fragment, in order. Errors name the source path.
 */
export function decodeSources(sources: readonly ConfigSource[]): ConfigFragment[] {
  const logger = getLogger();
  return sources.map((source) => {
    logger.debug({ path: source.path, format: source.format ?? "sniffed" }, "Decoding config source");
    try {
      return parseFile(source.text, source.format, source.path);
    } catch (error) {
      if (error instanceof DocumentParseError && error.source !== source.path) {
        throw error.withSource(source.path);
      }
      throw error;
    }
  });
}

export interface LoadConfigOptions {
  /** Command-line arguments, without the program name. */
  args: readonly string[];
  /** Lowest-precedence layer; defaultFragment() when omitted. */
  defaults?: ConfigFragment;
}

export interface LoadedConfig {
  config: RuntimeConfig;
  flags: Flags;
  sources: ConfigSource[];
}

/**
 * Main configuration loader with full precedence chain
 * Precedence: command-line flags > config files (later wins) > defaults
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const logger = getLogger();

  // 1. Parse flags; they also name the config files to read
  const flags = parseFlags(options.args);
  for (const name of deprecatedFlagNames(flags)) {
    logger.warn({ flag: name }, `Flag -${name} is deprecated`);
  }

  // 2. Read and decode config files in command-line order
  const sources = await readConfigSources(flags.configFiles);
  const documents = decodeSources(sources);

  // 3. Merge defaults, documents and flags, then resolve
  const merged = merge([options.defaults ?? defaultFragment(), ...documents, flagsFragment(flags)]);
  const config = newConfig(merged);

  logger.debug({ sources: sources.map((s) => s.path) }, "Configuration resolved");
  return { config, flags, sources };
}

const REDACTED = "***REDACTED***";

function redact(value: string): string {
  return value === "" ? value : REDACTED;
}

/**
 * Format configuration for display (hides sensitive values)
 */
export function formatConfigForDisplay(config: RuntimeConfig): string {
  const sanitized: RuntimeConfig = {
    ...config,
    encryptKey: redact(config.encryptKey),
    retryJoinAzure: {
      ...config.retryJoinAzure,
      secretAccessKey: redact(config.retryJoinAzure.secretAccessKey),
    },
    retryJoinEC2: {
      ...config.retryJoinEC2,
      secretAccessKey: redact(config.retryJoinEC2.secretAccessKey),
    },
  };

  return JSON.stringify(sanitized, null, 2);
}
