/**
 * Configuration module for the cluster agent
 *
 * This module resolves the agent's runtime configuration from layers:
 * - Compiled-in defaults
 * - JSON and YAML configuration documents (-config-file / -config-dir)
 * - Command-line flags
 * - Configuration precedence: flags > documents (later wins) > defaults
 */

export { some, none, isPresent, valueOr } from "./optional.js";
export type { Optional } from "./optional.js";
export { emptyFragment, emptyPorts, isGroupTouched } from "./fragment.js";
export type { ConfigFragment, Ports, RetryJoinAzure, RetryJoinEC2, RetryJoinGCE } from "./fragment.js";
export { defaultFragment } from "./defaults.js";
export { parseDuration } from "./duration.js";
export { DocumentSchema } from "./schema.js";
export type { Document } from "./schema.js";
export { parseFile, sniffFormat, documentToFragment } from "./decoder.js";
export type { DocumentFormat } from "./decoder.js";
export { FlagSet, parseBool } from "./flags.js";
export type { FlagBinding } from "./flags.js";
export {
  parseFlags,
  addFlags,
  flagsFragment,
  deprecatedFlagNames,
  emptyDeprecatedFlags,
  usage,
  displayHelp,
} from "./cli.js";
export type { Flags, DeprecatedFlags } from "./cli.js";
export { merge } from "./merge.js";
export { newConfig, joinHostPort, WILDCARD_ADDR } from "./runtime.js";
export type { RuntimeConfig, RetryJoinAzureConfig, RetryJoinEC2Config, RetryJoinGCEConfig } from "./runtime.js";
export {
  loadConfig,
  readConfigSources,
  decodeSources,
  formatFromPath,
  formatConfigForDisplay,
  CONFIG_DIR_PATTERN,
  type ConfigSource,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./loader.js";
