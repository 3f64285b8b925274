import { FlagSet, type FlagBinding } from "./flags.js";
import { emptyFragment, type ConfigFragment } from "./fragment.js";
import { none, some, type Optional } from "./optional.js";

/**
 * Flags that still parse but no longer configure anything directly.
 */
export interface DeprecatedFlags {
  datacenter: Optional<string>;
  atlasInfrastructure: Optional<string>;
  atlasJoin: Optional<boolean>;
  atlasToken: Optional<string>;
  atlasEndpoint: Optional<string>;
}

/**
 * Result of parsing the command line.
 */
export interface Flags {
  /** The command-line layer. */
  file: ConfigFragment;
  /** -config-file and -config-dir paths, in command-line order. */
  configFiles: string[];
  deprecated: DeprecatedFlags;
}

export function emptyDeprecatedFlags(): DeprecatedFlags {
  return {
    datacenter: none(),
    atlasInfrastructure: none(),
    atlasJoin: none(),
    atlasToken: none(),
    atlasEndpoint: none(),
  };
}

/**
 * Register the agent's command-line surface on a flag set, bound to the
 * locations inside `f`.
 */
export function addFlags(fs: FlagSet, f: Flags): void {
  const file = f.file;

  // command line flags ordered by flag name
  fs.string("advertise", "Sets the advertise address to use.", (v) => {
    file.advertiseAddrLAN = some(v);
  });
  fs.string("advertise-wan", "Sets address to advertise on WAN instead of -advertise address.", (v) => {
    file.advertiseAddrWAN = some(v);
  });
  fs.string("bind", "Sets the bind address for cluster communication.", (v) => {
    file.bindAddr = some(v);
  });
  fs.bool("bootstrap", "Sets server to bootstrap mode.", (v) => {
    file.bootstrap = some(v);
  });
  fs.int("bootstrap-expect", "Sets server to expect bootstrap mode.", (v) => {
    file.bootstrapExpect = some(v);
  });
  fs.string(
    "client",
    "Sets the address to bind for client access. This includes RPC, DNS, HTTP and HTTPS (if configured).",
    (v) => {
      file.clientAddr = some(v);
    }
  );
  fs.list(
    "config-dir",
    "Path to a directory to read configuration files from. This will read every file ending in '.json', '.yaml' or '.yml' as configuration in this directory in alphabetical order. Can be specified multiple times.",
    f.configFiles
  );
  fs.list(
    "config-file",
    "Path to a JSON or YAML file to read configuration from. Can be specified multiple times.",
    f.configFiles
  );
  fs.string("data-dir", "Path to a data directory to store agent state.", (v) => {
    file.dataDir = some(v);
  });
  fs.string("datacenter", "Datacenter of the agent.", (v) => {
    file.datacenter = some(v);
  });
  fs.bool("dev", "Starts the agent in development mode.", (v) => {
    file.devMode = some(v);
  });
  fs.bool(
    "disable-host-node-id",
    "Setting this to true will prevent the agent from using information from the host to generate a node ID, and will cause it to generate a random node ID instead.",
    (v) => {
      file.disableHostNodeID = some(v);
    }
  );
  fs.bool("disable-keyring-file", "Disables the backing up of the keyring to a file.", (v) => {
    file.disableKeyringFile = some(v);
  });
  fs.int("dns-port", "DNS port to use.", (v) => {
    file.ports.dns = some(v);
  });
  fs.string("domain", "Domain to use for DNS interface.", (v) => {
    file.dnsDomain = some(v);
  });
  fs.bool("enable-script-checks", "Enables health check scripts.", (v) => {
    file.enableScriptChecks = some(v);
  });
  fs.string("encrypt", "Provides the gossip encryption key.", (v) => {
    file.encryptKey = some(v);
  });
  fs.int("http-port", "Sets the HTTP API port to listen on.", (v) => {
    file.ports.http = some(v);
  });
  fs.list("join", "Address of an agent to join at start time. Can be specified multiple times.", file.joinAddrsLAN);
  fs.list(
    "join-wan",
    "Address of an agent to join -wan at start time. Can be specified multiple times.",
    file.joinAddrsWAN
  );
  fs.string("log-level", "Log level of the agent.", (v) => {
    file.logLevel = some(v);
  });
  fs.string("node", "Name of this node. Must be unique in the cluster.", (v) => {
    file.nodeName = some(v);
  });
  fs.string(
    "node-id",
    "A unique ID for this node across space and time. Defaults to a randomly-generated ID that persists in the data-dir.",
    (v) => {
      file.nodeID = some(v);
    }
  );
  fs.map(
    "node-meta",
    "An arbitrary metadata key/value pair for this node, of the format `key:value`. Can be specified multiple times.",
    file.nodeMeta
  );
  fs.bool(
    "non-voting-server",
    "Makes the server not participate in the Raft quorum, and have it only receive the data replication stream.",
    (v) => {
      file.nonVotingServer = some(v);
    }
  );
  fs.string("pid-file", "Path to file to store agent PID.", (v) => {
    file.pidFile = some(v);
  });
  fs.int("protocol", "Sets the protocol version. Defaults to latest.", (v) => {
    file.rpcProtocol = some(v);
  });
  fs.int("raft-protocol", "Sets the Raft protocol version. Defaults to latest.", (v) => {
    file.raftProtocol = some(v);
  });
  fs.list(
    "recursor",
    "Address of an upstream DNS server. Can be specified multiple times.",
    file.dnsRecursors
  );
  fs.bool("rejoin", "Ignores a previous leave and attempts to rejoin the cluster.", (v) => {
    file.rejoinAfterLeave = some(v);
  });
  fs.duration("retry-interval", "Time to wait between join attempts.", (v) => {
    file.retryJoinIntervalLAN = some(v);
  });
  fs.duration("retry-interval-wan", "Time to wait between join -wan attempts.", (v) => {
    file.retryJoinIntervalWAN = some(v);
  });
  fs.list(
    "retry-join",
    "Address of an agent to join at start time with retries enabled. Can be specified multiple times.",
    file.retryJoinLAN
  );
  fs.list(
    "retry-join-wan",
    "Address of an agent to join -wan at start time with retries enabled. Can be specified multiple times.",
    file.retryJoinWAN
  );
  fs.int("retry-max", "Maximum number of join attempts. Defaults to 0, which will retry indefinitely.", (v) => {
    file.retryJoinMaxAttemptsLAN = some(v);
  });
  fs.int(
    "retry-max-wan",
    "Maximum number of join -wan attempts. Defaults to 0, which will retry indefinitely.",
    (v) => {
      file.retryJoinMaxAttemptsWAN = some(v);
    }
  );
  fs.string("serf-lan-bind", "Address to bind Serf LAN listeners to.", (v) => {
    file.serfBindAddrLAN = some(v);
  });
  fs.string("serf-wan-bind", "Address to bind Serf WAN listeners to.", (v) => {
    file.serfBindAddrWAN = some(v);
  });
  fs.bool("server", "Switches agent to server mode.", (v) => {
    file.serverMode = some(v);
  });
  fs.bool("syslog", "Enables logging to syslog.", (v) => {
    file.enableSyslog = some(v);
  });
  fs.bool("ui", "Enables the built-in static web UI server.", (v) => {
    file.enableUI = some(v);
  });
  fs.string("ui-dir", "Path to directory containing the web UI resources.", (v) => {
    file.uiDir = some(v);
  });

  // deprecated flags ordered by flag name
  const deprecated = f.deprecated;
  fs.string("atlas", "(deprecated) Sets the Atlas infrastructure name, enables SCADA.", (v) => {
    deprecated.atlasInfrastructure = some(v);
  });
  fs.string("atlas-endpoint", "(deprecated) The address of the endpoint for Atlas integration.", (v) => {
    deprecated.atlasEndpoint = some(v);
  });
  fs.bool("atlas-join", "(deprecated) Enables auto-joining the Atlas cluster.", (v) => {
    deprecated.atlasJoin = some(v);
  });
  fs.string("atlas-token", "(deprecated) Provides the Atlas API token.", (v) => {
    deprecated.atlasToken = some(v);
  });
  fs.string("dc", "(deprecated) Datacenter of the agent (use 'datacenter' instead).", (v) => {
    deprecated.datacenter = some(v);
  });
  fs.string("retry-join-azure-tag-name", "Azure tag name to filter on for server discovery.", (v) => {
    file.retryJoinAzure.tagName = some(v);
  });
  fs.string("retry-join-azure-tag-value", "Azure tag value to filter on for server discovery.", (v) => {
    file.retryJoinAzure.tagValue = some(v);
  });
  fs.string("retry-join-ec2-region", "EC2 Region to discover servers in.", (v) => {
    file.retryJoinEC2.region = some(v);
  });
  fs.string("retry-join-ec2-tag-key", "EC2 tag key to filter on for server discovery.", (v) => {
    file.retryJoinEC2.tagKey = some(v);
  });
  fs.string("retry-join-ec2-tag-value", "EC2 tag value to filter on for server discovery.", (v) => {
    file.retryJoinEC2.tagValue = some(v);
  });
  fs.string(
    "retry-join-gce-credentials-file",
    "Path to credentials JSON file to use with Google Compute Engine.",
    (v) => {
      file.retryJoinGCE.credentialsFile = some(v);
    }
  );
  fs.string("retry-join-gce-project-name", "Google Compute Engine project to discover servers in.", (v) => {
    file.retryJoinGCE.projectName = some(v);
  });
  fs.string(
    "retry-join-gce-tag-value",
    "Google Compute Engine tag value to filter on for server discovery.",
    (v) => {
      file.retryJoinGCE.tagValue = some(v);
    }
  );
  fs.string(
    "retry-join-gce-zone-pattern",
    "Google Compute Engine region or zone to discover servers in (regex pattern).",
    (v) => {
      file.retryJoinGCE.zonePattern = some(v);
    }
  );
}

/**
 * Parse the arguments into a Flags value. Throws a FlagParseError on the
 * first bad argument, or HelpRequestedError for -help.
 */
export function parseFlags(args: readonly string[]): Flags {
  const f: Flags = {
    file: emptyFragment(),
    configFiles: [],
    deprecated: emptyDeprecatedFlags(),
  };
  const fs = new FlagSet("agent");
  addFlags(fs, f);
  fs.parse(args);
  return f;
}

/**
 * The fragment contributed by the command line. A -dc given without
 * -datacenter fills in the datacenter.
 */
export function flagsFragment(flags: Flags): ConfigFragment {
  if (flags.deprecated.datacenter.present && !flags.file.datacenter.present) {
    return { ...flags.file, datacenter: flags.deprecated.datacenter };
  }
  return flags.file;
}

/**
 * Names of the deprecated flags that were given, in flag-name order.
 */
export function deprecatedFlagNames(flags: Flags): string[] {
  const names: Array<[string, Optional<unknown>]> = [
    ["atlas", flags.deprecated.atlasInfrastructure],
    ["atlas-endpoint", flags.deprecated.atlasEndpoint],
    ["atlas-join", flags.deprecated.atlasJoin],
    ["atlas-token", flags.deprecated.atlasToken],
    ["dc", flags.deprecated.datacenter],
  ];
  return names.filter(([, value]) => value.present).map(([name]) => name);
}

// Each list or map occurrence takes a single value
function placeholder(binding: FlagBinding): string {
  switch (binding.kind) {
    case "bool":
      return "";
    case "list":
      return " <string>";
    case "map":
      return " <key:value>";
    default:
      return ` <${binding.kind}>`;
  }
}

/**
 * Usage text listing every flag, ordered by name.
 */
export function usage(): string {
  const fs = new FlagSet("agent");
  addFlags(fs, { file: emptyFragment(), configFiles: [], deprecated: emptyDeprecatedFlags() });

  const lines = ["Usage: agent-config [options]", "", "OPTIONS:"];
  for (const binding of fs.sorted()) {
    lines.push(`  -${binding.name}${placeholder(binding)}`);
    lines.push(`      ${binding.help}`);
  }
  lines.push(
    "",
    "CONFIGURATION PRECEDENCE:",
    "  Command-line flags > config files (in the order given) > defaults"
  );
  return lines.join("\n");
}

/**
 * Display help message
 */
export function displayHelp(): void {
  console.error(usage());
}
