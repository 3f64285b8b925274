import { none, type Optional } from "./optional.js";

/**
 * Listener ports. Each port is set independently by a layer.
 */
export interface Ports {
  dns: Optional<number>;
  http: Optional<number>;
  https: Optional<number>;
  serfLAN: Optional<number>;
  serfWAN: Optional<number>;
  server: Optional<number>;
  deprecatedRPC: Optional<number>;
}

export interface RetryJoinAzure {
  tagName: Optional<string>;
  tagValue: Optional<string>;
  subscriptionID: Optional<string>;
  tenantID: Optional<string>;
  clientID: Optional<string>;
  secretAccessKey: Optional<string>;
}

export interface RetryJoinEC2 {
  region: Optional<string>;
  tagKey: Optional<string>;
  tagValue: Optional<string>;
  accessKeyID: Optional<string>;
  secretAccessKey: Optional<string>;
}

export interface RetryJoinGCE {
  projectName: Optional<string>;
  zonePattern: Optional<string>;
  tagValue: Optional<string>;
  credentialsFile: Optional<string>;
}

/**
 * The configuration contributed by one layer: the defaults, one document,
 * or the command line.
 *
 * Scalars are Optional so that an explicit zero value can be told apart from
 * a field the layer never mentioned. Lists and maps have no presence bit: an
 * empty list or map means the layer contributed nothing. Durations are
 * milliseconds, except checkUpdateInterval which stays a literal until
 * resolution.
 *
 * Fragments are values. Nothing mutates a fragment once it has been handed on.
 */
export interface ConfigFragment {
  advertiseAddrLAN: Optional<string>;
  advertiseAddrWAN: Optional<string>;
  bindAddr: Optional<string>;
  bootstrap: Optional<boolean>;
  bootstrapExpect: Optional<number>;
  checkUpdateInterval: Optional<string>;
  clientAddr: Optional<string>;
  dataDir: Optional<string>;
  datacenter: Optional<string>;
  devMode: Optional<boolean>;
  disableHostNodeID: Optional<boolean>;
  disableKeyringFile: Optional<boolean>;
  dnsDomain: Optional<string>;
  dnsRecursors: string[];
  enableScriptChecks: Optional<boolean>;
  enableSyslog: Optional<boolean>;
  enableUI: Optional<boolean>;
  encryptKey: Optional<string>;
  joinAddrsLAN: string[];
  joinAddrsWAN: string[];
  logLevel: Optional<string>;
  nodeID: Optional<string>;
  nodeMeta: Record<string, string>;
  nodeName: Optional<string>;
  nonVotingServer: Optional<boolean>;
  pidFile: Optional<string>;
  ports: Ports;
  rpcProtocol: Optional<number>;
  raftProtocol: Optional<number>;
  rejoinAfterLeave: Optional<boolean>;
  retryJoinIntervalLAN: Optional<number>;
  retryJoinIntervalWAN: Optional<number>;
  retryJoinLAN: string[];
  retryJoinMaxAttemptsLAN: Optional<number>;
  retryJoinMaxAttemptsWAN: Optional<number>;
  retryJoinWAN: string[];
  serfBindAddrLAN: Optional<string>;
  serfBindAddrWAN: Optional<string>;
  serverMode: Optional<boolean>;
  uiDir: Optional<string>;

  retryJoinAzure: RetryJoinAzure;
  retryJoinEC2: RetryJoinEC2;
  retryJoinGCE: RetryJoinGCE;
}

export function emptyPorts(): Ports {
  return {
    dns: none(),
    http: none(),
    https: none(),
    serfLAN: none(),
    serfWAN: none(),
    server: none(),
    deprecatedRPC: none(),
  };
}

export function emptyRetryJoinAzure(): RetryJoinAzure {
  return {
    tagName: none(),
    tagValue: none(),
    subscriptionID: none(),
    tenantID: none(),
    clientID: none(),
    secretAccessKey: none(),
  };
}

export function emptyRetryJoinEC2(): RetryJoinEC2 {
  return {
    region: none(),
    tagKey: none(),
    tagValue: none(),
    accessKeyID: none(),
    secretAccessKey: none(),
  };
}

export function emptyRetryJoinGCE(): RetryJoinGCE {
  return {
    projectName: none(),
    zonePattern: none(),
    tagValue: none(),
    credentialsFile: none(),
  };
}

/**
 * A fragment in which no field is set. Each call returns fresh lists and maps.
 */
export function emptyFragment(): ConfigFragment {
  return {
    advertiseAddrLAN: none(),
    advertiseAddrWAN: none(),
    bindAddr: none(),
    bootstrap: none(),
    bootstrapExpect: none(),
    checkUpdateInterval: none(),
    clientAddr: none(),
    dataDir: none(),
    datacenter: none(),
    devMode: none(),
    disableHostNodeID: none(),
    disableKeyringFile: none(),
    dnsDomain: none(),
    dnsRecursors: [],
    enableScriptChecks: none(),
    enableSyslog: none(),
    enableUI: none(),
    encryptKey: none(),
    joinAddrsLAN: [],
    joinAddrsWAN: [],
    logLevel: none(),
    nodeID: none(),
    nodeMeta: {},
    nodeName: none(),
    nonVotingServer: none(),
    pidFile: none(),
    ports: emptyPorts(),
    rpcProtocol: none(),
    raftProtocol: none(),
    rejoinAfterLeave: none(),
    retryJoinIntervalLAN: none(),
    retryJoinIntervalWAN: none(),
    retryJoinLAN: [],
    retryJoinMaxAttemptsLAN: none(),
    retryJoinMaxAttemptsWAN: none(),
    retryJoinWAN: [],
    serfBindAddrLAN: none(),
    serfBindAddrWAN: none(),
    serverMode: none(),
    uiDir: none(),
    retryJoinAzure: emptyRetryJoinAzure(),
    retryJoinEC2: emptyRetryJoinEC2(),
    retryJoinGCE: emptyRetryJoinGCE(),
  };
}

/**
 * True when at least one field of a group of optional scalars is set.
 */
export function isGroupTouched(group: Ports | RetryJoinAzure | RetryJoinEC2 | RetryJoinGCE): boolean {
  return Object.values(group).some((field: Optional<unknown>) => field.present);
}
