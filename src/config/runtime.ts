import { ConfigValidationError } from "../errors/index.js";
import { parseDuration } from "./duration.js";
import { isGroupTouched, type ConfigFragment } from "./fragment.js";
import { valueOr, type Optional } from "./optional.js";

export const WILDCARD_ADDR = "0.0.0.0";

export interface RetryJoinAzureConfig {
  tagName: string;
  tagValue: string;
  subscriptionID: string;
  tenantID: string;
  clientID: string;
  secretAccessKey: string;
}

export interface RetryJoinEC2Config {
  region: string;
  tagKey: string;
  tagValue: string;
  accessKeyID: string;
  secretAccessKey: string;
}

export interface RetryJoinGCEConfig {
  projectName: string;
  zonePattern: string;
  tagValue: string;
  credentialsFile: string;
}

/**
 * The runtime configuration. Every field has a concrete value; durations are
 * in milliseconds.
 */
export interface RuntimeConfig {
  // simple values
  advertiseAddrLAN: string;
  advertiseAddrWAN: string;
  bootstrap: boolean;
  bootstrapExpect: number;
  checkUpdateInterval: number;
  clientAddr: string;
  dataDir: string;
  datacenter: string;
  devMode: boolean;
  disableHostNodeID: boolean;
  disableKeyringFile: boolean;
  dnsDomain: string;
  enableScriptChecks: boolean;
  enableSyslog: boolean;
  enableUI: boolean;
  encryptKey: string;
  logLevel: string;
  nodeID: string;
  nodeName: string;
  nonVotingServer: boolean;
  pidFile: string;
  rpcProtocol: number;
  raftProtocol: number;
  rejoinAfterLeave: boolean;
  retryJoinIntervalLAN: number;
  retryJoinIntervalWAN: number;
  retryJoinMaxAttemptsLAN: number;
  retryJoinMaxAttemptsWAN: number;
  serfBindAddrLAN: string;
  serfBindAddrWAN: string;
  serverMode: boolean;
  uiDir: string;

  // address values
  bindAddrs: string[];
  dnsRecursors: string[];
  joinAddrsLAN: string[];
  joinAddrsWAN: string[];
  retryJoinLAN: string[];
  retryJoinWAN: string[];

  // server endpoint values
  dnsPort: number;
  dnsAddrsTCP: string[];
  dnsAddrsUDP: string[];
  httpPort: number;
  httpAddrs: string[];
  httpsPort: number;
  httpsAddrs: string[];
  serverPort: number;
  serverAddrs: string[];
  serfPortLAN: number;
  serfPortWAN: number;

  // other values
  nodeMeta: Record<string, string>;
  retryJoinAzure: RetryJoinAzureConfig;
  retryJoinEC2: RetryJoinEC2Config;
  retryJoinGCE: RetryJoinGCEConfig;
}

const boolVal = (b: Optional<boolean>): boolean => valueOr(b, false);
const intVal = (n: Optional<number>): number => valueOr(n, 0);
const stringVal = (s: Optional<string>): string => valueOr(s, "");

function durationVal(field: string, s: Optional<string>): number {
  if (!s.present) {
    return 0;
  }
  const ms = parseDuration(s.value);
  if (ms === undefined) {
    throw new ConfigValidationError(`${field}: invalid duration "${s.value}"`, field);
  }
  return ms;
}

/**
 * An absent or empty address binds all interfaces.
 */
function addrVal(s: Optional<string>): string {
  const addr = stringVal(s);
  return addr === "" ? WILDCARD_ADDR : addr;
}

/**
 * Render host and port as "host:port". The wildcard address renders as an
 * empty host; IPv6 hosts are bracketed.
 */
export function joinHostPort(host: string, port: number): string {
  const h = host === WILDCARD_ADDR ? "" : host;
  return h.includes(":") ? `[${h}]:${port}` : `${h}:${port}`;
}

function listenerAddrs(bindAddrs: string[], port: Optional<number>): string[] {
  if (!port.present) {
    return [];
  }
  return bindAddrs.map((addr) => joinHostPort(addr, port.value));
}

/**
 * Create the runtime configuration from a merged fragment. Unset fields take
 * their zero value; listener addresses are derived from the bind addresses
 * and ports. Throws ConfigValidationError on the first inconsistency and
 * returns nothing partial.
 */
export function newConfig(f: ConfigFragment): RuntimeConfig {
  // if no bind address is given but ports are specified then we bail.
  // in production the default layer always supplies a bind address.
  if (!f.bindAddr.present && isGroupTouched(f.ports)) {
    throw new ConfigValidationError("no bind address specified", "bindAddr");
  }

  const bindAddrs = f.bindAddr.present ? [addrVal(f.bindAddr)] : [];
  const dnsAddrs = listenerAddrs(bindAddrs, f.ports.dns);

  return {
    advertiseAddrLAN: stringVal(f.advertiseAddrLAN),
    advertiseAddrWAN: stringVal(f.advertiseAddrWAN),
    bootstrap: boolVal(f.bootstrap),
    bootstrapExpect: intVal(f.bootstrapExpect),
    checkUpdateInterval: durationVal("checkUpdateInterval", f.checkUpdateInterval),
    clientAddr: stringVal(f.clientAddr),
    dataDir: stringVal(f.dataDir),
    datacenter: stringVal(f.datacenter),
    devMode: boolVal(f.devMode),
    disableHostNodeID: boolVal(f.disableHostNodeID),
    disableKeyringFile: boolVal(f.disableKeyringFile),
    dnsDomain: stringVal(f.dnsDomain),
    enableScriptChecks: boolVal(f.enableScriptChecks),
    enableSyslog: boolVal(f.enableSyslog),
    enableUI: boolVal(f.enableUI),
    encryptKey: stringVal(f.encryptKey),
    logLevel: stringVal(f.logLevel),
    nodeID: stringVal(f.nodeID),
    nodeName: stringVal(f.nodeName),
    nonVotingServer: boolVal(f.nonVotingServer),
    pidFile: stringVal(f.pidFile),
    rpcProtocol: intVal(f.rpcProtocol),
    raftProtocol: intVal(f.raftProtocol),
    rejoinAfterLeave: boolVal(f.rejoinAfterLeave),
    retryJoinIntervalLAN: intVal(f.retryJoinIntervalLAN),
    retryJoinIntervalWAN: intVal(f.retryJoinIntervalWAN),
    retryJoinMaxAttemptsLAN: intVal(f.retryJoinMaxAttemptsLAN),
    retryJoinMaxAttemptsWAN: intVal(f.retryJoinMaxAttemptsWAN),
    serfBindAddrLAN: stringVal(f.serfBindAddrLAN),
    serfBindAddrWAN: stringVal(f.serfBindAddrWAN),
    serverMode: boolVal(f.serverMode),
    uiDir: stringVal(f.uiDir),

    bindAddrs,
    dnsRecursors: [...f.dnsRecursors],
    joinAddrsLAN: [...f.joinAddrsLAN],
    joinAddrsWAN: [...f.joinAddrsWAN],
    retryJoinLAN: [...f.retryJoinLAN],
    retryJoinWAN: [...f.retryJoinWAN],

    dnsPort: intVal(f.ports.dns),
    dnsAddrsTCP: dnsAddrs,
    dnsAddrsUDP: [...dnsAddrs],
    httpPort: intVal(f.ports.http),
    httpAddrs: listenerAddrs(bindAddrs, f.ports.http),
    httpsPort: intVal(f.ports.https),
    httpsAddrs: listenerAddrs(bindAddrs, f.ports.https),
    serverPort: intVal(f.ports.server),
    serverAddrs: listenerAddrs(bindAddrs, f.ports.server),
    serfPortLAN: intVal(f.ports.serfLAN),
    serfPortWAN: intVal(f.ports.serfWAN),

    nodeMeta: { ...f.nodeMeta },
    retryJoinAzure: {
      tagName: stringVal(f.retryJoinAzure.tagName),
      tagValue: stringVal(f.retryJoinAzure.tagValue),
      subscriptionID: stringVal(f.retryJoinAzure.subscriptionID),
      tenantID: stringVal(f.retryJoinAzure.tenantID),
      clientID: stringVal(f.retryJoinAzure.clientID),
      secretAccessKey: stringVal(f.retryJoinAzure.secretAccessKey),
    },
    retryJoinEC2: {
      region: stringVal(f.retryJoinEC2.region),
      tagKey: stringVal(f.retryJoinEC2.tagKey),
      tagValue: stringVal(f.retryJoinEC2.tagValue),
      accessKeyID: stringVal(f.retryJoinEC2.accessKeyID),
      secretAccessKey: stringVal(f.retryJoinEC2.secretAccessKey),
    },
    retryJoinGCE: {
      projectName: stringVal(f.retryJoinGCE.projectName),
      zonePattern: stringVal(f.retryJoinGCE.zonePattern),
      tagValue: stringVal(f.retryJoinGCE.tagValue),
      credentialsFile: stringVal(f.retryJoinGCE.credentialsFile),
    },
  };
}
