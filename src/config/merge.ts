import {
  emptyFragment,
  type ConfigFragment,
  type Ports,
  type RetryJoinAzure,
  type RetryJoinEC2,
  type RetryJoinGCE,
} from "./fragment.js";
import type { Optional } from "./optional.js";

/**
 * Scalars: a set value replaces whatever earlier layers set.
 */
function mergeScalar<T>(acc: Optional<T>, next: Optional<T>): Optional<T> {
  return next.present ? next : acc;
}

/**
 * Lists: entries are appended in layer order. A list is never reset, and an
 * empty list contributes nothing.
 */
function mergeList(acc: string[], next: string[]): string[] {
  return next.length > 0 ? [...acc, ...next] : acc;
}

/**
 * Maps: a non-empty map replaces the accumulated map as a whole.
 * Keys are not merged one by one.
 */
function mergeMap(acc: Record<string, string>, next: Record<string, string>): Record<string, string> {
  return Object.keys(next).length > 0 ? { ...next } : acc;
}

function mergePorts(acc: Ports, next: Ports): Ports {
  return {
    dns: mergeScalar(acc.dns, next.dns),
    http: mergeScalar(acc.http, next.http),
    https: mergeScalar(acc.https, next.https),
    serfLAN: mergeScalar(acc.serfLAN, next.serfLAN),
    serfWAN: mergeScalar(acc.serfWAN, next.serfWAN),
    server: mergeScalar(acc.server, next.server),
    deprecatedRPC: mergeScalar(acc.deprecatedRPC, next.deprecatedRPC),
  };
}

function mergeRetryJoinAzure(acc: RetryJoinAzure, next: RetryJoinAzure): RetryJoinAzure {
  return {
    tagName: mergeScalar(acc.tagName, next.tagName),
    tagValue: mergeScalar(acc.tagValue, next.tagValue),
    subscriptionID: mergeScalar(acc.subscriptionID, next.subscriptionID),
    tenantID: mergeScalar(acc.tenantID, next.tenantID),
    clientID: mergeScalar(acc.clientID, next.clientID),
    secretAccessKey: mergeScalar(acc.secretAccessKey, next.secretAccessKey),
  };
}

function mergeRetryJoinEC2(acc: RetryJoinEC2, next: RetryJoinEC2): RetryJoinEC2 {
  return {
    region: mergeScalar(acc.region, next.region),
    tagKey: mergeScalar(acc.tagKey, next.tagKey),
    tagValue: mergeScalar(acc.tagValue, next.tagValue),
    accessKeyID: mergeScalar(acc.accessKeyID, next.accessKeyID),
    secretAccessKey: mergeScalar(acc.secretAccessKey, next.secretAccessKey),
  };
}

function mergeRetryJoinGCE(acc: RetryJoinGCE, next: RetryJoinGCE): RetryJoinGCE {
  return {
    projectName: mergeScalar(acc.projectName, next.projectName),
    zonePattern: mergeScalar(acc.zonePattern, next.zonePattern),
    tagValue: mergeScalar(acc.tagValue, next.tagValue),
    credentialsFile: mergeScalar(acc.credentialsFile, next.credentialsFile),
  };
}

function mergeFragment(acc: ConfigFragment, next: ConfigFragment): ConfigFragment {
  return {
    advertiseAddrLAN: mergeScalar(acc.advertiseAddrLAN, next.advertiseAddrLAN),
    advertiseAddrWAN: mergeScalar(acc.advertiseAddrWAN, next.advertiseAddrWAN),
    bindAddr: mergeScalar(acc.bindAddr, next.bindAddr),
    bootstrap: mergeScalar(acc.bootstrap, next.bootstrap),
    bootstrapExpect: mergeScalar(acc.bootstrapExpect, next.bootstrapExpect),
    checkUpdateInterval: mergeScalar(acc.checkUpdateInterval, next.checkUpdateInterval),
    clientAddr: mergeScalar(acc.clientAddr, next.clientAddr),
    dataDir: mergeScalar(acc.dataDir, next.dataDir),
    datacenter: mergeScalar(acc.datacenter, next.datacenter),
    devMode: mergeScalar(acc.devMode, next.devMode),
    disableHostNodeID: mergeScalar(acc.disableHostNodeID, next.disableHostNodeID),
    disableKeyringFile: mergeScalar(acc.disableKeyringFile, next.disableKeyringFile),
    dnsDomain: mergeScalar(acc.dnsDomain, next.dnsDomain),
    dnsRecursors: mergeList(acc.dnsRecursors, next.dnsRecursors),
    enableScriptChecks: mergeScalar(acc.enableScriptChecks, next.enableScriptChecks),
    enableSyslog: mergeScalar(acc.enableSyslog, next.enableSyslog),
    enableUI: mergeScalar(acc.enableUI, next.enableUI),
    encryptKey: mergeScalar(acc.encryptKey, next.encryptKey),
    joinAddrsLAN: mergeList(acc.joinAddrsLAN, next.joinAddrsLAN),
    joinAddrsWAN: mergeList(acc.joinAddrsWAN, next.joinAddrsWAN),
    logLevel: mergeScalar(acc.logLevel, next.logLevel),
    nodeID: mergeScalar(acc.nodeID, next.nodeID),
    nodeMeta: mergeMap(acc.nodeMeta, next.nodeMeta),
    nodeName: mergeScalar(acc.nodeName, next.nodeName),
    nonVotingServer: mergeScalar(acc.nonVotingServer, next.nonVotingServer),
    pidFile: mergeScalar(acc.pidFile, next.pidFile),
    ports: mergePorts(acc.ports, next.ports),
    rpcProtocol: mergeScalar(acc.rpcProtocol, next.rpcProtocol),
    raftProtocol: mergeScalar(acc.raftProtocol, next.raftProtocol),
    rejoinAfterLeave: mergeScalar(acc.rejoinAfterLeave, next.rejoinAfterLeave),
    retryJoinIntervalLAN: mergeScalar(acc.retryJoinIntervalLAN, next.retryJoinIntervalLAN),
    retryJoinIntervalWAN: mergeScalar(acc.retryJoinIntervalWAN, next.retryJoinIntervalWAN),
    retryJoinLAN: mergeList(acc.retryJoinLAN, next.retryJoinLAN),
    retryJoinMaxAttemptsLAN: mergeScalar(acc.retryJoinMaxAttemptsLAN, next.retryJoinMaxAttemptsLAN),
    retryJoinMaxAttemptsWAN: mergeScalar(acc.retryJoinMaxAttemptsWAN, next.retryJoinMaxAttemptsWAN),
    retryJoinWAN: mergeList(acc.retryJoinWAN, next.retryJoinWAN),
    serfBindAddrLAN: mergeScalar(acc.serfBindAddrLAN, next.serfBindAddrLAN),
    serfBindAddrWAN: mergeScalar(acc.serfBindAddrWAN, next.serfBindAddrWAN),
    serverMode: mergeScalar(acc.serverMode, next.serverMode),
    uiDir: mergeScalar(acc.uiDir, next.uiDir),
    retryJoinAzure: mergeRetryJoinAzure(acc.retryJoinAzure, next.retryJoinAzure),
    retryJoinEC2: mergeRetryJoinEC2(acc.retryJoinEC2, next.retryJoinEC2),
    retryJoinGCE: mergeRetryJoinGCE(acc.retryJoinGCE, next.retryJoinGCE),
  };
}

/**
 * Fold fragments, lowest precedence first, into one fragment.
 * Never fails and never mutates its inputs; validation happens in newConfig().
 */
export function merge(fragments: readonly ConfigFragment[]): ConfigFragment {
  return fragments.reduce(mergeFragment, emptyFragment());
}
