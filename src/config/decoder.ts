import * as yaml from "js-yaml";
import { ZodError } from "zod";
import { DocumentParseError } from "../errors/index.js";
import { emptyFragment, type ConfigFragment } from "./fragment.js";
import { none, some, type Optional } from "./optional.js";
import { DocumentSchema, type Document } from "./schema.js";

export type DocumentFormat = "json" | "yaml";

/**
 * Guess the format of a document: JSON when the first non-blank character
 * opens an object, YAML otherwise.
 */
export function sniffFormat(text: string): DocumentFormat {
  return text.trimStart().startsWith("{") ? "json" : "yaml";
}

function opt<T>(value: T | undefined): Optional<T> {
  return value === undefined ? none() : some(value);
}

function decodeText(text: string, format: DocumentFormat, source: string): unknown {
  try {
    if (format === "json") {
      return JSON.parse(text);
    }
    return yaml.load(text, { filename: source });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DocumentParseError(source, [`invalid ${format.toUpperCase()}: ${message}`], error instanceof Error ? error : undefined);
  }
}

function validate(raw: unknown, source: string): Document {
  // An empty YAML document decodes to undefined (or null for "~")
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new DocumentParseError(source, ["top-level value must be a mapping"]);
  }

  try {
    return DocumentSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map((err) =>
        err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message
      );
      throw new DocumentParseError(source, issues, error);
    }
    throw error;
  }
}

/**
 * Convert a validated document into a fragment. Keys the document does not
 * mention stay absent.
 */
export function documentToFragment(doc: Document): ConfigFragment {
  const base = emptyFragment();
  return {
    advertiseAddrLAN: opt(doc.advertise_addr),
    advertiseAddrWAN: opt(doc.advertise_addr_wan),
    bindAddr: opt(doc.bind_addr),
    bootstrap: opt(doc.bootstrap),
    bootstrapExpect: opt(doc.bootstrap_expect),
    checkUpdateInterval: opt(doc.check_update_interval),
    clientAddr: opt(doc.client_addr),
    dataDir: opt(doc.data_dir),
    datacenter: opt(doc.datacenter),
    devMode: opt(doc.dev_mode),
    disableHostNodeID: opt(doc.disable_host_node_id),
    disableKeyringFile: opt(doc.disable_keyring_file),
    dnsDomain: opt(doc.domain),
    dnsRecursors: doc.recursors ?? [],
    enableScriptChecks: opt(doc.enable_script_checks),
    enableSyslog: opt(doc.enable_syslog),
    enableUI: opt(doc.ui),
    encryptKey: opt(doc.encrypt),
    joinAddrsLAN: doc.start_join ?? [],
    joinAddrsWAN: doc.start_join_wan ?? [],
    logLevel: opt(doc.log_level),
    nodeID: opt(doc.node_id),
    nodeMeta: doc.node_meta ?? {},
    nodeName: opt(doc.node_name),
    nonVotingServer: opt(doc.non_voting_server),
    pidFile: opt(doc.pid_file),
    ports: doc.ports
      ? {
          dns: opt(doc.ports.dns),
          http: opt(doc.ports.http),
          https: opt(doc.ports.https),
          serfLAN: opt(doc.ports.serf_lan),
          serfWAN: opt(doc.ports.serf_wan),
          server: opt(doc.ports.server),
          deprecatedRPC: opt(doc.ports.rpc),
        }
      : base.ports,
    rpcProtocol: opt(doc.protocol),
    raftProtocol: opt(doc.raft_protocol),
    rejoinAfterLeave: opt(doc.rejoin_after_leave),
    retryJoinIntervalLAN: opt(doc.retry_interval),
    retryJoinIntervalWAN: opt(doc.retry_interval_wan),
    retryJoinLAN: doc.retry_join ?? [],
    retryJoinMaxAttemptsLAN: opt(doc.retry_max),
    retryJoinMaxAttemptsWAN: opt(doc.retry_max_wan),
    retryJoinWAN: doc.retry_join_wan ?? [],
    serfBindAddrLAN: opt(doc.serf_lan),
    serfBindAddrWAN: opt(doc.serf_wan),
    serverMode: opt(doc.server),
    uiDir: opt(doc.ui_dir),
    retryJoinAzure: doc.retry_join_azure
      ? {
          tagName: opt(doc.retry_join_azure.tag_name),
          tagValue: opt(doc.retry_join_azure.tag_value),
          subscriptionID: opt(doc.retry_join_azure.subscription_id),
          tenantID: opt(doc.retry_join_azure.tenant_id),
          clientID: opt(doc.retry_join_azure.client_id),
          secretAccessKey: opt(doc.retry_join_azure.secret_access_key),
        }
      : base.retryJoinAzure,
    retryJoinEC2: doc.retry_join_ec2
      ? {
          region: opt(doc.retry_join_ec2.region),
          tagKey: opt(doc.retry_join_ec2.tag_key),
          tagValue: opt(doc.retry_join_ec2.tag_value),
          accessKeyID: opt(doc.retry_join_ec2.access_key_id),
          secretAccessKey: opt(doc.retry_join_ec2.secret_access_key),
        }
      : base.retryJoinEC2,
    retryJoinGCE: doc.retry_join_gce
      ? {
          projectName: opt(doc.retry_join_gce.project_name),
          zonePattern: opt(doc.retry_join_gce.zone_pattern),
          tagValue: opt(doc.retry_join_gce.tag_value),
          credentialsFile: opt(doc.retry_join_gce.credentials_file),
        }
      : base.retryJoinGCE,
  };
}

/**
 * Decode one configuration document in JSON or YAML into a fragment.
 * Without a format the text is sniffed. Throws DocumentParseError on syntax
 * errors, unknown keys and values of the wrong type.
 */
export function parseFile(text: string, format?: DocumentFormat, source = "config document"): ConfigFragment {
  const raw = decodeText(text, format ?? sniffFormat(text), source);
  return documentToFragment(validate(raw, source));
}
