import { z } from "zod";
import { parseDuration } from "./duration.js";

/**
 * Schema of one configuration document, shared by the JSON and YAML formats.
 * Every key is optional; a document mentions only what it sets.
 */

const durationString = z.string().transform((text, ctx) => {
  const ms = parseDuration(text);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${text}"` });
    return z.NEVER;
  }
  return ms;
});

const port = z.number().int();

const metaKey = z.string().refine((key) => key !== "__proto__", { message: 'reserved key "__proto__"' });

export const PortsSchema = z
  .object({
    dns: port.optional(),
    http: port.optional(),
    https: port.optional(),
    serf_lan: port.optional(),
    serf_wan: port.optional(),
    server: port.optional(),
    // deprecated
    rpc: port.optional(),
  })
  .strict();

export const RetryJoinAzureSchema = z
  .object({
    tag_name: z.string().optional(),
    tag_value: z.string().optional(),
    subscription_id: z.string().optional(),
    tenant_id: z.string().optional(),
    client_id: z.string().optional(),
    secret_access_key: z.string().optional(),
  })
  .strict();

export const RetryJoinEC2Schema = z
  .object({
    region: z.string().optional(),
    tag_key: z.string().optional(),
    tag_value: z.string().optional(),
    access_key_id: z.string().optional(),
    secret_access_key: z.string().optional(),
  })
  .strict();

export const RetryJoinGCESchema = z
  .object({
    project_name: z.string().optional(),
    zone_pattern: z.string().optional(),
    tag_value: z.string().optional(),
    credentials_file: z.string().optional(),
  })
  .strict();

export const DocumentSchema = z
  .object({
    // Addresses
    advertise_addr: z.string().optional(),
    advertise_addr_wan: z.string().optional(),
    bind_addr: z.string().optional(),
    client_addr: z.string().optional(),
    serf_lan: z.string().optional(),
    serf_wan: z.string().optional(),

    // Cluster membership
    bootstrap: z.boolean().optional(),
    bootstrap_expect: z.number().int().optional(),
    server: z.boolean().optional(),
    non_voting_server: z.boolean().optional(),
    start_join: z.array(z.string()).optional(),
    start_join_wan: z.array(z.string()).optional(),
    retry_join: z.array(z.string()).optional(),
    retry_join_wan: z.array(z.string()).optional(),
    retry_interval: durationString.optional(),
    retry_interval_wan: durationString.optional(),
    retry_max: z.number().int().optional(),
    retry_max_wan: z.number().int().optional(),
    rejoin_after_leave: z.boolean().optional(),
    protocol: z.number().int().optional(),
    raft_protocol: z.number().int().optional(),

    // Node identity
    datacenter: z.string().optional(),
    node_name: z.string().optional(),
    node_id: z.string().optional(),
    node_meta: z.record(metaKey, z.string()).optional(),
    disable_host_node_id: z.boolean().optional(),

    // DNS
    domain: z.string().optional(),
    recursors: z.array(z.string()).optional(),

    // Agent
    check_update_interval: z.string().optional(),
    data_dir: z.string().optional(),
    dev_mode: z.boolean().optional(),
    disable_keyring_file: z.boolean().optional(),
    enable_script_checks: z.boolean().optional(),
    enable_syslog: z.boolean().optional(),
    encrypt: z.string().optional(),
    log_level: z.string().optional(),
    pid_file: z.string().optional(),
    ui: z.boolean().optional(),
    ui_dir: z.string().optional(),

    ports: PortsSchema.optional(),

    // Cloud auto-join (deprecated)
    retry_join_azure: RetryJoinAzureSchema.optional(),
    retry_join_ec2: RetryJoinEC2Schema.optional(),
    retry_join_gce: RetryJoinGCESchema.optional(),
  })
  .strict();

export type Document = z.infer<typeof DocumentSchema>;
