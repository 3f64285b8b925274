import { emptyFragment, type ConfigFragment } from "./fragment.js";
import { some } from "./optional.js";

/**
 * Compiled-in defaults, the lowest-precedence layer.
 * Returns a fresh fragment on every call; callers place it first in the
 * sequence handed to merge().
 */
export function defaultFragment(): ConfigFragment {
  const base = emptyFragment();
  return {
    ...base,
    bindAddr: some("0.0.0.0"),
    checkUpdateInterval: some("5m"),
    clientAddr: some("127.0.0.1"),
    datacenter: some("dc1"),
    dnsDomain: some("consul."),
    logLevel: some("INFO"),
    rpcProtocol: some(2),
    raftProtocol: some(3),
    retryJoinIntervalLAN: some(30_000),
    retryJoinIntervalWAN: some(30_000),
    ports: {
      ...base.ports,
      dns: some(8600),
      http: some(8500),
      serfLAN: some(8301),
      serfWAN: some(8302),
      server: some(8300),
    },
  };
}
