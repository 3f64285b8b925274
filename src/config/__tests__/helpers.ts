import { emptyDeprecatedFlags, type Flags } from "../cli.js";
import { emptyFragment, emptyPorts, type ConfigFragment, type Ports } from "../fragment.js";
import { newConfig, type RuntimeConfig } from "../runtime.js";

export function fragment(fields: Partial<ConfigFragment> = {}): ConfigFragment {
  return { ...emptyFragment(), ...fields };
}

export function ports(fields: Partial<Ports>): Ports {
  return { ...emptyPorts(), ...fields };
}

export function flags(fields: Partial<Flags> = {}): Flags {
  return { file: emptyFragment(), configFiles: [], deprecated: emptyDeprecatedFlags(), ...fields };
}

/**
 * The runtime config of a fragment that sets nothing, with overrides.
 */
export function runtime(fields: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return { ...newConfig(emptyFragment()), ...fields };
}
