import { parseDuration } from "./duration.js";
import { FlagParseError, HelpRequestedError } from "../errors/index.js";

/**
 * One command-line flag bound to a location. The variant decides how an
 * occurrence's text is parsed and how repeated occurrences accumulate:
 * scalars replace, lists append and maps insert by key.
 */
export type FlagBinding =
  | { kind: "bool"; name: string; help: string; set: (value: boolean) => void }
  | { kind: "int"; name: string; help: string; set: (value: number) => void }
  | { kind: "duration"; name: string; help: string; set: (ms: number) => void }
  | { kind: "string"; name: string; help: string; set: (value: string) => void }
  | { kind: "list"; name: string; help: string; target: string[] }
  | { kind: "map"; name: string; help: string; target: Record<string, string> };

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/**
 * Parse a boolean literal. Returns undefined when the text is not one.
 */
export function parseBool(text: string): boolean | undefined {
  if (TRUE_LITERALS.has(text)) {
    return true;
  }
  if (FALSE_LITERALS.has(text)) {
    return false;
  }
  return undefined;
}

const INT_PATTERN = /^[-+]?\d+$/;

function parseInteger(text: string): number | undefined {
  if (!INT_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Registry of flag bindings plus the argument parser that drives them.
 *
 * Flags are written `-name value`, `-name=value`, or `-name` alone for
 * booleans. A leading `--` is accepted in place of `-`. Parsing stops at a
 * bare `--`; positional arguments are rejected.
 */
export class FlagSet {
  private readonly bindings = new Map<string, FlagBinding>();

  constructor(public readonly name: string) {}

  add(binding: FlagBinding): void {
    if (this.bindings.has(binding.name)) {
      throw new Error(`flag redefined: ${binding.name}`);
    }
    this.bindings.set(binding.name, binding);
  }

  bool(name: string, help: string, set: (value: boolean) => void): void {
    this.add({ kind: "bool", name, help, set });
  }

  int(name: string, help: string, set: (value: number) => void): void {
    this.add({ kind: "int", name, help, set });
  }

  duration(name: string, help: string, set: (ms: number) => void): void {
    this.add({ kind: "duration", name, help, set });
  }

  string(name: string, help: string, set: (value: string) => void): void {
    this.add({ kind: "string", name, help, set });
  }

  list(name: string, help: string, target: string[]): void {
    this.add({ kind: "list", name, help, target });
  }

  map(name: string, help: string, target: Record<string, string>): void {
    this.add({ kind: "map", name, help, target });
  }

  /**
   * All bindings ordered by flag name.
   */
  sorted(): FlagBinding[] {
    return [...this.bindings.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Parse the arguments, applying each occurrence to its binding in order.
   */
  parse(args: readonly string[]): void {
    let i = 0;
    while (i < args.length) {
      const arg = args[i];
      i++;
      if (arg === undefined) {
        continue;
      }

      if (arg === "--") {
        const rest = args.slice(i);
        if (rest.length > 0) {
          throw new FlagParseError(`unexpected argument: ${rest[0]}`);
        }
        return;
      }

      if (arg.length < 2 || !arg.startsWith("-")) {
        throw new FlagParseError(`unexpected argument: ${arg}`);
      }

      const body = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
      if (body === "" || body.startsWith("-") || body.startsWith("=")) {
        throw new FlagParseError(`bad flag syntax: ${arg}`);
      }

      const eq = body.indexOf("=");
      const name = eq >= 0 ? body.slice(0, eq) : body;
      const inline = eq >= 0 ? body.slice(eq + 1) : undefined;

      const binding = this.bindings.get(name);
      if (!binding) {
        if (name === "help" || name === "h") {
          throw new HelpRequestedError();
        }
        throw new FlagParseError(`flag provided but not defined: -${name}`, name);
      }

      if (binding.kind === "bool") {
        if (inline !== undefined) {
          const value = parseBool(inline);
          if (value === undefined) {
            throw invalidValue(inline, name, "invalid boolean");
          }
          binding.set(value);
          continue;
        }
        // "-x true" / "-x false": take the next token only if it is a boolean literal
        const next = args[i];
        const value = next !== undefined ? parseBool(next) : undefined;
        if (value !== undefined) {
          i++;
          binding.set(value);
        } else {
          binding.set(true);
        }
        continue;
      }

      let value = inline;
      if (value === undefined) {
        value = args[i];
        if (value === undefined) {
          throw new FlagParseError(`flag needs an argument: -${name}`, name);
        }
        i++;
      }

      applyValue(binding, value);
    }
  }
}

function invalidValue(value: string, name: string, reason: string): FlagParseError {
  return new FlagParseError(`invalid value "${value}" for flag -${name}: ${reason}`, name);
}

function applyValue(binding: Exclude<FlagBinding, { kind: "bool" }>, value: string): void {
  switch (binding.kind) {
    case "int": {
      const n = parseInteger(value);
      if (n === undefined) {
        throw invalidValue(value, binding.name, "invalid integer");
      }
      binding.set(n);
      return;
    }
    case "duration": {
      const ms = parseDuration(value);
      if (ms === undefined) {
        throw invalidValue(value, binding.name, "invalid duration");
      }
      binding.set(ms);
      return;
    }
    case "string":
      binding.set(value);
      return;
    case "list":
      binding.target.push(value);
      return;
    case "map": {
      const sep = value.indexOf(":");
      if (sep < 0) {
        throw invalidValue(value, binding.name, "missing ':' between key and value");
      }
      const key = value.slice(0, sep);
      if (key === "__proto__") {
        throw invalidValue(value, binding.name, 'reserved key "__proto__"');
      }
      binding.target[key] = value.slice(sep + 1);
      return;
    }
  }
}
