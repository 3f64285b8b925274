import { describe, expect, it } from "vitest";
import { FlagParseError, HelpRequestedError } from "../../errors/index.js";
import { deprecatedFlagNames, flagsFragment, parseFlags, usage } from "../cli.js";
import { FlagSet } from "../flags.js";
import { some } from "../optional.js";
import { flags, fragment, ports } from "./helpers.js";

describe("parseFlags", () => {
  const cases: Array<{ args: string[]; want: ReturnType<typeof flags> }> = [
    { args: [], want: flags() },
    { args: ["-bind", "a"], want: flags({ file: fragment({ bindAddr: some("a") }) }) },
    { args: ["-bootstrap"], want: flags({ file: fragment({ bootstrap: some(true) }) }) },
    { args: ["-bootstrap=true"], want: flags({ file: fragment({ bootstrap: some(true) }) }) },
    { args: ["-bootstrap=false"], want: flags({ file: fragment({ bootstrap: some(false) }) }) },
    { args: ["-bootstrap", "true"], want: flags({ file: fragment({ bootstrap: some(true) }) }) },
    { args: ["-bootstrap", "false"], want: flags({ file: fragment({ bootstrap: some(false) }) }) },
    {
      args: ["-config-file", "a", "-config-dir", "b", "-config-file", "c", "-config-dir", "d"],
      want: flags({ configFiles: ["a", "b", "c", "d"] }),
    },
    { args: ["-datacenter", "a"], want: flags({ file: fragment({ datacenter: some("a") }) }) },
    { args: ["-dns-port", "1"], want: flags({ file: fragment({ ports: ports({ dns: some(1) }) }) }) },
    { args: ["-join", "a", "-join", "b"], want: flags({ file: fragment({ joinAddrsLAN: ["a", "b"] }) }) },
    {
      args: ["-node-meta", "a:b", "-node-meta", "c:d"],
      want: flags({ file: fragment({ nodeMeta: { a: "b", c: "d" } }) }),
    },
  ];

  for (const { args, want } of cases) {
    it(`parses [${args.join(" ")}]`, () => {
      expect(parseFlags(args)).toEqual(want);
    });
  }

  describe("boolean forms", () => {
    it("defaults a bare flag to true and leaves a non-boolean next token alone", () => {
      const got = parseFlags(["-server", "-datacenter", "dc2"]);
      expect(got.file.serverMode).toEqual(some(true));
      expect(got.file.datacenter).toEqual(some("dc2"));
    });

    it("accepts the other boolean literals as a following token", () => {
      expect(parseFlags(["-ui", "0"]).file.enableUI).toEqual(some(false));
      expect(parseFlags(["-ui", "T"]).file.enableUI).toEqual(some(true));
      expect(parseFlags(["-ui", "FALSE"]).file.enableUI).toEqual(some(false));
    });

    it("rejects an invalid inline boolean", () => {
      expect(() => parseFlags(["-bootstrap=yes"])).toThrow('invalid value "yes" for flag -bootstrap: invalid boolean');
    });

    it("fails on a non-boolean trailing token", () => {
      expect(() => parseFlags(["-bootstrap", "yes"])).toThrow("unexpected argument: yes");
    });
  });

  describe("scalar flags", () => {
    it("keeps the last occurrence", () => {
      expect(parseFlags(["-node", "a", "-node", "b"]).file.nodeName).toEqual(some("b"));
    });

    it("accepts the -name=value form and an empty value", () => {
      const got = parseFlags(["-log-level=DEBUG", "-node="]);
      expect(got.file.logLevel).toEqual(some("DEBUG"));
      expect(got.file.nodeName).toEqual(some(""));
    });

    it("accepts -- as a prefix", () => {
      expect(parseFlags(["--data-dir", "/var/lib/agent"]).file.dataDir).toEqual(some("/var/lib/agent"));
    });

    it("parses integers", () => {
      const got = parseFlags(["-bootstrap-expect", "3", "-retry-max", "-1", "-http-port=8501"]);
      expect(got.file.bootstrapExpect).toEqual(some(3));
      expect(got.file.retryJoinMaxAttemptsLAN).toEqual(some(-1));
      expect(got.file.ports).toEqual(ports({ http: some(8501) }));
    });

    it("parses durations into milliseconds", () => {
      const got = parseFlags(["-retry-interval", "15s", "-retry-interval-wan", "1m30s"]);
      expect(got.file.retryJoinIntervalLAN).toEqual(some(15_000));
      expect(got.file.retryJoinIntervalWAN).toEqual(some(90_000));
    });

    it("keeps a string value that starts with a dash", () => {
      expect(parseFlags(["-encrypt", "-abc"]).file.encryptKey).toEqual(some("-abc"));
    });
  });

  describe("list and map flags", () => {
    it("appends every list occurrence", () => {
      const got = parseFlags(["-recursor", "1.1.1.1", "-retry-join", "x", "-recursor", "8.8.8.8"]);
      expect(got.file.dnsRecursors).toEqual(["1.1.1.1", "8.8.8.8"]);
      expect(got.file.retryJoinLAN).toEqual(["x"]);
    });

    it("splits map entries on the first colon and overwrites repeated keys", () => {
      const got = parseFlags(["-node-meta", "url:http://x:1", "-node-meta", "a:1", "-node-meta", "a:2"]);
      expect(got.file.nodeMeta).toEqual({ url: "http://x:1", a: "2" });
    });

    it("rejects the reserved map key __proto__", () => {
      expect(() => parseFlags(["-node-meta", "__proto__:x"])).toThrow(
        'invalid value "__proto__:x" for flag -node-meta: reserved key "__proto__"'
      );
    });

    it("rejects a map entry without a colon", () => {
      expect(() => parseFlags(["-node-meta", "ab"])).toThrow(
        "invalid value \"ab\" for flag -node-meta: missing ':' between key and value"
      );
    });
  });

  describe("deprecated flags", () => {
    it("parses deprecated flags into their own record", () => {
      const got = parseFlags(["-dc", "east", "-atlas-join", "-atlas-token", "test-token"]);
      expect(got.deprecated.datacenter).toEqual(some("east"));
      expect(got.deprecated.atlasJoin).toEqual(some(true));
      expect(got.deprecated.atlasToken).toEqual(some("test-token"));
      expect(got.file).toEqual(fragment());
      expect(deprecatedFlagNames(got)).toEqual(["atlas-join", "atlas-token", "dc"]);
    });

    it("binds the cloud retry-join flags into their groups", () => {
      const got = parseFlags(["-retry-join-ec2-region", "us-west-2", "-retry-join-gce-project-name", "proj"]);
      expect(got.file.retryJoinEC2.region).toEqual(some("us-west-2"));
      expect(got.file.retryJoinGCE.projectName).toEqual(some("proj"));
    });
  });

  describe("errors", () => {
    it("rejects unknown flags", () => {
      expect(() => parseFlags(["-nope"])).toThrow("flag provided but not defined: -nope");
    });

    it("rejects a missing value", () => {
      expect(() => parseFlags(["-bind"])).toThrow("flag needs an argument: -bind");
    });

    it("rejects malformed integers and durations", () => {
      expect(() => parseFlags(["-dns-port", "53x"])).toThrow('invalid value "53x" for flag -dns-port: invalid integer');
      expect(() => parseFlags(["-retry-interval", "5"])).toThrow(
        'invalid value "5" for flag -retry-interval: invalid duration'
      );
    });

    it("rejects positional arguments", () => {
      expect(() => parseFlags(["-bind", "a", "extra"])).toThrow("unexpected argument: extra");
      expect(() => parseFlags(["--", "extra"])).toThrow("unexpected argument: extra");
    });

    it("accepts a trailing --", () => {
      expect(parseFlags(["-bind", "a", "--"]).file.bindAddr).toEqual(some("a"));
    });

    it("throws FlagParseError with the flag name", () => {
      try {
        parseFlags(["-dns-port", "x"]);
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof FlagParseError)) {
          throw error;
        }
        expect(error.details).toEqual({ flag: "dns-port" });
        expect(error.exitCode).toBe(2);
      }
    });

    it("throws HelpRequestedError for -help", () => {
      expect(() => parseFlags(["-help"])).toThrow(HelpRequestedError);
      expect(() => parseFlags(["--h"])).toThrow(HelpRequestedError);
    });
  });
});

describe("flagsFragment", () => {
  it("uses -dc when -datacenter is absent", () => {
    expect(flagsFragment(parseFlags(["-dc", "east"])).datacenter).toEqual(some("east"));
  });

  it("prefers -datacenter over -dc", () => {
    expect(flagsFragment(parseFlags(["-dc", "east", "-datacenter", "west"])).datacenter).toEqual(some("west"));
  });

  it("returns the parsed fragment otherwise", () => {
    const parsed = parseFlags(["-bind", "a"]);
    expect(flagsFragment(parsed)).toBe(parsed.file);
  });
});

describe("FlagSet.sorted", () => {
  it("orders flags by byte value of their names", () => {
    const fs = new FlagSet("test");
    const noop = (): void => undefined;
    fs.string("a", "", noop);
    fs.string("B", "", noop);
    fs.string("a-b", "", noop);
    fs.string("ab", "", noop);
    expect(fs.sorted().map((binding) => binding.name)).toEqual(["B", "a", "a-b", "ab"]);
  });
});

describe("usage", () => {
  it("lists flags by name with placeholders", () => {
    const lines = usage().split("\n");
    expect(lines[0]).toBe("Usage: agent-config [options]");
    expect(lines).toContain("  -bootstrap");
    expect(lines).toContain("  -dns-port <int>");
    expect(lines).toContain("  -node-meta <key:value>");
    expect(lines).toContain("  -retry-interval <duration>");
    expect(lines).toContain("  -join <string>");
    expect(lines).toContain("  -config-file <string>");
    expect(lines.indexOf("  -advertise <string>")).toBeLessThan(lines.indexOf("  -bind <string>"));
  });
});
