import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigSourceError, DocumentParseError } from "../../errors/index.js";
import { emptyFragment } from "../fragment.js";
import {
  decodeSources,
  formatConfigForDisplay,
  formatFromPath,
  loadConfig,
  readConfigSources,
} from "../loader.js";
import { some } from "../optional.js";
import { fragment, runtime } from "./helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "agent-config-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function write(name: string, text: string): Promise<string> {
  const file = path.join(dir, name);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, text);
  return file;
}

describe("formatFromPath", () => {
  it("maps extensions to formats", () => {
    expect(formatFromPath("a.json")).toBe("json");
    expect(formatFromPath("a.YAML")).toBe("yaml");
    expect(formatFromPath("a.yml")).toBe("yaml");
    expect(formatFromPath("a.conf")).toBeUndefined();
  });
});

describe("readConfigSources", () => {
  it("reads a directory in file-name order and skips other files", async () => {
    await write("conf.d/b.yaml", "node_name: b");
    await write("conf.d/a.json", '{"node_name":"a"}');
    await write("conf.d/notes.txt", "ignored");
    await write("conf.d/c.yml", "node_name: c");

    const sources = await readConfigSources([path.join(dir, "conf.d")]);
    expect(sources.map((s) => path.basename(s.path))).toEqual(["a.json", "b.yaml", "c.yml"]);
    expect(sources.map((s) => s.format)).toEqual(["json", "yaml", "yaml"]);
  });

  it("follows symlinks to regular files", async () => {
    const target = await write("data/agent.json", '{"node_name":"linked"}');
    await fs.mkdir(path.join(dir, "conf"));
    await fs.symlink(target, path.join(dir, "conf", "agent.json"));

    const sources = await readConfigSources([path.join(dir, "conf")]);
    expect(sources).toEqual([
      { path: path.join(dir, "conf", "agent.json"), format: "json", text: '{"node_name":"linked"}' },
    ]);
  });

  it("skips symlinks to directories", async () => {
    await fs.mkdir(path.join(dir, "conf"));
    await fs.mkdir(path.join(dir, "nested.json"));
    await fs.symlink(path.join(dir, "nested.json"), path.join(dir, "conf", "nested.json"));

    expect(await readConfigSources([path.join(dir, "conf")])).toEqual([]);
  });

  it("fails on a dangling symlink", async () => {
    await fs.mkdir(path.join(dir, "conf"));
    const link = path.join(dir, "conf", "gone.json");
    await fs.symlink(path.join(dir, "missing.json"), link);

    await expect(readConfigSources([path.join(dir, "conf")])).rejects.toThrow(
      new ConfigSourceError(link, "no such file or directory")
    );
  });

  it("matches dotfiles and upper-case extensions", async () => {
    await write("conf.d/A.JSON", "{}");
    await write("conf.d/.hidden.yaml", "{}");
    await write("conf.d/b.yml", "{}");

    const sources = await readConfigSources([path.join(dir, "conf.d")]);
    expect(sources.map((s) => path.basename(s.path))).toEqual([".hidden.yaml", "A.JSON", "b.yml"]);
    expect(sources.map((s) => s.format)).toEqual(["yaml", "json", "yaml"]);
  });

  it("keeps command-line order across paths", async () => {
    const second = await write("z.json", "{}");
    const first = await write("a.json", "{}");

    const sources = await readConfigSources([second, first]);
    expect(sources.map((s) => s.path)).toEqual([second, first]);
  });

  it("reads a file without a known extension", async () => {
    const file = await write("agent.conf", "server: true");
    const [source] = await readConfigSources([file]);
    expect(source).toEqual({ path: file, format: undefined, text: "server: true" });
  });

  it("fails on a missing path", async () => {
    const missing = path.join(dir, "missing.json");
    await expect(readConfigSources([missing])).rejects.toThrow(
      new ConfigSourceError(missing, "no such file or directory")
    );
  });
});

describe("decodeSources", () => {
  it("decodes each source in order", () => {
    const fragments = decodeSources([
      { path: "a.json", format: "json", text: '{"node_name":"a"}' },
      { path: "b.conf", text: "datacenter: b" },
    ]);
    expect(fragments).toEqual([fragment({ nodeName: some("a") }), fragment({ datacenter: some("b") })]);
  });

  it("names the failing source", () => {
    try {
      decodeSources([{ path: "/etc/agent/bad.json", format: "json", text: '{"bogus":true}' }]);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof DocumentParseError)) {
        throw error;
      }
      expect(error.source).toBe("/etc/agent/bad.json");
    }
  });
});

describe("loadConfig", () => {
  it("applies documents in order and flags last", async () => {
    const a = await write("a.json", '{"datacenter":"a","node_name":"n1","start_join":["x"]}');
    const b = await write("b.yaml", "datacenter: b\nstart_join:\n  - y\n");

    const { config, sources } = await loadConfig({
      args: ["-config-file", a, "-config-file", b, "-datacenter", "flag", "-join", "z"],
    });

    expect(sources.map((s) => s.path)).toEqual([a, b]);
    expect(config.datacenter).toBe("flag");
    expect(config.nodeName).toBe("n1");
    expect(config.joinAddrsLAN).toEqual(["x", "y", "z"]);
    expect(config.dnsDomain).toBe("consul.");
  });

  it("merges over the given defaults", async () => {
    const { config } = await loadConfig({ args: ["-bind", "1.2.3.4"], defaults: emptyFragment() });
    expect(config).toEqual(runtime({ bindAddrs: ["1.2.3.4"] }));
  });

  it("uses -dc when -datacenter is absent", async () => {
    const { config, flags } = await loadConfig({ args: ["-dc", "old"] });
    expect(config.datacenter).toBe("old");
    expect(flags.deprecated.datacenter).toEqual(some("old"));
  });

  it("propagates flag errors before reading files", async () => {
    await expect(loadConfig({ args: ["-config-file", path.join(dir, "missing.json"), "-nope"] })).rejects.toThrow(
      "flag provided but not defined: -nope"
    );
  });
});

describe("formatConfigForDisplay", () => {
  it("hides secrets", () => {
    const config = runtime({
      encryptKey: "test-secret",
      retryJoinEC2: { ...runtime().retryJoinEC2, secretAccessKey: "test-secret" },
    });
    const shown = JSON.parse(formatConfigForDisplay(config));
    expect(shown.encryptKey).toBe("***REDACTED***");
    expect(shown.retryJoinEC2.secretAccessKey).toBe("***REDACTED***");
    expect(shown.retryJoinAzure.secretAccessKey).toBe("");
  });
});
