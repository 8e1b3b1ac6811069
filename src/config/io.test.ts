import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError, createConfigIO, parseConfigJson5 } from "./io.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "collector-svc-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeConfig(contents: string): string {
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

describe("createConfigIO", () => {
  it("returns an empty config when the file is missing", () => {
    const io = createConfigIO({ configPath: path.join(dir, "absent.json") });
    expect(io.readConfigFileSnapshot()).toEqual({
      path: path.join(dir, "absent.json"),
      exists: false,
      raw: null,
      config: {},
    });
  });

  it("resolves the path from COLLECTOR_CONFIG_PATH, then the working directory", () => {
    expect(
      createConfigIO({ env: { COLLECTOR_CONFIG_PATH: "/etc/collector/config.json" } }).configPath,
    ).toBe(path.resolve("/etc/collector/config.json"));
    expect(createConfigIO({ env: {}, cwd: () => dir }).configPath).toBe(
      path.join(dir, "config.json"),
    );
  });

  it("reads JSON5 with a leading BOM and keeps worker sections", () => {
    const configPath = writeConfig(
      '\uFEFF{\n  // orchestrator settings\n  service: { name: "Collector2", arguments: ["collector.py"] },\n  database: { server: "sql01" },\n}\n',
    );
    expect(createConfigIO({ configPath }).loadConfig()).toEqual({
      service: { name: "Collector2", arguments: ["collector.py"] },
      database: { server: "sql01" },
    });
  });

  it("throws ConfigError listing each invalid field", () => {
    const configPath = writeConfig(
      JSON.stringify({ service: { name: "bad/name", settle_timeout_ms: -1 } }),
    );
    let caught: unknown;
    try {
      createConfigIO({ configPath }).loadConfig();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe("INVALID_CONFIG");
      expect(caught.issues.map((issue) => issue.path)).toEqual([
        "service.name",
        "service.settle_timeout_ms",
      ]);
    }
  });

  it("keeps unknown keys in the service section", () => {
    const configPath = writeConfig(
      JSON.stringify({ service: { name: "Collector2", restart_delay_ms: 5000 } }),
    );
    expect(createConfigIO({ configPath }).loadConfig()).toEqual({
      service: { name: "Collector2", restart_delay_ms: 5000 },
    });
  });

  it("reports unparseable files as ConfigError", () => {
    const configPath = writeConfig("{ service: ");
    expect(() => createConfigIO({ configPath }).loadConfig()).toThrow(/Invalid config at/);
  });
});

describe("parseConfigJson5", () => {
  it("accepts comments and trailing commas", () => {
    expect(parseConfigJson5("{ a: 1, /* note */ b: [2,], }")).toEqual({
      ok: true,
      parsed: { a: 1, b: [2] },
    });
  });
});
