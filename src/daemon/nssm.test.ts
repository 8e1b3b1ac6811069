import { describe, expect, it, vi } from "vitest";

import type { CommandOptions, SpawnResult } from "../process/exec.js";
import { createSilentLogger } from "../test-utils/fake-service-backend.js";
import {
  createNssmBackend,
  decodeNssmOutput,
  isServiceMissingOutput,
  parseNssmStatus,
} from "./nssm.js";

const result = (stdout: string, code = 0, stderr = ""): SpawnResult => ({
  stdout,
  stderr,
  code,
  signal: null,
  killed: false,
});

function enoent(): Error {
  return Object.assign(new Error("spawn nssm ENOENT"), { code: "ENOENT" });
}

describe("decodeNssmOutput", () => {
  it("decodes UTF-16LE with a BOM", () => {
    const buf = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from("SERVICE_RUNNING\r\n", "utf16le")]);
    expect(decodeNssmOutput(buf)).toBe("SERVICE_RUNNING\r\n");
  });

  it("detects UTF-16LE without a BOM", () => {
    expect(decodeNssmOutput(Buffer.from("SERVICE_STOPPED", "utf16le"))).toBe("SERVICE_STOPPED");
  });

  it("falls back to utf8", () => {
    expect(decodeNssmOutput(Buffer.from("SERVICE_STOPPED", "utf8"))).toBe("SERVICE_STOPPED");
  });
});

describe("parseNssmStatus", () => {
  it("maps settled states", () => {
    expect(parseNssmStatus("SERVICE_RUNNING\r\n")).toEqual({ state: "running", raw: "SERVICE_RUNNING" });
    expect(parseNssmStatus("SERVICE_STOPPED")).toEqual({ state: "stopped", raw: "SERVICE_STOPPED" });
  });

  it("treats transitions as running and pending", () => {
    expect(parseNssmStatus("SERVICE_STOP_PENDING")).toEqual({
      state: "running",
      pending: true,
      raw: "SERVICE_STOP_PENDING",
    });
  });

  it("reports unrecognised output as unknown", () => {
    expect(parseNssmStatus("SERVICE_WEIRD")).toEqual({ state: "unknown", raw: "SERVICE_WEIRD" });
    expect(parseNssmStatus("garbage")).toEqual({ state: "unknown", detail: "garbage" });
  });
});

describe("isServiceMissingOutput", () => {
  it("recognises the missing-service reply", () => {
    expect(isServiceMissingOutput("Can't open service!\r\nOpenService(): The specified service does not exist as an installed service.")).toBe(true);
    expect(isServiceMissingOutput("Access is denied.")).toBe(false);
  });
});

describe("createNssmBackend", () => {
  it("uses the configured binary and decoder", async () => {
    const exec = vi.fn(async (_argv: string[], _opts: CommandOptions) => result("SERVICE_RUNNING"));
    const backend = createNssmBackend({
      nssmPath: "C:\\tools\\nssm.exe",
      exec,
      logger: createSilentLogger(),
    });

    await expect(backend.status("DataCollector")).resolves.toEqual({
      state: "running",
      raw: "SERVICE_RUNNING",
    });
    expect(exec).toHaveBeenCalledWith(
      ["C:\\tools\\nssm.exe", "status", "DataCollector"],
      expect.objectContaining({ decode: decodeNssmOutput }),
    );
  });

  it("reports absent when the service cannot be opened", async () => {
    const exec = vi.fn(async () => result("", 3, "Can't open service!"));
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });
    await expect(backend.status("DataCollector")).resolves.toEqual({ state: "absent" });
  });

  it("treats a missing binary as not locatable", async () => {
    const exec = vi.fn(async () => {
      throw enoent();
    });
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });
    await expect(backend.locate()).resolves.toBeNull();
    await expect(backend.status("DataCollector")).resolves.toEqual({
      state: "unknown",
      detail: 'nssm not found at "nssm"',
    });
  });

  it("locates nssm even though the usage banner exits non-zero", async () => {
    const exec = vi.fn(async () => result("NSSM: The non-sucking service manager", 1));
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });
    await expect(backend.locate()).resolves.toBe("nssm");
  });

  it("rethrows spawn errors other than ENOENT", async () => {
    const exec = vi.fn(async () => {
      throw Object.assign(new Error("spawn EACCES"), { code: "EACCES" });
    });
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });
    await expect(backend.start("DataCollector")).rejects.toThrow("spawn EACCES");
  });

  it("builds remove, set and get command lines", async () => {
    const exec = vi.fn(async (_argv: string[], _opts: CommandOptions) => result("ok"));
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });

    await backend.remove("DataCollector", { confirm: true });
    await backend.set("DataCollector", "AppExit", "Default", "Restart");
    const got = await backend.get("DataCollector", "Application");

    expect(exec.mock.calls.map(([argv]) => argv)).toEqual([
      ["nssm", "remove", "DataCollector", "confirm"],
      ["nssm", "set", "DataCollector", "AppExit", "Default", "Restart"],
      ["nssm", "get", "DataCollector", "Application"],
    ]);
    expect(got).toEqual({ ok: true, code: 0, output: "ok" });
  });

  it("combines stdout and stderr on failure", async () => {
    const exec = vi.fn(async () => result("partial", 5, "Access is denied."));
    const backend = createNssmBackend({ exec, logger: createSilentLogger() });
    await expect(backend.stop("DataCollector")).resolves.toEqual({
      ok: false,
      code: 5,
      output: "partial\nAccess is denied.",
    });
  });
});
