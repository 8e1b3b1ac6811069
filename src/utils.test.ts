import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { isUncPath, isWindowsAbsolutePath, pathExists, resolveUserPath } from "./utils.js";

describe("resolveUserPath", () => {
  it("keeps Windows-absolute and UNC paths as written", () => {
    expect(resolveUserPath(" C:\\collector\\collector.py ", "/srv")).toBe(
      "C:\\collector\\collector.py",
    );
    expect(resolveUserPath("\\\\fileserver\\tc2", "/srv")).toBe("\\\\fileserver\\tc2");
  });

  it("expands ~ to the home directory", () => {
    expect(resolveUserPath("~/collector")).toBe(path.resolve(os.homedir(), "collector"));
  });

  it("resolves relative paths against the working directory", () => {
    expect(resolveUserPath("logs", "/srv/collector")).toBe(path.resolve("/srv/collector", "logs"));
  });
});

describe("path predicates", () => {
  it("recognises drive and UNC paths", () => {
    expect(isWindowsAbsolutePath("D:/data")).toBe(true);
    expect(isWindowsAbsolutePath("data")).toBe(false);
    expect(isUncPath("  \\\\fileserver\\tc2")).toBe(true);
    expect(isUncPath("C:\\tc2")).toBe(false);
  });
});

describe("pathExists", () => {
  it("reports missing files as false", async () => {
    expect(await pathExists(path.join(os.tmpdir(), "collector-svc-does-not-exist"))).toBe(false);
    expect(await pathExists(os.tmpdir())).toBe(true);
  });
});
