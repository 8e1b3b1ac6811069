import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { enableConsoleCapture } from "./console.js";
import { resetLogger, setLoggerOverride } from "./logger.js";
import { loggingState } from "./state.js";

type ConsoleSnapshot = Pick<typeof console, "log" | "info" | "warn" | "error" | "debug">;

let snapshot: ConsoleSnapshot;

function resetCaptureState() {
  loggingState.consolePatched = false;
  loggingState.rawConsole = null;
  resetLogger();
}

beforeEach(() => {
  snapshot = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };
  resetCaptureState();
});

afterEach(() => {
  Object.assign(console, snapshot);
  resetCaptureState();
  setLoggerOverride(null);
  vi.restoreAllMocks();
});

describe("enableConsoleCapture", () => {
  it("keeps terminal output unchanged and mirrors it to the file log", () => {
    const file = tempLogPath();
    setLoggerOverride({ level: "info", file });
    const log = vi.fn();
    console.log = log;
    enableConsoleCapture();

    console.log("Installed service: DataCollector");

    expect(log).toHaveBeenCalledWith("Installed service: DataCollector");
    expect(fs.readFileSync(file, "utf8")).toContain("Installed service: DataCollector");
  });

  it("masks passwords before they reach the file log", () => {
    const file = tempLogPath();
    setLoggerOverride({ level: "info", file });
    console.log = vi.fn();
    enableConsoleCapture();

    console.log("net use \\\\fileserver\\tc2 /user:.\\svc_collector test-secret");

    const written = fs.readFileSync(file, "utf8");
    expect(written).not.toContain("test-secret");
    expect(written).toContain("/user:.\\\\svc_collector ***");
  });

  it("swallows EIO from original console writes", () => {
    setLoggerOverride({ level: "info", file: tempLogPath() });
    console.log = () => {
      throw eioError();
    };
    enableConsoleCapture();
    expect(() => console.log("hello")).not.toThrow();
  });
});

function tempLogPath() {
  return path.join(os.tmpdir(), `collector-svc-log-${crypto.randomUUID()}.log`);
}

function eioError() {
  return Object.assign(new Error("EIO"), { code: "EIO" });
}
