import { Writable } from "node:stream";

import type { ServiceSettings } from "../config/service.js";
import type { BackendCommandResult, ServiceControlBackend } from "../daemon/backend.js";
import { createStaticConfirmer } from "../daemon/confirmation.js";
import type { ServiceDeps } from "../daemon/service.js";
import type { ServiceRuntime, ServiceState } from "../daemon/service-runtime.js";
import type { SubsystemLogger } from "../logging/subsystem.js";

export type FakeBackendOp =
  | "locate"
  | "status"
  | "install"
  | "remove"
  | "set"
  | "get"
  | "start"
  | "stop";

export type FakeBackendCall = { op: FakeBackendOp; args: string[] };

const MUTATING_OPS: ReadonlySet<FakeBackendOp> = new Set([
  "install",
  "remove",
  "set",
  "start",
  "stop",
]);

const ok = (output = ""): BackendCommandResult => ({ ok: true, code: 0, output });
const missing = (name: string): BackendCommandResult => ({
  ok: false,
  code: 3,
  output: `Can't open service ${name}!`,
});

/**
 * In-process stand-in for the NSSM driver. Keeps one service's state and
 * properties, records every call, and lets tests inject failures by key
 * (`"start"`, `"remove"`, `"set:ObjectName"`, ...).
 */
export class FakeServiceBackend implements ServiceControlBackend {
  readonly label = "fake";
  readonly calls: FakeBackendCall[] = [];
  readonly properties = new Map<string, string[]>();
  readonly failures = new Map<string, BackendCommandResult>();
  state: ServiceState;
  available = true;
  /** When set, `status()` reports this instead of the tracked state. */
  statusOverride: ServiceRuntime | null = null;
  /** Whether `start` leaves the service running. */
  startsRunning = true;

  constructor(init: { state?: ServiceState; properties?: Record<string, string[]> } = {}) {
    this.state = init.state ?? "absent";
    for (const [key, values] of Object.entries(init.properties ?? {})) {
      this.properties.set(key, values);
    }
  }

  failOn(key: string, output = "failed", code = 1): this {
    this.failures.set(key, { ok: false, code, output });
    return this;
  }

  mutationCalls(): FakeBackendCall[] {
    return this.calls.filter((call) => MUTATING_OPS.has(call.op));
  }

  callsFor(op: FakeBackendOp): FakeBackendCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  private record(op: FakeBackendOp, args: string[]): BackendCommandResult | undefined {
    this.calls.push({ op, args });
    return this.failures.get(op === "set" || op === "get" ? `${op}:${args[1] ?? ""}` : op);
  }

  locate = async (): Promise<string | null> => {
    this.calls.push({ op: "locate", args: [] });
    return this.available ? "nssm" : null;
  };

  status = async (name: string): Promise<ServiceRuntime> => {
    this.calls.push({ op: "status", args: [name] });
    if (!this.available) return { state: "unknown", detail: "nssm not found" };
    return this.statusOverride ?? { state: this.state };
  };

  install = async (name: string, executablePath: string, args: string[]) => {
    const failure = this.record("install", [name, executablePath, ...args]);
    if (failure) return failure;
    if (this.state !== "absent") return { ok: false, code: 5, output: "service already exists" };
    this.state = "stopped";
    this.properties.set("Application", [executablePath]);
    this.properties.set("AppParameters", [args.join(" ")]);
    return ok(`Service "${name}" installed successfully!`);
  };

  remove = async (name: string, opts: { confirm: boolean }) => {
    const failure = this.record("remove", opts.confirm ? [name, "confirm"] : [name]);
    if (failure) return failure;
    if (this.state === "absent") return missing(name);
    this.state = "absent";
    this.properties.clear();
    return ok(`Service "${name}" removed successfully!`);
  };

  set = async (name: string, property: string, ...values: string[]) => {
    const failure = this.record("set", [name, property, ...values]);
    if (failure) return failure;
    if (this.state === "absent") return missing(name);
    // The password half of ObjectName is write-only, as with the real service manager.
    this.properties.set(property, property === "ObjectName" ? values.slice(0, 1) : values);
    return ok("Set parameter successfully!");
  };

  get = async (name: string, property: string) => {
    const failure = this.record("get", [name, property]);
    if (failure) return failure;
    if (this.state === "absent") return missing(name);
    const values = this.properties.get(property) ?? [];
    return ok(values.join(property === "AppEnvironmentExtra" ? "\n" : " "));
  };

  start = async (name: string) => {
    const failure = this.record("start", [name]);
    if (failure) return failure;
    if (this.state === "absent") return missing(name);
    if (this.startsRunning) this.state = "running";
    return ok(`${name}: START: The operation completed successfully.`);
  };

  stop = async (name: string) => {
    const failure = this.record("stop", [name]);
    if (failure) return failure;
    if (this.state === "absent") return missing(name);
    this.state = "stopped";
    return ok(`${name}: STOP: The operation completed successfully.`);
  };
}

export function createSilentLogger(subsystem = "test"): SubsystemLogger {
  const noop = () => {};
  return {
    subsystem,
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: (name) => createSilentLogger(`${subsystem}/${name}`),
  };
}

/** A virtual clock: `sleep` advances `now` instead of waiting. */
export function createFakeClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    sleep: async (ms: number) => {
      current += ms;
    },
  };
}

export function createTestServiceDeps(
  backend: ServiceControlBackend,
  overrides: Partial<ServiceDeps> = {},
): ServiceDeps & { output: () => string } {
  const chunks: string[] = [];
  const stdout = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
      callback();
    },
  });
  const clock = createFakeClock();
  return {
    backend,
    confirmer: createStaticConfirmer(true),
    interactive: false,
    processes: { listByImageName: async () => [] },
    readLogTail: async () => [],
    probeNetwork: async () => ({ status: "skipped" }),
    fileExists: async () => true,
    ensureDir: async () => {},
    settle: { sleep: clock.sleep, now: clock.now },
    logger: createSilentLogger(),
    stdout,
    ...overrides,
    output: () => chunks.join(""),
  };
}

export function createTestSettings(overrides: Partial<ServiceSettings> = {}): ServiceSettings {
  return {
    name: "DataCollector",
    displayName: "Data Collector",
    description: "Collects production data",
    executable: "C:\\Python311\\python.exe",
    arguments: ["collector.py"],
    workingDir: "C:\\collector",
    settleTimeoutMs: 5000,
    errorLogLines: 20,
    ...overrides,
  };
}
