import { describe, expect, it, vi } from "vitest";

import type { CollectorConfig } from "../config/types.js";
import type { SubsystemLogger } from "../logging/subsystem.js";
import {
  createTestServiceDeps,
  createTestSettings,
  FakeServiceBackend,
} from "../test-utils/fake-service-backend.js";
import type { Prompter } from "../wizard/prompts.js";
import { createStaticConfirmer } from "./confirmation.js";
import { configureIdentity } from "./identity.js";
import type { WorkerProcess } from "./processes.js";

const worker: WorkerProcess = { imageName: "python.exe", pid: 4120 };

const config: CollectorConfig = {
  service: { run_as_user: "svc_collector", run_as_password: "test-secret" },
};

const EXPECTED_PATH =
  "PATH=C:\\Python311;C:\\Python311\\Scripts;C:\\Users\\svc_collector\\AppData\\Roaming\\Python\\Python311\\Scripts;%PATH%";
const EXPECTED_PYTHONPATH =
  "PYTHONPATH=C:\\Users\\svc_collector\\AppData\\Roaming\\Python\\Python311\\site-packages;C:\\Python311\\Lib\\site-packages";

function installedBackend(state: "running" | "stopped" = "running") {
  return new FakeServiceBackend({
    state,
    properties: { Application: ["C:\\Python311\\python.exe"] },
  });
}

function recordingLogger(lines: string[], subsystem = "test"): SubsystemLogger {
  const push = (message: string) => {
    lines.push(message);
  };
  return {
    subsystem,
    trace: push,
    debug: push,
    info: push,
    warn: push,
    error: push,
    fatal: push,
    child: (name) => recordingLogger(lines, `${subsystem}/${name}`),
  };
}

describe("configureIdentity", () => {
  it("walks every step and applies account and environment", async () => {
    const backend = installedBackend();
    const probeNetwork = vi.fn(async () => ({ status: "ok" as const, path: "\\\\fileserver\\tc2" }));
    const deps = createTestServiceDeps(backend, {
      processes: { listByImageName: async () => [worker] },
      probeNetwork,
    });

    const res = await configureIdentity(
      { settings: createTestSettings({ networkResource: "\\\\fileserver\\tc2" }), config },
      deps,
    );

    expect(res).toEqual({
      ok: true,
      outcome: "configured",
      account: ".\\svc_collector",
      credentialSource: "config",
      completedSteps: [
        "credential-resolution",
        "stop",
        "set-identity",
        "set-environment",
        "verify",
        "start",
        "health-check",
      ],
      verification: {
        objectName: ".\\svc_collector",
        environment: {
          PATH: EXPECTED_PATH.slice("PATH=".length),
          PYTHONPATH: EXPECTED_PYTHONPATH.slice("PYTHONPATH=".length),
        },
      },
      health: {
        status: "ok",
        workerProcesses: [worker],
        network: { status: "ok", path: "\\\\fileserver\\tc2" },
        issues: [],
      },
    });
    expect(backend.mutationCalls()).toEqual([
      { op: "stop", args: ["DataCollector"] },
      { op: "set", args: ["DataCollector", "ObjectName", ".\\svc_collector", "test-secret"] },
      { op: "set", args: ["DataCollector", "AppEnvironmentExtra", EXPECTED_PATH, EXPECTED_PYTHONPATH] },
      { op: "start", args: ["DataCollector"] },
    ]);
    // The share gets the account as configured; only ObjectName takes the .\ form.
    expect(probeNetwork).toHaveBeenCalledWith("\\\\fileserver\\tc2", {
      username: "svc_collector",
      password: "test-secret",
    });
  });

  it("never reaches set-environment when the account is rejected", async () => {
    const rejection =
      "Error setting parameter \"ObjectName\" for service \"DataCollector\"!\r\nThe account name is invalid or does not exist, or the password is invalid for the account name specified.";
    const backend = installedBackend().failOn("set:ObjectName", rejection);

    const res = await configureIdentity(
      { settings: createTestSettings(), config },
      createTestServiceDeps(backend),
    );

    expect(res).toEqual({
      ok: false,
      error: {
        code: "identity-rejected",
        message: "The service manager rejected account .\\svc_collector",
        step: "set-identity",
        detail: rejection,
        hint: "Check the account name and password. The account also needs the 'Log on as a service' right.",
      },
      completedSteps: ["credential-resolution", "stop"],
    });
    expect(backend.callsFor("set")).toHaveLength(1);
    expect(backend.callsFor("start")).toEqual([]);
  });

  it("prompts once and fails with missing-credential on an empty username", async () => {
    const backend = installedBackend();
    const text = vi.fn(async () => "");
    const password = vi.fn(async () => "test-secret");
    const prompter: Prompter = {
      note: async () => {},
      text,
      password,
      confirm: async () => true,
    };

    const res = await configureIdentity(
      { settings: createTestSettings(), config: {} },
      createTestServiceDeps(backend, { prompter, interactive: true }),
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("missing-credential");
      expect(res.completedSteps).toEqual([]);
    }
    expect(text).toHaveBeenCalledTimes(1);
    expect(password).not.toHaveBeenCalled();
    expect(backend.mutationCalls()).toEqual([]);
  });

  it("uses the prompted account when the config has none", async () => {
    const backend = installedBackend("stopped");
    const prompter: Prompter = {
      note: async () => {},
      text: async () => "CORP\\svc",
      password: async () => "test-secret",
      confirm: async () => true,
    };

    const res = await configureIdentity(
      { settings: createTestSettings(), config: {} },
      createTestServiceDeps(backend, { prompter, interactive: true }),
    );

    expect(res).toMatchObject({ ok: true, account: "CORP\\svc", credentialSource: "prompt" });
    expect(backend.callsFor("stop")).toEqual([]);
  });

  it("fails service-missing for an absent service", async () => {
    const backend = new FakeServiceBackend();
    const res = await configureIdentity(
      { settings: createTestSettings(), config },
      createTestServiceDeps(backend),
    );
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("service-missing");
    expect(backend.mutationCalls()).toEqual([]);
  });

  it("cancels after credential resolution when declined", async () => {
    const backend = installedBackend();
    const res = await configureIdentity(
      { settings: createTestSettings(), config },
      createTestServiceDeps(backend, { confirmer: createStaticConfirmer(false) }),
    );
    expect(res).toEqual({
      ok: true,
      outcome: "cancelled",
      completedSteps: ["credential-resolution"],
    });
    expect(backend.mutationCalls()).toEqual([]);
  });

  it("reports partial-configuration when the environment cannot be set", async () => {
    const backend = installedBackend().failOn("set:AppEnvironmentExtra", "Access is denied.", 5);
    const res = await configureIdentity(
      { settings: createTestSettings(), config },
      createTestServiceDeps(backend),
    );
    expect(res).toMatchObject({
      ok: false,
      error: {
        code: "partial-configuration",
        step: "set-environment",
        hint: "Run the command from an elevated (Administrator) prompt.",
      },
      completedSteps: ["credential-resolution", "stop", "set-identity"],
    });
    expect(backend.properties.get("ObjectName")).toEqual([".\\svc_collector"]);
    expect(backend.callsFor("start")).toEqual([]);
  });

  it("reports partial-configuration when start fails", async () => {
    const backend = installedBackend().failOn("start", "StartService(): The service did not start.");
    const res = await configureIdentity(
      { settings: createTestSettings(), config },
      createTestServiceDeps(backend),
    );
    expect(res).toMatchObject({
      ok: false,
      error: { code: "partial-configuration", step: "start" },
      completedSteps: ["credential-resolution", "stop", "set-identity", "set-environment", "verify"],
    });
  });

  it("reports a timeout when the service never reaches running", async () => {
    const backend = installedBackend();
    backend.startsRunning = false;
    const res = await configureIdentity(
      { settings: createTestSettings({ settleTimeoutMs: 1000 }), config },
      createTestServiceDeps(backend),
    );
    expect(res).toMatchObject({
      ok: false,
      error: {
        code: "timeout",
        step: "start",
        message: "DataCollector did not reach running within 1.0s (last: stopped)",
      },
    });
  });

  it("treats an unreachable share as a warning, not a failure", async () => {
    const backend = installedBackend();
    const res = await configureIdentity(
      { settings: createTestSettings({ networkResource: "\\\\fileserver\\tc2" }), config },
      createTestServiceDeps(backend, {
        processes: { listByImageName: async () => [worker] },
        probeNetwork: async () => ({
          status: "warning",
          path: "\\\\fileserver\\tc2",
          detail: "System error 53 has occurred.",
        }),
      }),
    );
    expect(res.ok).toBe(true);
    if (res.ok && res.outcome === "configured") {
      expect(res.health.status).toBe("warning");
      expect(res.health.issues).toEqual([
        "network resource \\\\fileserver\\tc2 not reachable: System error 53 has occurred.",
      ]);
    }
  });

  it("keeps the password out of logs and console output", async () => {
    const lines: string[] = [];
    const backend = installedBackend();
    const deps = createTestServiceDeps(backend, { logger: recordingLogger(lines) });

    await configureIdentity({ settings: createTestSettings(), config }, deps);

    expect(lines.length).toBeGreaterThan(0);
    expect(lines.filter((line) => line.includes("test-secret"))).toEqual([]);
    expect(deps.output().includes("test-secret")).toBe(false);
  });
});
