import path from "node:path";

import type { ServiceSettings } from "../config/service.js";
import { formatErrorMessage } from "../infra/errors.js";
import { executeConfirmed, createPendingAction } from "./confirmation.js";
import {
  buildServiceDescriptor,
  descriptorToPropertySets,
  formatManualSetCommand,
  type ServiceDescriptor,
  type StartupPolicy,
} from "./descriptor.js";
import { privilegeHint, type ServiceError, serviceError } from "./results.js";
import {
  NSSM_MISSING_HINT,
  resolveSettleOptions,
  type ServiceDeps,
  writeServiceLine,
} from "./service.js";
import { formatServiceRuntime, isInstalledState, type ServiceRuntime } from "./service-runtime.js";
import { describeSettleTimeout, waitForServiceState } from "./settle.js";

export type InstallParams = {
  settings: ServiceSettings;
  startup?: StartupPolicy;
  /** true/false to decide up front; undefined asks the operator. */
  start?: boolean;
};

export type InstallResult =
  | {
      ok: true;
      outcome: "installed";
      descriptor: ServiceDescriptor;
      replaced: boolean;
      started: boolean;
      startError?: ServiceError;
      runtime: ServiceRuntime;
    }
  | { ok: true; outcome: "already-installed"; runtime: ServiceRuntime }
  | { ok: false; error: ServiceError };

async function removeExisting(
  settings: ServiceSettings,
  runtime: ServiceRuntime,
  deps: ServiceDeps,
): Promise<ServiceError | null> {
  const { backend } = deps;
  const settle = resolveSettleOptions(deps, settings.settleTimeoutMs);
  if (runtime.state === "running") {
    const stop = await backend.stop(settings.name);
    if (!stop.ok) deps.logger.warn(`stop ${settings.name} failed: ${stop.output}`);
    const stopped = await waitForServiceState(backend, settings.name, ["stopped"], settle);
    if (!stopped.ok) {
      return serviceError("timeout", describeSettleTimeout(settings.name, ["stopped"], stopped), {
        step: "stop",
      });
    }
  }
  const removed = await backend.remove(settings.name, { confirm: true });
  if (!removed.ok) {
    return serviceError("removal-failed", `Could not remove existing service ${settings.name}`, {
      step: "remove",
      detail: removed.output,
      hint: privilegeHint(removed.output) ?? `Remove it manually with: nssm remove ${settings.name} confirm`,
    });
  }
  const gone = await waitForServiceState(backend, settings.name, ["absent"], settle);
  if (!gone.ok) {
    return serviceError("timeout", describeSettleTimeout(settings.name, ["absent"], gone), {
      step: "remove",
    });
  }
  writeServiceLine(deps, "Removed previous service", settings.name);
  return null;
}

async function register(
  descriptor: ServiceDescriptor,
  name: string,
  deps: ServiceDeps,
): Promise<ServiceError | null> {
  const { backend } = deps;
  const installed = await backend.install(name, descriptor.executable, descriptor.args);
  if (!installed.ok) {
    return serviceError("partial-install", `nssm install ${name} failed`, {
      step: "install",
      detail: installed.output,
      hint: privilegeHint(installed.output),
    });
  }
  deps.logger.info(`registered ${name} -> ${descriptor.executable}`);

  for (const set of descriptorToPropertySets(descriptor)) {
    if (set.property === "AppStdout") {
      const logDir = path.win32.dirname(descriptor.logs.stdout);
      try {
        await deps.ensureDir(logDir);
      } catch (err) {
        return serviceError("partial-install", `Could not create log directory ${logDir}`, {
          step: "log-directory",
          detail: formatErrorMessage(err),
          hint: `Create ${logDir}, then run: ${formatManualSetCommand(name, set)}`,
        });
      }
    }
    const res = await backend.set(name, set.property, ...set.values);
    if (!res.ok) {
      return serviceError("partial-install", `Setting ${set.property} on ${name} failed`, {
        step: set.property,
        detail: res.output,
        hint:
          privilegeHint(res.output) ??
          `Registration is incomplete. Fix the cause, then run: ${formatManualSetCommand(name, set)} and the remaining settings, or reinstall.`,
      });
    }
  }
  return null;
}

async function startInstalled(
  settings: ServiceSettings,
  deps: ServiceDeps,
): Promise<ServiceError | undefined> {
  const res = await deps.backend.start(settings.name);
  if (!res.ok) {
    return serviceError("unknown", `Installed, but ${settings.name} did not start`, {
      step: "start",
      detail: res.output,
      hint: privilegeHint(res.output) ?? `Check the stderr log, then run: nssm start ${settings.name}`,
    });
  }
  const running = await waitForServiceState(
    deps.backend,
    settings.name,
    ["running"],
    resolveSettleOptions(deps, settings.settleTimeoutMs),
  );
  if (!running.ok) {
    return serviceError("timeout", describeSettleTimeout(settings.name, ["running"], running), {
      step: "start",
    });
  }
  return undefined;
}

export async function installService(
  params: InstallParams,
  deps: ServiceDeps,
): Promise<InstallResult> {
  const { settings } = params;
  const { backend } = deps;

  if (!(await backend.locate())) {
    return {
      ok: false,
      error: serviceError("backend-unavailable", "NSSM could not be found", {
        hint: NSSM_MISSING_HINT,
      }),
    };
  }
  const executable = settings.executable;
  if (!executable) {
    return {
      ok: false,
      error: serviceError("executable-not-found", "No worker executable configured", {
        hint: "Set service.executable in config.json or pass --executable.",
      }),
    };
  }
  if (!(await deps.fileExists(executable))) {
    return {
      ok: false,
      error: serviceError("executable-not-found", `Executable not found: ${executable}`),
    };
  }

  const runtime = await backend.status(settings.name);
  if (runtime.state === "unknown") {
    return {
      ok: false,
      error: serviceError("unknown", `Could not determine the state of ${settings.name}`, {
        detail: runtime.detail ?? runtime.raw,
      }),
    };
  }

  let replaced = false;
  if (isInstalledState(runtime.state)) {
    const gated = await executeConfirmed(
      createPendingAction(
        {
          kind: "reinstall",
          serviceName: settings.name,
          summary: `${settings.name} is already installed (${formatServiceRuntime(runtime)}). Remove and reinstall it?`,
          details: runtime.state === "running" ? ["The running service will be stopped."] : [],
        },
        async () => await removeExisting(settings, runtime, deps),
      ),
      deps.confirmer,
    );
    if (!gated.confirmed) {
      deps.logger.info(`reinstall of ${settings.name} declined`);
      return { ok: true, outcome: "already-installed", runtime };
    }
    if (gated.value) return { ok: false, error: gated.value };
    replaced = true;
  }

  const descriptor = buildServiceDescriptor({
    executable,
    args: settings.arguments,
    workingDir: settings.workingDir,
    displayName: settings.displayName,
    description: settings.description,
    startup: params.startup,
  });
  const failure = await register(descriptor, settings.name, deps);
  if (failure) return { ok: false, error: failure };
  writeServiceLine(deps, "Installed service", settings.name);
  writeServiceLine(deps, "Logs", descriptor.logs.stdout);

  const shouldStart =
    params.start ?? (await deps.confirmer.ask(`Start ${settings.name} now?`, true));
  const startError = shouldStart ? await startInstalled(settings, deps) : undefined;
  const after = await backend.status(settings.name);
  if (startError) deps.logger.warn(startError.message);
  else if (shouldStart) writeServiceLine(deps, "Started service", settings.name);

  return {
    ok: true,
    outcome: "installed",
    descriptor,
    replaced,
    started: after.state === "running",
    ...(startError ? { startError } : {}),
    runtime: after,
  };
}
