import type { ServiceSettings } from "../config/service.js";
import { createPendingAction, executeConfirmed } from "./confirmation.js";
import { type ServiceError, serviceError } from "./results.js";
import {
  NSSM_MISSING_HINT,
  resolveSettleOptions,
  type ServiceDeps,
  writeServiceLine,
} from "./service.js";
import { formatServiceRuntime, type ServiceRuntime } from "./service-runtime.js";
import { describeSettleTimeout, waitForServiceState } from "./settle.js";

export type UninstallParams = {
  settings: ServiceSettings;
};

export type UninstallResult =
  | { ok: true; outcome: "removed"; warnings: string[] }
  | { ok: true; outcome: "not-installed" }
  | { ok: true; outcome: "cancelled" }
  | { ok: false; error: ServiceError };

const REMOVAL_HINT =
  "Removing a service needs Administrator rights. Re-run from an elevated prompt.";

async function stopAndRemove(
  settings: ServiceSettings,
  runtime: ServiceRuntime,
  deps: ServiceDeps,
): Promise<UninstallResult> {
  const { backend } = deps;
  const warnings: string[] = [];

  if (runtime.state === "running") {
    const stop = await backend.stop(settings.name);
    if (!stop.ok) warnings.push(`stop reported: ${stop.output || `exit ${stop.code}`}`);
    const stopped = await waitForServiceState(
      backend,
      settings.name,
      ["stopped"],
      resolveSettleOptions(deps, settings.settleTimeoutMs),
    );
    // nssm stops the service itself on remove; carry on and let removal decide.
    if (!stopped.ok) warnings.push(describeSettleTimeout(settings.name, ["stopped"], stopped));
    else writeServiceLine(deps, "Stopped service", settings.name);
  }

  const removed = await backend.remove(settings.name, { confirm: true });
  if (!removed.ok) {
    return {
      ok: false,
      error: serviceError("removal-failed", `Could not remove ${settings.name}`, {
        step: "remove",
        detail: removed.output,
        hint: REMOVAL_HINT,
      }),
    };
  }
  for (const warning of warnings) deps.logger.warn(warning);
  writeServiceLine(deps, "Removed service", settings.name);
  return { ok: true, outcome: "removed", warnings };
}

export async function uninstallService(
  params: UninstallParams,
  deps: ServiceDeps,
): Promise<UninstallResult> {
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

  const runtime = await backend.status(settings.name);
  if (runtime.state === "absent") {
    deps.logger.info(`${settings.name} is not installed`);
    return { ok: true, outcome: "not-installed" };
  }
  if (runtime.state === "unknown") {
    return {
      ok: false,
      error: serviceError("unknown", `Could not determine the state of ${settings.name}`, {
        detail: runtime.detail ?? runtime.raw,
      }),
    };
  }

  const gated = await executeConfirmed(
    createPendingAction(
      {
        kind: "uninstall",
        serviceName: settings.name,
        summary: `Stop and remove ${settings.name} (${formatServiceRuntime(runtime)})?`,
      },
      async () => await stopAndRemove(settings, runtime, deps),
    ),
    deps.confirmer,
  );
  if (!gated.confirmed) return { ok: true, outcome: "cancelled" };
  return gated.value;
}
