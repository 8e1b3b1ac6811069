import type { ServiceSettings } from "../config/service.js";
import type { WorkerProcess } from "./processes.js";
import { NSSM_MISSING_HINT, resolveSettleOptions, type ServiceDeps } from "./service.js";
import type { ServiceState } from "./service-runtime.js";
import { describeSettleTimeout, waitForServiceState } from "./settle.js";
import { collectWorkerDiagnostics, readServiceProperty } from "./status.js";

export type RestartParams = {
  settings: ServiceSettings;
};

export type RestartReport = {
  name: string;
  statusAfter: ServiceState;
  workerProcessesObserved: WorkerProcess[];
  recentErrorLines: string[];
  healthy: boolean;
  issues: string[];
};

/** Stop, settle, start, settle, then report what the host looks like. Never prompts. */
export async function restartService(
  params: RestartParams,
  deps: ServiceDeps,
): Promise<RestartReport> {
  const { settings } = params;
  const { backend } = deps;

  if (!(await backend.locate())) {
    const diagnostics = await collectWorkerDiagnostics(settings, deps);
    return {
      name: settings.name,
      statusAfter: "unknown",
      workerProcessesObserved: diagnostics.workerProcesses,
      recentErrorLines: diagnostics.recentErrorLines,
      healthy: false,
      issues: [NSSM_MISSING_HINT, ...diagnostics.issues],
    };
  }

  const issues: string[] = [];
  const settle = resolveSettleOptions(deps, settings.settleTimeoutMs);

  const stop = await backend.stop(settings.name);
  if (!stop.ok) issues.push(`stop failed: ${stop.output || `exit ${stop.code}`}`);
  const stopped = await waitForServiceState(backend, settings.name, ["stopped", "absent"], settle);
  if (!stopped.ok) issues.push(describeSettleTimeout(settings.name, ["stopped"], stopped));
  else deps.logger.debug(`${settings.name} stopped after ${stopped.attempts} poll(s)`);

  const start = await backend.start(settings.name);
  if (!start.ok) {
    issues.push(`start failed: ${start.output || `exit ${start.code}`}`);
  } else {
    const running = await waitForServiceState(backend, settings.name, ["running"], settle);
    if (!running.ok) issues.push(describeSettleTimeout(settings.name, ["running"], running));
  }

  const after = await backend.status(settings.name);
  const installed = after.state !== "absent" && after.state !== "unknown";
  const diagnostics = await collectWorkerDiagnostics(settings, deps, {
    application: installed ? await readServiceProperty(deps, settings.name, "Application") : undefined,
    stderrLog: installed ? await readServiceProperty(deps, settings.name, "AppStderr") : undefined,
  });
  issues.push(...diagnostics.issues);

  const healthy = after.state === "running" && diagnostics.workerProcesses.length > 0;
  if (!healthy) deps.logger.warn(`${settings.name} is not healthy after restart (${after.state})`);
  return {
    name: settings.name,
    statusAfter: after.state,
    workerProcessesObserved: diagnostics.workerProcesses,
    recentErrorLines: diagnostics.recentErrorLines,
    healthy,
    issues,
  };
}
