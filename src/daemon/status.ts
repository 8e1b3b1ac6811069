import type { ServiceSettings } from "../config/service.js";
import { formatErrorMessage } from "../infra/errors.js";
import { resolveServiceLogPaths } from "./constants.js";
import { resolveImageName, type WorkerProcess } from "./processes.js";
import { NSSM_MISSING_HINT, type ServiceDeps } from "./service.js";
import type { ServiceRuntime } from "./service-runtime.js";

export const INSPECTED_PROPERTIES = [
  "Application",
  "AppParameters",
  "AppDirectory",
  "ObjectName",
  "AppStderr",
] as const;

export type InspectedProperty = (typeof INSPECTED_PROPERTIES)[number];

export type ServiceStatusReport = {
  name: string;
  backendAvailable: boolean;
  runtime: ServiceRuntime;
  properties: Partial<Record<InspectedProperty, string>>;
  workerProcesses: WorkerProcess[];
  recentErrorLines: string[];
  issues: string[];
};

export type WorkerDiagnostics = {
  workerProcesses: WorkerProcess[];
  recentErrorLines: string[];
  issues: string[];
};

export async function readServiceProperty(
  deps: ServiceDeps,
  name: string,
  property: string,
): Promise<string | undefined> {
  const res = await deps.backend.get(name, property);
  const value = res.output.trim();
  return res.ok && value ? value : undefined;
}

/**
 * Worker processes and the stderr tail. Prefers what the backend has
 * registered over local settings, since the service may have been installed
 * from another working directory.
 */
export async function collectWorkerDiagnostics(
  settings: ServiceSettings,
  deps: ServiceDeps,
  registered: { application?: string; stderrLog?: string } = {},
): Promise<WorkerDiagnostics> {
  const issues: string[] = [];
  let workerProcesses: WorkerProcess[] = [];
  let recentErrorLines: string[] = [];

  const executable = registered.application ?? settings.executable;
  if (executable) {
    try {
      workerProcesses = await deps.processes.listByImageName(resolveImageName(executable));
    } catch (err) {
      issues.push(`process probe failed: ${formatErrorMessage(err)}`);
    }
  } else {
    issues.push("worker executable unknown; process check skipped");
  }

  const stderrLog = registered.stderrLog ?? resolveServiceLogPaths(settings.workingDir).stderr;
  try {
    recentErrorLines = await deps.readLogTail(stderrLog, settings.errorLogLines);
  } catch (err) {
    issues.push(`could not read ${stderrLog}: ${formatErrorMessage(err)}`);
  }

  return { workerProcesses, recentErrorLines, issues };
}

export async function inspectService(
  params: { settings: ServiceSettings },
  deps: ServiceDeps,
): Promise<ServiceStatusReport> {
  const { settings } = params;
  if (!(await deps.backend.locate())) {
    const diagnostics = await collectWorkerDiagnostics(settings, deps);
    return {
      name: settings.name,
      backendAvailable: false,
      runtime: { state: "unknown", detail: "NSSM could not be found" },
      properties: {},
      ...diagnostics,
      issues: [NSSM_MISSING_HINT, ...diagnostics.issues],
    };
  }

  const runtime = await deps.backend.status(settings.name);
  const properties: Partial<Record<InspectedProperty, string>> = {};
  if (runtime.state !== "absent" && runtime.state !== "unknown") {
    for (const property of INSPECTED_PROPERTIES) {
      const value = await readServiceProperty(deps, settings.name, property);
      if (value !== undefined) properties[property] = value;
    }
  }
  const diagnostics = await collectWorkerDiagnostics(settings, deps, {
    application: properties.Application,
    stderrLog: properties.AppStderr,
  });
  return {
    name: settings.name,
    backendAvailable: true,
    runtime,
    properties,
    ...diagnostics,
  };
}
