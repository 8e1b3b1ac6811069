import path from "node:path";

// Default service identity and descriptor values
export const DEFAULT_SERVICE_NAME = "DataCollector";
export const DEFAULT_SERVICE_DISPLAY_NAME = "Data Collector";
export const DEFAULT_SERVICE_DESCRIPTION =
  "Collects production data and synchronises it into SQL Server";

export const DEFAULT_RESTART_DELAY_MS = 5000;
export const LOG_ROTATE_BYTES = 10 * 1024 * 1024; // 10 MiB
export const LOG_ROTATE_SECONDS = 24 * 60 * 60; // 24h

export const SERVICE_LOG_DIRNAME = "logs";
export const SERVICE_STDOUT_LOG = "service_stdout.log";
export const SERVICE_STDERR_LOG = "service_stderr.log";

export const DEFAULT_ERROR_LOG_LINES = 20;
export const DEFAULT_SETTLE_TIMEOUT_MS = 30_000;

export const NSSM_PATH_ENV = "NSSM_PATH";

export function normalizeServiceName(name?: string): string {
  const trimmed = name?.trim();
  return trimmed || DEFAULT_SERVICE_NAME;
}

export function resolveServiceLogPaths(workingDir: string): { stdout: string; stderr: string } {
  const logDir = path.win32.join(workingDir, SERVICE_LOG_DIRNAME);
  return {
    stdout: path.win32.join(logDir, SERVICE_STDOUT_LOG),
    stderr: path.win32.join(logDir, SERVICE_STDERR_LOG),
  };
}

export function formatServiceDescription(params?: { description?: string; version?: string }) {
  const base = params?.description?.trim() || DEFAULT_SERVICE_DESCRIPTION;
  const version = params?.version?.trim();
  if (!version) return base;
  return `${base} (installed by collector-svc v${version})`;
}
