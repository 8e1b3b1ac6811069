import {
  DEFAULT_ERROR_LOG_LINES,
  DEFAULT_SERVICE_DISPLAY_NAME,
  DEFAULT_SETTLE_TIMEOUT_MS,
  formatServiceDescription,
  normalizeServiceName,
  NSSM_PATH_ENV,
} from "../daemon/constants.js";
import { resolveUserPath } from "../utils.js";
import type { CollectorConfig } from "./types.js";

export type ServiceSettings = {
  name: string;
  displayName: string;
  description: string;
  executable?: string;
  arguments: string[];
  workingDir: string;
  nssmPath?: string;
  networkResource?: string;
  settleTimeoutMs: number;
  errorLogLines: number;
};

export type ServiceSettingsOverrides = {
  name?: string;
  executable?: string;
  arguments?: string[];
  workingDir?: string;
  description?: string;
  networkResource?: string;
};

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveServiceSettings(
  config: CollectorConfig,
  opts: {
    overrides?: ServiceSettingsOverrides;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    version?: string;
  } = {},
): ServiceSettings {
  const section = config.service ?? {};
  const overrides = opts.overrides ?? {};
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();

  const workingDirRaw = nonEmpty(overrides.workingDir) ?? nonEmpty(section.working_dir);
  const executable = nonEmpty(overrides.executable) ?? nonEmpty(section.executable);
  const nssmPath = nonEmpty(section.nssm_path) ?? nonEmpty(env[NSSM_PATH_ENV]);

  return {
    name: normalizeServiceName(overrides.name ?? section.name),
    displayName: nonEmpty(section.display_name) ?? DEFAULT_SERVICE_DISPLAY_NAME,
    description: formatServiceDescription({
      description: overrides.description ?? section.description,
      version: opts.version,
    }),
    executable: executable ? resolveUserPath(executable, cwd) : undefined,
    arguments: overrides.arguments?.length ? overrides.arguments : (section.arguments ?? []),
    workingDir: workingDirRaw ? resolveUserPath(workingDirRaw, cwd) : cwd,
    nssmPath: nssmPath ? resolveUserPath(nssmPath, cwd) : undefined,
    networkResource:
      nonEmpty(overrides.networkResource) ??
      nonEmpty(section.network_resource) ??
      nonEmpty(config.tc2_processor?.files_directory),
    settleTimeoutMs: section.settle_timeout_ms ?? DEFAULT_SETTLE_TIMEOUT_MS,
    errorLogLines: section.error_log_lines ?? DEFAULT_ERROR_LOG_LINES,
  };
}
