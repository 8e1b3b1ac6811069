import {
  DEFAULT_RESTART_DELAY_MS,
  LOG_ROTATE_BYTES,
  LOG_ROTATE_SECONDS,
  resolveServiceLogPaths,
} from "./constants.js";

export type StartupPolicy = "auto" | "manual";
export type RestartAction = "restart" | "exit" | "ignore";

export type ServiceDescriptor = {
  executable: string;
  args: string[];
  workingDir: string;
  displayName: string;
  description: string;
  startup: StartupPolicy;
  restart: { action: RestartAction; delayMs: number };
  logs: {
    stdout: string;
    stderr: string;
    rotation: { bytes?: number; seconds?: number; online: boolean };
  };
};

export type PropertySet = {
  property: string;
  values: string[];
};

const STARTUP_VALUES: Record<StartupPolicy, string> = {
  auto: "SERVICE_AUTO_START",
  manual: "SERVICE_DEMAND_START",
};

const RESTART_VALUES: Record<RestartAction, string> = {
  restart: "Restart",
  exit: "Exit",
  ignore: "Ignore",
};

export function buildServiceDescriptor(params: {
  executable: string;
  args?: string[];
  workingDir: string;
  displayName: string;
  description: string;
  startup?: StartupPolicy;
}): ServiceDescriptor {
  const logs = resolveServiceLogPaths(params.workingDir);
  return {
    executable: params.executable,
    args: params.args ?? [],
    workingDir: params.workingDir,
    displayName: params.displayName,
    description: params.description,
    startup: params.startup ?? "auto",
    restart: { action: "restart", delayMs: DEFAULT_RESTART_DELAY_MS },
    logs: {
      ...logs,
      rotation: { bytes: LOG_ROTATE_BYTES, seconds: LOG_ROTATE_SECONDS, online: true },
    },
  };
}

/** The ordered `set` commands that apply a descriptor after `install`. */
export function descriptorToPropertySets(descriptor: ServiceDescriptor): PropertySet[] {
  const sets: PropertySet[] = [
    { property: "AppDirectory", values: [descriptor.workingDir] },
    { property: "DisplayName", values: [descriptor.displayName] },
    { property: "Description", values: [descriptor.description] },
    { property: "Start", values: [STARTUP_VALUES[descriptor.startup]] },
    { property: "AppExit", values: ["Default", RESTART_VALUES[descriptor.restart.action]] },
    { property: "AppRestartDelay", values: [String(descriptor.restart.delayMs)] },
    { property: "AppStdout", values: [descriptor.logs.stdout] },
    { property: "AppStderr", values: [descriptor.logs.stderr] },
  ];
  const { rotation } = descriptor.logs;
  if (rotation.bytes !== undefined || rotation.seconds !== undefined) {
    sets.push({ property: "AppRotateFiles", values: ["1"] });
    sets.push({ property: "AppRotateOnline", values: [rotation.online ? "1" : "0"] });
  }
  if (rotation.bytes !== undefined) {
    sets.push({ property: "AppRotateBytes", values: [String(rotation.bytes)] });
  }
  if (rotation.seconds !== undefined) {
    sets.push({ property: "AppRotateSeconds", values: [String(rotation.seconds)] });
  }
  return sets;
}

export function formatManualSetCommand(name: string, set: PropertySet): string {
  const quote = (value: string) => (/[\s"]/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value);
  return ["nssm", "set", name, set.property, ...set.values].map(quote).join(" ");
}
