export type ServiceState = "absent" | "stopped" | "running" | "unknown";

export type ServiceRuntime = {
  state: ServiceState;
  /** True while the backend reports a transition (start/stop/pause pending). */
  pending?: boolean;
  /** Backend status token as reported, e.g. `SERVICE_RUNNING`. */
  raw?: string;
  detail?: string;
};

export function isInstalledState(state: ServiceState): boolean {
  return state === "stopped" || state === "running";
}

export function formatServiceRuntime(runtime: ServiceRuntime): string {
  const parts: string[] = [runtime.state];
  if (runtime.raw && runtime.raw.toLowerCase() !== `service_${runtime.state}`) {
    parts.push(`(${runtime.raw})`);
  }
  if (runtime.detail) parts.push(`- ${runtime.detail}`);
  return parts.join(" ");
}
