import type { ServiceRuntime } from "./service-runtime.js";

export type BackendCommandResult = {
  ok: boolean;
  code: number;
  /** Combined stdout/stderr, trimmed. */
  output: string;
};

/**
 * The narrow command surface the lifecycle operations drive. The backend owns
 * the service descriptor; callers only issue property-set commands and read
 * individual properties back.
 */
export type ServiceControlBackend = {
  label: string;
  /** Resolves the backend binary, or null when it cannot be found. */
  locate: () => Promise<string | null>;
  status: (name: string) => Promise<ServiceRuntime>;
  install: (name: string, executablePath: string, args: string[]) => Promise<BackendCommandResult>;
  remove: (name: string, opts: { confirm: boolean }) => Promise<BackendCommandResult>;
  set: (name: string, property: string, ...values: string[]) => Promise<BackendCommandResult>;
  get: (name: string, property: string) => Promise<BackendCommandResult>;
  start: (name: string) => Promise<BackendCommandResult>;
  stop: (name: string) => Promise<BackendCommandResult>;
};
