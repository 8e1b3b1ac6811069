import { sleep as defaultSleep } from "../utils.js";
import type { ServiceControlBackend } from "./backend.js";
import type { ServiceRuntime, ServiceState } from "./service-runtime.js";

export const DEFAULT_POLL_INITIAL_MS = 250;
export const DEFAULT_POLL_MAX_MS = 2000;
export const DEFAULT_POLL_FACTOR = 2;

export type SettleOptions = {
  timeoutMs: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type SettleResult =
  | { ok: true; runtime: ServiceRuntime; attempts: number }
  | { ok: false; reason: "timeout"; runtime: ServiceRuntime; attempts: number; elapsedMs: number };

/**
 * Poll `status()` until the service reports one of `targets` and is no longer
 * in a pending transition. Backs off exponentially between polls and gives up
 * once `timeoutMs` has elapsed.
 */
export async function waitForServiceState(
  backend: ServiceControlBackend,
  name: string,
  targets: readonly ServiceState[],
  opts: SettleOptions,
): Promise<SettleResult> {
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;
  const maxDelay = opts.maxDelayMs ?? DEFAULT_POLL_MAX_MS;
  const factor = opts.factor ?? DEFAULT_POLL_FACTOR;
  const startedAt = now();
  let delay = opts.initialDelayMs ?? DEFAULT_POLL_INITIAL_MS;
  let attempts = 0;

  for (;;) {
    attempts += 1;
    const runtime = await backend.status(name);
    if (targets.includes(runtime.state) && !runtime.pending) {
      return { ok: true, runtime, attempts };
    }
    const elapsedMs = now() - startedAt;
    if (elapsedMs >= opts.timeoutMs) {
      return { ok: false, reason: "timeout", runtime, attempts, elapsedMs };
    }
    await sleep(Math.min(delay, opts.timeoutMs - elapsedMs));
    delay = Math.min(delay * factor, maxDelay);
  }
}

export function describeSettleTimeout(
  name: string,
  targets: readonly ServiceState[],
  result: Extract<SettleResult, { ok: false }>,
): string {
  const seconds = (result.elapsedMs / 1000).toFixed(1);
  return `${name} did not reach ${targets.join("/")} within ${seconds}s (last: ${result.runtime.raw ?? result.runtime.state})`;
}
