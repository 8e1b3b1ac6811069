import { isErrno } from "../infra/errors.js";
import { formatCommandForLog } from "../logging/redact.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { type CommandRunner, runCommandWithTimeout } from "../process/exec.js";
import type { BackendCommandResult, ServiceControlBackend } from "./backend.js";
import type { ServiceRuntime } from "./service-runtime.js";

const NSSM_TIMEOUT_MS = 30_000;
const DEFAULT_NSSM_BINARY = "nssm";

const STATUS_MAP: Record<string, Omit<ServiceRuntime, "raw">> = {
  SERVICE_RUNNING: { state: "running" },
  SERVICE_STOPPED: { state: "stopped" },
  SERVICE_PAUSED: { state: "running" },
  SERVICE_START_PENDING: { state: "running", pending: true },
  SERVICE_CONTINUE_PENDING: { state: "running", pending: true },
  SERVICE_PAUSE_PENDING: { state: "running", pending: true },
  SERVICE_STOP_PENDING: { state: "running", pending: true },
};

/**
 * nssm writes UTF-16LE when its output is piped. Detect that from the BOM or
 * from NUL bytes in the high half of each code unit; fall back to utf8.
 */
export function decodeNssmOutput(chunk: Buffer): string {
  if (chunk.length >= 2 && chunk[0] === 0xff && chunk[1] === 0xfe) {
    return chunk.subarray(2).toString("utf16le");
  }
  const sample = chunk.subarray(0, Math.min(chunk.length, 64));
  let oddSlots = 0;
  let zeros = 0;
  for (let i = 1; i < sample.length; i += 2) {
    oddSlots += 1;
    if (sample[i] === 0) zeros += 1;
  }
  if (oddSlots > 0 && zeros * 2 > oddSlots) {
    return chunk.toString("utf16le");
  }
  return chunk.toString("utf8");
}

export function isServiceMissingOutput(output: string): boolean {
  const lower = output.toLowerCase();
  return (
    lower.includes("can't open service") ||
    lower.includes("does not exist as an installed service")
  );
}

export function parseNssmStatus(output: string): ServiceRuntime {
  const token = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.toUpperCase().startsWith("SERVICE_"));
  if (!token) {
    const detail = output.trim();
    return { state: "unknown", ...(detail ? { detail } : {}) };
  }
  const raw = token.toUpperCase();
  const mapped = STATUS_MAP[raw];
  if (!mapped) return { state: "unknown", raw };
  return { ...mapped, raw };
}

function toCommandResult(res: { stdout: string; stderr: string; code: number | null }) {
  const output = [res.stdout.trim(), res.stderr.trim()].filter(Boolean).join("\n");
  const code = res.code ?? 1;
  return { ok: code === 0, code, output };
}

export type NssmBackendOptions = {
  nssmPath?: string;
  exec?: CommandRunner;
  logger?: SubsystemLogger;
};

export function createNssmBackend(opts: NssmBackendOptions = {}): ServiceControlBackend {
  const binary = opts.nssmPath?.trim() || DEFAULT_NSSM_BINARY;
  const exec = opts.exec ?? runCommandWithTimeout;
  const log = opts.logger ?? createSubsystemLogger("nssm");

  async function execNssm(args: string[]): Promise<BackendCommandResult> {
    const argv = [binary, ...args];
    log.debug(`exec ${formatCommandForLog(argv)}`);
    try {
      const res = await exec(argv, { timeoutMs: NSSM_TIMEOUT_MS, decode: decodeNssmOutput });
      const result = toCommandResult(res);
      if (!result.ok) {
        log.debug(`nssm exited ${result.code}: ${result.output || "(no output)"}`);
      }
      return result;
    } catch (err) {
      if (isErrno(err, "ENOENT")) {
        return { ok: false, code: -1, output: `nssm not found at "${binary}"` };
      }
      throw err;
    }
  }

  return {
    label: "NSSM",
    locate: async () => {
      // `nssm` without arguments prints its usage banner and exits non-zero.
      const res = await execNssm([]);
      return res.code === -1 ? null : binary;
    },
    status: async (name) => {
      const res = await execNssm(["status", name]);
      if (res.code === -1) return { state: "unknown", detail: res.output };
      if (res.ok) return parseNssmStatus(res.output);
      if (isServiceMissingOutput(res.output)) return { state: "absent" };
      return { state: "unknown", ...(res.output ? { detail: res.output } : {}) };
    },
    install: async (name, executablePath, args) =>
      await execNssm(["install", name, executablePath, ...args]),
    remove: async (name, { confirm }) =>
      await execNssm(confirm ? ["remove", name, "confirm"] : ["remove", name]),
    set: async (name, property, ...values) => await execNssm(["set", name, property, ...values]),
    get: async (name, property) => await execNssm(["get", name, property]),
    start: async (name) => await execNssm(["start", name]),
    stop: async (name) => await execNssm(["stop", name]),
  };
}
