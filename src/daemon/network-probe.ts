import fs from "node:fs/promises";

import { formatErrorMessage } from "../infra/errors.js";
import { type CommandRunner, runCommandWithTimeout, type SpawnResult } from "../process/exec.js";
import { isUncPath } from "../utils.js";
import type { RunAsCredential } from "./credentials.js";

export type NetworkProbeStatus = "ok" | "warning" | "skipped";

export type NetworkProbeResult = {
  status: NetworkProbeStatus;
  path?: string;
  detail?: string;
};

/** `credential.username` goes to `net use` as entered; the share's server resolves it. */
export type NetworkProbe = (
  resource: string | undefined,
  credential?: RunAsCredential,
) => Promise<NetworkProbeResult>;

const NET_USE_TIMEOUT_MS = 20_000;

/** `\\host\share\a\b` -> `\\host\share`; null for anything that is not a UNC path. */
export function resolveShareRoot(resource: string): string | null {
  const trimmed = resource.trim();
  if (!isUncPath(trimmed)) return null;
  const parts = trimmed.slice(2).split(/[\\/]+/).filter(Boolean);
  if (parts.length < 2) return null;
  return `\\\\${parts[0]}\\${parts[1]}`;
}

// System error 1219 (a session with other credentials) is a conflict, not a match.
export function isAlreadyConnected(output: string): boolean {
  return /already connected|уже подключен/i.test(output);
}

export function createNetworkProbe(
  opts: { exec?: CommandRunner; access?: (target: string) => Promise<void> } = {},
): NetworkProbe {
  const exec = opts.exec ?? runCommandWithTimeout;
  const access = opts.access ?? ((target: string) => fs.access(target));

  return async (resource, credential) => {
    const target = resource?.trim();
    if (!target) return { status: "skipped", detail: "no network resource configured" };

    const share = resolveShareRoot(target);
    if (share && credential) {
      let res: SpawnResult;
      try {
        res = await exec(
          ["net", "use", share, `/user:${credential.username}`, credential.password, "/persistent:no"],
          { timeoutMs: NET_USE_TIMEOUT_MS },
        );
      } catch (err) {
        return { status: "warning", path: target, detail: `net use failed: ${formatErrorMessage(err)}` };
      }
      const output = [res.stdout.trim(), res.stderr.trim()].filter(Boolean).join("\n");
      if (res.code !== 0 && !isAlreadyConnected(output)) {
        return {
          status: "warning",
          path: target,
          detail: `net use ${share} failed: ${output || `exit ${String(res.code)}`}`,
        };
      }
    }

    try {
      await access(target);
      return { status: "ok", path: target };
    } catch (err) {
      return { status: "warning", path: target, detail: formatErrorMessage(err) };
    }
  };
}
