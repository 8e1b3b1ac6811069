import fs from "node:fs/promises";

import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { formatLine } from "../terminal/theme.js";
import { pathExists } from "../utils.js";
import type { Prompter } from "../wizard/prompts.js";
import type { ServiceControlBackend } from "./backend.js";
import { type Confirmer, createConfirmer } from "./confirmation.js";
import { type LogTailReader, readLogTail } from "./log-tail.js";
import { createNetworkProbe, type NetworkProbe } from "./network-probe.js";
import { createNssmBackend } from "./nssm.js";
import { createTasklistProbe, type ProcessProbe } from "./processes.js";
import type { SettleOptions } from "./settle.js";

/** Everything the lifecycle operations touch outside their own logic. */
export type ServiceDeps = {
  backend: ServiceControlBackend;
  confirmer: Confirmer;
  prompter?: Prompter;
  /** Whether interactive credential prompts may run. */
  interactive: boolean;
  processes: ProcessProbe;
  readLogTail: LogTailReader;
  probeNetwork: NetworkProbe;
  fileExists: (target: string) => Promise<boolean>;
  ensureDir: (dir: string) => Promise<void>;
  /** Poll tuning; the timeout itself comes from the service settings. */
  settle?: Omit<SettleOptions, "timeoutMs">;
  logger: SubsystemLogger;
  stdout: NodeJS.WritableStream;
};

export function createDefaultServiceDeps(opts: {
  nssmPath?: string;
  prompter?: Prompter;
  assumeYes: boolean;
  interactive: boolean;
  stdout?: NodeJS.WritableStream;
}): ServiceDeps {
  const logger = createSubsystemLogger("service");
  return {
    backend: createNssmBackend({ nssmPath: opts.nssmPath, logger: logger.child("nssm") }),
    confirmer: createConfirmer({
      prompter: opts.prompter,
      assumeYes: opts.assumeYes,
      interactive: opts.interactive,
    }),
    prompter: opts.prompter,
    interactive: opts.interactive,
    processes: createTasklistProbe(),
    readLogTail: (file, lines) => readLogTail(file, lines),
    probeNetwork: createNetworkProbe(),
    fileExists: pathExists,
    ensureDir: async (dir) => {
      await fs.mkdir(dir, { recursive: true });
    },
    logger,
    stdout: opts.stdout ?? process.stdout,
  };
}

export function resolveSettleOptions(deps: ServiceDeps, timeoutMs: number): SettleOptions {
  return { ...deps.settle, timeoutMs };
}

export function writeServiceLine(deps: ServiceDeps, label: string, value: string): void {
  deps.stdout.write(`${formatLine(label, value)}\n`);
}

export const NSSM_MISSING_HINT =
  "Install NSSM and put it on PATH, or point service.nssm_path (or NSSM_PATH) at nssm.exe.";
