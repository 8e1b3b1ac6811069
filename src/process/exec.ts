import { spawn } from "node:child_process";

import { shouldLogVerbose } from "../globals.js";
import { logDebug } from "../logger.js";
import { formatCommandForLog } from "../logging/redact.js";

export type SpawnResult = {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: NodeJS.Signals | null;
  killed: boolean;
};

export type CommandOptions = {
  timeoutMs: number;
  cwd?: string;
  input?: string;
  env?: NodeJS.ProcessEnv;
  /** Decoder for captured output; utf8 when omitted. */
  decode?: (chunk: Buffer) => string;
};

export type CommandRunner = (argv: string[], options: CommandOptions) => Promise<SpawnResult>;

const decodeUtf8 = (chunk: Buffer) => chunk.toString("utf8");

export async function runCommandWithTimeout(
  argv: string[],
  optionsOrTimeout: number | CommandOptions,
): Promise<SpawnResult> {
  const options: CommandOptions =
    typeof optionsOrTimeout === "number" ? { timeoutMs: optionsOrTimeout } : optionsOrTimeout;
  const { timeoutMs, cwd, input, env } = options;
  const decode = options.decode ?? decodeUtf8;
  const hasInput = input !== undefined;
  const [command, ...args] = argv;
  if (!command) throw new Error("runCommandWithTimeout: empty argv");

  if (shouldLogVerbose()) {
    logDebug(`exec: ${formatCommandForLog(argv)}`);
  }

  const child = spawn(command, args, {
    stdio: [hasInput ? "pipe" : "ignore", "pipe", "pipe"],
    cwd,
    env: env ? { ...process.env, ...env } : process.env,
    windowsHide: true,
  });
  return await new Promise((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    const timer = setTimeout(() => {
      if (typeof child.kill === "function") {
        child.kill("SIGKILL");
      }
    }, timeoutMs);

    if (hasInput && child.stdin) {
      child.stdin.write(input ?? "");
      child.stdin.end();
    }

    child.stdout?.on("data", (d: Buffer) => {
      stdout.push(d);
    });
    child.stderr?.on("data", (d: Buffer) => {
      stderr.push(d);
    });
    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });
    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        stdout: decode(Buffer.concat(stdout)),
        stderr: decode(Buffer.concat(stderr)),
        code,
        signal,
        killed: child.killed,
      });
    });
  });
}
