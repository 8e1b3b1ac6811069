import path from "node:path";
import process from "node:process";

import { formatUncaughtError } from "../infra/errors.js";
import { enableConsoleCapture } from "../logging/console.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { buildProgram } from "./program.js";

const log = createSubsystemLogger("cli");

/**
 * Some Windows launchers pass the node executable through as an argument
 * (`node.exe node.exe entry.js install`); commander would read it as a command.
 */
export function stripWindowsNodeExec(
  argv: string[],
  execPath: string = process.execPath,
): string[] {
  const execBase = path.win32.basename(execPath).toLowerCase();
  const isExecPath = (value: string) => {
    const lower = value.replace(/^['"]+|['"]+$/g, "").trim().toLowerCase();
    return lower === execPath.toLowerCase() || path.win32.basename(lower) === execBase;
  };
  return argv.filter((arg, index) => index === 0 || !isExecPath(arg));
}

export async function runCli(argv: string[] = process.argv) {
  const normalizedArgv = process.platform === "win32" ? stripWindowsNodeExec(argv) : argv;

  // Mirror console output into the file log so each service operation leaves a record.
  enableConsoleCapture();

  process.on("unhandledRejection", (reason) => {
    log.error(`unhandled rejection: ${formatUncaughtError(reason)}`);
    console.error("[collector-svc] Unhandled rejection:", formatUncaughtError(reason));
    process.exit(1);
  });
  process.on("uncaughtException", (error) => {
    log.error(`uncaught exception: ${formatUncaughtError(error)}`);
    console.error("[collector-svc] Uncaught exception:", formatUncaughtError(error));
    process.exit(1);
  });

  await buildProgram().parseAsync(normalizedArgv);
}
