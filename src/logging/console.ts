import util from "node:util";

import { stripAnsi } from "../terminal/ansi.js";
import type { LogLevel } from "./levels.js";
import { getLogger } from "./logger.js";
import { redactSensitiveText } from "./redact.js";
import { loggingState } from "./state.js";

type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

const CONSOLE_LEVELS: Record<ConsoleMethod, Exclude<LogLevel, "silent">> = {
  log: "info",
  info: "info",
  warn: "warn",
  error: "error",
  debug: "debug",
};

function isEpipeError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  return err.code === "EPIPE" || err.code === "EIO";
}

function writeToFileLogger(level: Exclude<LogLevel, "silent">, message: string) {
  const logger = getLogger();
  const line = redactSensitiveText(stripAnsi(message));
  switch (level) {
    case "debug":
      logger.debug(line);
      return;
    case "warn":
      logger.warn(line);
      return;
    case "error":
      logger.error(line);
      return;
    default:
      logger.info(line);
  }
}

/**
 * Mirror console.* into the file log while still writing to the terminal.
 * Service operations print progress through the console, so the file log
 * keeps a record of what an operator saw.
 */
export function enableConsoleCapture(): void {
  if (loggingState.consolePatched) return;
  loggingState.consolePatched = true;

  const original = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };
  loggingState.rawConsole = { log: original.log, warn: original.warn, error: original.error };

  const forward =
    (method: ConsoleMethod) =>
    (...args: unknown[]) => {
      const formatted = util.format(...args);
      try {
        writeToFileLogger(CONSOLE_LEVELS[method], formatted);
      } catch {
        // never block console output on logging failures
      }
      try {
        original[method].apply(console, args);
      } catch (err) {
        if (isEpipeError(err)) return;
        throw err;
      }
    };

  console.log = forward("log");
  console.info = forward("info");
  console.warn = forward("warn");
  console.error = forward("error");
  console.debug = forward("debug");
}
