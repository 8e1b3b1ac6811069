import { Chalk } from "chalk";
import type { Logger as TsLogger } from "tslog";

import { isVerbose } from "../globals.js";
import { type LogLevel, levelToMinLevel, normalizeLogLevel } from "./levels.js";
import { getChildLogger } from "./logger.js";
import { redactSensitiveText } from "./redact.js";
import { type LogObj, loggingState } from "./state.js";

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

type ChalkInstance = InstanceType<typeof Chalk>;

const SUBSYSTEM_COLORS = ["cyan", "green", "yellow", "blue", "magenta"] as const;

export function resolveConsoleLevel(): LogLevel {
  if (isVerbose()) return "debug";
  const cfg = loggingState.overrideSettings ?? loggingState.configSettings;
  return normalizeLogLevel(cfg?.consoleLevel, "warn");
}

function shouldLogToConsole(level: LogLevel, consoleLevel: LogLevel): boolean {
  if (consoleLevel === "silent") return false;
  return levelToMinLevel(level) >= levelToMinLevel(consoleLevel);
}

function getColorForConsole(): ChalkInstance {
  const hasForceColor =
    typeof process.env.FORCE_COLOR === "string" &&
    process.env.FORCE_COLOR.trim().length > 0 &&
    process.env.FORCE_COLOR.trim() !== "0";
  if (process.env.NO_COLOR && !hasForceColor) return new Chalk({ level: 0 });
  const hasTty = Boolean(process.stdout.isTTY || process.stderr.isTTY);
  return hasTty ? new Chalk({ level: 1 }) : new Chalk({ level: 0 });
}

function pickSubsystemColor(color: ChalkInstance, subsystem: string): ChalkInstance {
  let hash = 0;
  for (let i = 0; i < subsystem.length; i += 1) {
    hash = (hash * 31 + subsystem.charCodeAt(i)) | 0;
  }
  const idx = Math.abs(hash) % SUBSYSTEM_COLORS.length;
  return color[SUBSYSTEM_COLORS[idx]];
}

export function formatConsoleLine(opts: {
  level: LogLevel;
  subsystem: string;
  message: string;
  color?: ChalkInstance;
}): string {
  const color = opts.color ?? getColorForConsole();
  const prefix = pickSubsystemColor(color, opts.subsystem)(`[${opts.subsystem}]`);
  const levelColor =
    opts.level === "error" || opts.level === "fatal"
      ? color.red
      : opts.level === "warn"
        ? color.yellow
        : opts.level === "debug" || opts.level === "trace"
          ? color.gray
          : color.cyan;
  return `${prefix} ${levelColor(redactSensitiveText(opts.message))}`;
}

function writeConsoleLine(level: LogLevel, line: string) {
  const sink = loggingState.rawConsole ?? console;
  if (level === "error" || level === "fatal") {
    sink.error(line);
  } else if (level === "warn") {
    sink.warn(line);
  } else {
    sink.log(line);
  }
}

function logToFile(
  fileLogger: TsLogger<LogObj>,
  level: Exclude<LogLevel, "silent">,
  message: string,
  meta?: Record<string, unknown>,
) {
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [meta, message] : [message];
  switch (level) {
    case "trace":
      fileLogger.trace(...args);
      return;
    case "debug":
      fileLogger.debug(...args);
      return;
    case "info":
      fileLogger.info(...args);
      return;
    case "warn":
      fileLogger.warn(...args);
      return;
    case "error":
      fileLogger.error(...args);
      return;
    case "fatal":
      fileLogger.fatal(...args);
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let fileLogger: TsLogger<LogObj> | null = null;
  const getFileLogger = () => {
    if (!fileLogger) fileLogger = getChildLogger({ subsystem });
    return fileLogger;
  };
  const emit = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    meta?: Record<string, unknown>,
  ) => {
    logToFile(getFileLogger(), level, message, meta);
    if (!shouldLogToConsole(level, resolveConsoleLevel())) return;
    writeConsoleLine(level, formatConsoleLine({ level, subsystem, message }));
  };

  return {
    subsystem,
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
