import type { Logger as TsLogger } from "tslog";

import type { LogLevel } from "./levels.js";

export type LogObj = { date?: Date } & Record<string, unknown>;

export type LoggerSettings = {
  level?: LogLevel;
  file?: string;
  consoleLevel?: LogLevel;
};

export type ResolvedLoggerSettings = {
  level: LogLevel;
  file: string;
};

type LoggingState = {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettings: ResolvedLoggerSettings | null;
  overrideSettings: LoggerSettings | null;
  configSettings: LoggerSettings | null;
  consolePatched: boolean;
  rawConsole: Pick<typeof console, "log" | "warn" | "error"> | null;
};

export const loggingState: LoggingState = {
  cachedLogger: null,
  cachedSettings: null,
  overrideSettings: null,
  configSettings: null,
  consolePatched: false,
  rawConsole: null,
};
