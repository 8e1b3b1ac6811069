export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (ALLOWED_LOG_LEVELS as readonly string[]).includes(value);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "info"): LogLevel {
  const candidate = (level ?? fallback).trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

export function levelToMinLevel(level: LogLevel): number {
  // tslog minLevel ids: trace=1 ... fatal=6; a record is kept when its id >= minLevel
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}
