import type { CollectorConfig } from "../config/types.js";
import { normalizeLogLevel } from "./levels.js";
import { applyLoggingConfig, type LoggerSettings } from "./logger.js";

export function toLoggerSettings(logging: CollectorConfig["logging"]): LoggerSettings | null {
  if (!logging) return null;
  return {
    level: logging.level ? normalizeLogLevel(logging.level) : undefined,
    file: logging.file,
    consoleLevel: logging.console_level ? normalizeLogLevel(logging.console_level) : undefined,
  };
}

export function applyLoggingSection(config: CollectorConfig): void {
  applyLoggingConfig(toLoggerSettings(config.logging));
}
