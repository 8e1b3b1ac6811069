import { logVerbose } from "./globals.js";
import { getLogger } from "./logging/logger.js";
import { redactSensitiveText } from "./logging/redact.js";

export function logDebug(message: string) {
  // Always emit to file logger (level-filtered); console only when verbose.
  getLogger().debug(redactSensitiveText(message));
  logVerbose(message);
}
