import path from "node:path";

import { resolveUserPath } from "../utils.js";

export const CONFIG_FILENAME = "config.json";
export const CONFIG_PATH_ENV = "COLLECTOR_CONFIG_PATH";

/**
 * The worker and the orchestrator share one config.json, which lives beside
 * the worker in its working directory. Override with COLLECTOR_CONFIG_PATH.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) return resolveUserPath(override, cwd);
  return path.join(cwd, CONFIG_FILENAME);
}
