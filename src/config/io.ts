import fs from "node:fs";

import JSON5 from "json5";

import { resolveConfigPath } from "./paths.js";
import type { CollectorConfig, ConfigFileSnapshot, ConfigValidationIssue } from "./types.js";
import { CollectorConfigSchema } from "./zod-schema.js";

export type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

export type ValidateConfigResult =
  | { ok: true; config: CollectorConfig }
  | { ok: false; issues: ConfigValidationIssue[] };

export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG";

  constructor(
    readonly configPath: string,
    readonly issues: ConfigValidationIssue[],
  ) {
    const details = issues.map((issue) => `- ${issue.path || "<root>"}: ${issue.message}`);
    super([`Invalid config at ${configPath}:`, ...details].join("\n"));
    this.name = "ConfigError";
  }
}

export type ConfigIoDeps = {
  fs?: typeof fs;
  json5?: { parse: (value: string) => unknown };
  env?: NodeJS.ProcessEnv;
  cwd?: () => string;
  configPath?: string;
};

function normalizeDeps(overrides: ConfigIoDeps = {}): Required<ConfigIoDeps> {
  return {
    fs: overrides.fs ?? fs,
    json5: overrides.json5 ?? JSON5,
    env: overrides.env ?? process.env,
    cwd: overrides.cwd ?? (() => process.cwd()),
    configPath: overrides.configPath ?? "",
  };
}

export function parseConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export function validateConfigObject(raw: unknown): ValidateConfigResult {
  const result = CollectorConfigSchema.safeParse(raw);
  if (result.success) return { ok: true, config: result.data };
  return {
    ok: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  };
}

export function createConfigIO(overrides: ConfigIoDeps = {}) {
  const deps = normalizeDeps(overrides);
  const configPath = deps.configPath || resolveConfigPath(deps.env, deps.cwd());

  function readConfigFileSnapshot(): ConfigFileSnapshot {
    if (!deps.fs.existsSync(configPath)) {
      return { path: configPath, exists: false, raw: null, config: {} };
    }
    // Windows editors like to leave a BOM at the start of config.json.
    const raw = deps.fs.readFileSync(configPath, "utf-8").replace(/^\uFEFF/, "");
    const parsed = parseConfigJson5(raw, deps.json5);
    if (!parsed.ok) {
      throw new ConfigError(configPath, [{ path: "", message: parsed.error }]);
    }
    const validated = validateConfigObject(parsed.parsed);
    if (!validated.ok) {
      throw new ConfigError(configPath, validated.issues);
    }
    return { path: configPath, exists: true, raw, config: validated.config };
  }

  function loadConfig(): CollectorConfig {
    return readConfigFileSnapshot().config;
  }

  return {
    configPath,
    loadConfig,
    readConfigFileSnapshot,
  };
}

export function loadConfig(overrides: ConfigIoDeps = {}): CollectorConfig {
  return createConfigIO(overrides).loadConfig();
}
