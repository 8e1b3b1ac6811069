import path from "node:path";

export type RuntimeSearchPathOptions = {
  /** Registered `Application` value, e.g. `C:\Python311\python.exe`. */
  runtimePath: string;
  /** Run-as account, as normalised for the backend (`.\svc`, `DOMAIN\svc`, `svc@corp`). */
  account?: string;
  env?: Record<string, string | undefined>;
};

export type RuntimeSearchPaths = {
  binDirs: string[];
  libDirs: string[];
};

const win = path.win32;

/** `C:\Python311` -> `Python311`; null when the folder carries no version. */
export function resolvePythonVersionTag(runtimeDir: string): string | null {
  const match = /python(\d)(\d+)/i.exec(win.basename(runtimeDir));
  if (!match) return null;
  return `Python${match[1]}${match[2]}`;
}

export function resolveAccountUserName(account: string): string {
  const trimmed = account.trim();
  const slash = trimmed.lastIndexOf("\\");
  if (slash >= 0) return trimmed.slice(slash + 1);
  const at = trimmed.indexOf("@");
  return at >= 0 ? trimmed.slice(0, at) : trimmed;
}

export function resolveUserProfileDir(
  account: string,
  env: Record<string, string | undefined> = process.env,
): string | null {
  const user = resolveAccountUserName(account);
  if (!user) return null;
  const drive = env.SystemDrive?.trim() || "C:";
  return win.join(`${drive}\\`, "Users", user);
}

/**
 * Directories the worker needs under a different account: the runtime and its
 * Scripts folder, the account's per-user Scripts and site-packages, and the
 * system site-packages. The user site comes first so per-user installs win.
 */
export function getRuntimeSearchPaths(options: RuntimeSearchPathOptions): RuntimeSearchPaths {
  const env = options.env ?? process.env;
  const runtimeDir = win.dirname(options.runtimePath.trim());
  const tag = resolvePythonVersionTag(runtimeDir);
  const profile = options.account ? resolveUserProfileDir(options.account, env) : null;
  const userBase = profile && tag ? win.join(profile, "AppData", "Roaming", "Python", tag) : null;

  const binDirs: string[] = [];
  const libDirs: string[] = [];
  const add = (list: string[], dir: string | null) => {
    if (!dir) return;
    if (!list.some((existing) => existing.toLowerCase() === dir.toLowerCase())) list.push(dir);
  };

  add(binDirs, runtimeDir);
  add(binDirs, win.join(runtimeDir, "Scripts"));
  add(binDirs, userBase ? win.join(userBase, "Scripts") : null);

  add(libDirs, userBase ? win.join(userBase, "site-packages") : null);
  add(libDirs, win.join(runtimeDir, "Lib", "site-packages"));

  return { binDirs, libDirs };
}

/** Additive overlay: PATH keeps the service's inherited value via `%PATH%`. */
export function buildServiceEnvironment(paths: RuntimeSearchPaths): Record<string, string> {
  const environment: Record<string, string> = {};
  if (paths.binDirs.length > 0) {
    environment.PATH = `${paths.binDirs.join(";")};%PATH%`;
  }
  if (paths.libDirs.length > 0) {
    environment.PYTHONPATH = paths.libDirs.join(";");
  }
  return environment;
}

export function formatEnvironmentExtra(environment: Record<string, string>): string[] {
  return Object.entries(environment).map(([key, value]) => `${key}=${value}`);
}

/** Parse `nssm get <name> AppEnvironmentExtra` output (one `KEY=value` per line). */
export function parseEnvironmentExtra(output: string): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const idx = line.indexOf("=");
    if (idx <= 0) continue;
    environment[line.slice(0, idx)] = line.slice(idx + 1);
  }
  return environment;
}
