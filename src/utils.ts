import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const windowsAbsolutePath = /^[a-zA-Z]:[\\/]/;
const windowsUncPath = /^\\\\/;

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function isWindowsAbsolutePath(input: string): boolean {
  return windowsAbsolutePath.test(input) || windowsUncPath.test(input);
}

export function isUncPath(input: string): boolean {
  return windowsUncPath.test(input.trim());
}

/** Resolve `~` and relative paths; Windows-absolute paths are kept as written on every host. */
export function resolveUserPath(input: string, cwd: string = process.cwd()): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    const expanded = trimmed.replace(/^~(?=$|[\\/])/, os.homedir());
    return path.resolve(expanded);
  }
  if (isWindowsAbsolutePath(trimmed)) return trimmed;
  return path.resolve(cwd, trimmed);
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}
