import fs from "node:fs";
import path from "node:path";

type IsMainModuleOptions = {
  currentFile: string;
  argv?: string[];
  cwd?: string;
};

function normalizePathCandidate(candidate: string | undefined, cwd: string): string | undefined {
  if (!candidate) return undefined;
  const resolved = path.resolve(cwd, candidate);
  try {
    return fs.realpathSync.native(resolved);
  } catch {
    return resolved;
  }
}

/** True when `currentFile` is the script node was started with (npm bin shims resolve through realpath). */
export function isMainModule({
  currentFile,
  argv = process.argv,
  cwd = process.cwd(),
}: IsMainModuleOptions): boolean {
  const current = normalizePathCandidate(currentFile, cwd);
  const invoked = normalizePathCandidate(argv[1], cwd);
  if (!current || !invoked) return false;
  if (current === invoked) return true;
  // Invoked without the extension, e.g. `node dist/src/entry`.
  return current.replace(/\.[cm]?js$/, "") === invoked;
}
