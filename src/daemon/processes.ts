import path from "node:path";

import { type CommandRunner, runCommandWithTimeout } from "../process/exec.js";

export type WorkerProcess = {
  imageName: string;
  pid: number;
  sessionName?: string;
  memUsage?: string;
};

export type ProcessProbe = {
  listByImageName: (imageName: string) => Promise<WorkerProcess[]>;
};

const TASKLIST_TIMEOUT_MS = 10_000;

/** Split one `/FO CSV` row. Fields are double-quoted; `""` escapes a quote. */
export function parseCsvRow(line: string): string[] | null {
  const fields: string[] = [];
  let i = 0;
  while (i < line.length) {
    if (line[i] !== '"') return null;
    let value = "";
    i += 1;
    for (;;) {
      if (i >= line.length) return null;
      const ch = line[i];
      if (ch === '"') {
        if (line[i + 1] === '"') {
          value += '"';
          i += 2;
          continue;
        }
        i += 1;
        break;
      }
      value += ch;
      i += 1;
    }
    fields.push(value);
    if (i === line.length) break;
    if (line[i] !== ",") return null;
    i += 1;
  }
  return fields;
}

/**
 * Parse `tasklist /FO CSV /NH` output. Columns are positional (image name, PID,
 * session name, session#, mem usage), so localized headers and notices do not matter.
 * Lines that are not CSV rows with a numeric PID are skipped.
 */
export function parseTasklistOutput(output: string): WorkerProcess[] {
  const processes: WorkerProcess[] = [];
  for (const raw of output.split(/\r?\n/)) {
    const fields = parseCsvRow(raw.trim());
    if (!fields || fields.length < 2) continue;
    const [imageName, pidText, sessionName, , memUsage] = fields;
    const pid = /^\d+$/.test(pidText ?? "") ? Number(pidText) : Number.NaN;
    if (!imageName || !Number.isFinite(pid)) continue;
    const proc: WorkerProcess = { imageName, pid };
    if (sessionName) proc.sessionName = sessionName;
    if (memUsage) proc.memUsage = memUsage;
    processes.push(proc);
  }
  return processes;
}

/** `C:\Python311\python.exe` -> `python.exe`. */
export function resolveImageName(executablePath: string): string {
  return path.win32.basename(executablePath.trim());
}

export function createTasklistProbe(opts: { exec?: CommandRunner } = {}): ProcessProbe {
  const exec = opts.exec ?? runCommandWithTimeout;
  return {
    listByImageName: async (imageName) => {
      const res = await exec(
        ["tasklist", "/FI", `IMAGENAME eq ${imageName}`, "/FO", "CSV", "/NH"],
        { timeoutMs: TASKLIST_TIMEOUT_MS },
      );
      if (res.code !== 0) {
        const detail = (res.stderr || res.stdout).trim();
        throw new Error(`tasklist failed${detail ? `: ${detail}` : ""}`);
      }
      const wanted = imageName.toLowerCase();
      return parseTasklistOutput(res.stdout).filter(
        (proc) => proc.imageName.toLowerCase() === wanted,
      );
    },
  };
}
