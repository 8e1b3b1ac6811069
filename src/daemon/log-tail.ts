import fs from "node:fs/promises";

import { isErrno } from "../infra/errors.js";

export type LogTailReader = (file: string, lines: number) => Promise<string[]>;

const DEFAULT_TAIL_BYTES = 64 * 1024;

/**
 * Last `lines` non-empty lines of a log file. Only the trailing `maxBytes` are
 * read, so rotated multi-megabyte logs stay cheap. A missing file yields [].
 */
export async function readLogTail(
  file: string,
  lines: number,
  opts: { maxBytes?: number } = {},
): Promise<string[]> {
  if (lines <= 0) return [];
  const maxBytes = opts.maxBytes ?? DEFAULT_TAIL_BYTES;
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(file, "r");
  } catch (err) {
    if (isErrno(err, "ENOENT")) return [];
    throw err;
  }
  try {
    const { size } = await handle.stat();
    const length = Math.min(size, maxBytes);
    const start = size - length;
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, start);
    let text = buffer.toString("utf8");
    if (start > 0) {
      // Drop the partial first line.
      const newline = text.indexOf("\n");
      text = newline >= 0 ? text.slice(newline + 1) : "";
    }
    const all = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
    return all.slice(-lines);
  } finally {
    await handle.close();
  }
}
