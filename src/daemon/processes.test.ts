import { describe, expect, it, vi } from "vitest";

import type { SpawnResult } from "../process/exec.js";
import {
  createTasklistProbe,
  parseCsvRow,
  parseTasklistOutput,
  resolveImageName,
} from "./processes.js";

const TASKLIST_OUTPUT = [
  "",
  '"python.exe","4120","Services","0","48,212 K"',
  '"python.exe","5188","Services","0","12,004 K"',
  "",
].join("\r\n");

const spawnResult = (stdout: string, code = 0): SpawnResult => ({
  stdout,
  stderr: "",
  code,
  signal: null,
  killed: false,
});

describe("parseCsvRow", () => {
  it("splits quoted fields", () => {
    expect(parseCsvRow('"a","b,c","say ""hi"""')).toEqual(["a", "b,c", 'say "hi"']);
  });

  it("rejects lines that are not CSV", () => {
    expect(parseCsvRow("INFO: No tasks are running which match the specified criteria.")).toBeNull();
    expect(parseCsvRow('"unterminated')).toBeNull();
  });
});

describe("parseTasklistOutput", () => {
  it("parses CSV rows by column", () => {
    expect(parseTasklistOutput(TASKLIST_OUTPUT)).toEqual([
      { imageName: "python.exe", pid: 4120, sessionName: "Services", memUsage: "48,212 K" },
      { imageName: "python.exe", pid: 5188, sessionName: "Services", memUsage: "12,004 K" },
    ]);
  });

  it("parses output from a Russian-language system", () => {
    const output = '"python.exe","7340","Services","0","31 520 КБ"\r\n';
    expect(parseTasklistOutput(output)).toEqual([
      { imageName: "python.exe", pid: 7340, sessionName: "Services", memUsage: "31 520 КБ" },
    ]);
  });

  it("returns nothing for the no-match notice", () => {
    expect(
      parseTasklistOutput("INFO: No tasks are running which match the specified criteria.\r\n"),
    ).toEqual([]);
    expect(
      parseTasklistOutput(
        "ИНФОРМАЦИЯ: Задачи, отвечающие заданным критериям, отсутствуют.\r\n",
      ),
    ).toEqual([]);
  });

  it("skips rows without a numeric PID", () => {
    expect(parseTasklistOutput('"python.exe","N/A","Services","0","0 K"')).toEqual([]);
  });
});

describe("resolveImageName", () => {
  it("takes the Windows basename", () => {
    expect(resolveImageName("C:\\Python311\\python.exe")).toBe("python.exe");
  });
});

describe("createTasklistProbe", () => {
  it("filters by image name", async () => {
    const exec = vi.fn(async () => spawnResult(TASKLIST_OUTPUT));
    const probe = createTasklistProbe({ exec });
    const found = await probe.listByImageName("PYTHON.EXE");
    expect(found.map((proc) => proc.pid)).toEqual([4120, 5188]);
    expect(exec).toHaveBeenCalledWith(
      ["tasklist", "/FI", "IMAGENAME eq PYTHON.EXE", "/FO", "CSV", "/NH"],
      expect.objectContaining({ timeoutMs: 10_000 }),
    );
  });

  it("throws when tasklist fails", async () => {
    const exec = vi.fn(async () => spawnResult("ERROR: Invalid argument/option", 1));
    const probe = createTasklistProbe({ exec });
    await expect(probe.listByImageName("python.exe")).rejects.toThrow(
      "tasklist failed: ERROR: Invalid argument/option",
    );
  });
});
