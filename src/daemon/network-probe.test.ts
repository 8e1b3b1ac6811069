import { describe, expect, it, vi } from "vitest";

import type { CommandOptions, SpawnResult } from "../process/exec.js";
import { createNetworkProbe, isAlreadyConnected, resolveShareRoot } from "./network-probe.js";

const spawnResult = (stdout: string, code = 0, stderr = ""): SpawnResult => ({
  stdout,
  stderr,
  code,
  signal: null,
  killed: false,
});

const credential = { username: "svc", password: "test-secret" };

describe("resolveShareRoot", () => {
  it("keeps host and share only", () => {
    expect(resolveShareRoot("\\\\fileserver\\tc2\\incoming\\today")).toBe("\\\\fileserver\\tc2");
    expect(resolveShareRoot("\\\\fileserver")).toBeNull();
    expect(resolveShareRoot("D:\\data")).toBeNull();
  });
});

describe("isAlreadyConnected", () => {
  it("matches the already-connected wording", () => {
    expect(isAlreadyConnected("The local device name is already connected.")).toBe(true);
    expect(isAlreadyConnected("Локальное устройство уже подключено.")).toBe(true);
    expect(isAlreadyConnected("System error 53 has occurred.")).toBe(false);
  });

  it("does not treat a credential conflict as connected", () => {
    expect(
      isAlreadyConnected(
        "System error 1219 has occurred.\r\n\r\nMultiple connections to a server or shared resource by the same user, using more than one user name, are not allowed.",
      ),
    ).toBe(false);
  });
});

describe("createNetworkProbe", () => {
  it("skips when nothing is configured", async () => {
    const probe = createNetworkProbe({ exec: vi.fn(), access: vi.fn() });
    await expect(probe(undefined, credential)).resolves.toEqual({
      status: "skipped",
      detail: "no network resource configured",
    });
  });

  it("mounts the share under the account before accessing it", async () => {
    const exec = vi.fn(async (_argv: string[], _opts: CommandOptions) =>
      spawnResult("The command completed successfully."),
    );
    const access = vi.fn(async () => {});
    const probe = createNetworkProbe({ exec, access });

    await expect(probe("\\\\fileserver\\tc2\\in", credential)).resolves.toEqual({
      status: "ok",
      path: "\\\\fileserver\\tc2\\in",
    });
    expect(exec.mock.calls[0]?.[0]).toEqual([
      "net",
      "use",
      "\\\\fileserver\\tc2",
      "/user:svc",
      "test-secret",
      "/persistent:no",
    ]);
    expect(access).toHaveBeenCalledWith("\\\\fileserver\\tc2\\in");
  });

  it("counts an existing connection as mounted", async () => {
    const exec = vi.fn(async () =>
      spawnResult("", 2, "System error 85 has occurred.\r\n\r\nThe local device name is already connected."),
    );
    const probe = createNetworkProbe({ exec, access: async () => {} });
    await expect(probe("\\\\fileserver\\tc2", credential)).resolves.toEqual({
      status: "ok",
      path: "\\\\fileserver\\tc2",
    });
  });

  it("warns when the share is held under other credentials", async () => {
    const access = vi.fn(async () => {});
    const exec = vi.fn(async () => spawnResult("", 2, "System error 1219 has occurred."));
    const probe = createNetworkProbe({ exec, access });
    await expect(probe("\\\\fileserver\\tc2", credential)).resolves.toEqual({
      status: "warning",
      path: "\\\\fileserver\\tc2",
      detail: "net use \\\\fileserver\\tc2 failed: System error 1219 has occurred.",
    });
    expect(access).not.toHaveBeenCalled();
  });

  it("warns when the mount fails", async () => {
    const access = vi.fn(async () => {});
    const exec = vi.fn(async () => spawnResult("", 2, "System error 1326 has occurred."));
    const probe = createNetworkProbe({ exec, access });
    await expect(probe("\\\\fileserver\\tc2", credential)).resolves.toEqual({
      status: "warning",
      path: "\\\\fileserver\\tc2",
      detail: "net use \\\\fileserver\\tc2 failed: System error 1326 has occurred.",
    });
    expect(access).not.toHaveBeenCalled();
  });

  it("warns when a local path is unreachable", async () => {
    const exec = vi.fn();
    const probe = createNetworkProbe({
      exec,
      access: async () => {
        throw new Error("ENOENT: no such file or directory");
      },
    });
    await expect(probe("D:\\tc2", credential)).resolves.toEqual({
      status: "warning",
      path: "D:\\tc2",
      detail: "ENOENT: no such file or directory",
    });
    expect(exec).not.toHaveBeenCalled();
  });
});
