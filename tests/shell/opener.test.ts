import { describe, it, expect, vi } from "vitest";
import {
  SystemOpener,
  openCommandFor,
  runCommand,
} from "../../src/shell/opener.js";
import type { RunOptions } from "../../src/shell/opener.js";

describe("openCommandFor", () => {
  it("uses open on macOS", () => {
    expect(openCommandFor("darwin", "/data/a.pdf")).toEqual({
      command: "open",
      args: ["/data/a.pdf"],
      successCodes: [],
    });
  });

  it("uses explorer.exe on Windows without going through cmd", () => {
    expect(openCommandFor("win32", "C:\\data\\a&calc.pdf")).toEqual({
      command: "explorer.exe",
      args: ["C:\\data\\a&calc.pdf"],
      successCodes: [1],
    });
  });

  it("falls back to xdg-open elsewhere", () => {
    expect(openCommandFor("linux", "/data/a.pdf")).toEqual({
      command: "xdg-open",
      args: ["/data/a.pdf"],
      successCodes: [],
    });
    expect(openCommandFor("freebsd", "/data")).toEqual({
      command: "xdg-open",
      args: ["/data"],
      successCodes: [],
    });
  });
});

describe("SystemOpener", () => {
  it("runs the platform command", async () => {
    const run = vi.fn(async (_command: string, _args: string[], _options?: RunOptions) => {});
    const opener = new SystemOpener({ platform: "darwin", run });

    await opener.open("/data/2025-09-20/_files");

    expect(run).toHaveBeenCalledWith("open", ["/data/2025-09-20/_files"], {
      successCodes: [],
    });
  });

  it("accepts explorer's exit code on Windows", async () => {
    const run = vi.fn(async (_command: string, _args: string[], _options?: RunOptions) => {});
    const opener = new SystemOpener({ platform: "win32", run });

    await opener.open("C:\\data\\a.pdf");

    expect(run).toHaveBeenCalledWith("explorer.exe", ["C:\\data\\a.pdf"], {
      successCodes: [1],
    });
  });

  it("propagates launch failures", async () => {
    const run = vi.fn(async () => {
      throw new Error("spawn xdg-open ENOENT");
    });
    const opener = new SystemOpener({ platform: "linux", run });

    await expect(opener.open("/data/a.txt")).rejects.toThrow("spawn xdg-open ENOENT");
  });
});

describe("runCommand", () => {
  it("rejects when the command does not exist", async () => {
    await expect(runCommand("day-attachments-no-such-command", [])).rejects.toThrow(
      "ENOENT",
    );
  });

  it("rejects a non-zero exit unless it is listed as success", async () => {
    const exitOne = ["-e", "process.exit(1)"];

    await expect(runCommand(process.execPath, exitOne)).rejects.toThrow();
    await expect(
      runCommand(process.execPath, exitOne, { successCodes: [1] }),
    ).resolves.toBeUndefined();
  });
});
