import { describe, it, expect, vi, afterEach } from "vitest";
import { run, VERSION } from "./run";
import { parseArgs } from "./utils/args";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("run()", () => {
  it("prints help for --help and -h instead of running the command", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(run(parseArgs(["choose", "myExp", "--help"]))).resolves.toBe(0);
    await expect(run(parseArgs(["-h", "hash", "example.com"]))).resolves.toBe(0);

    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(String(logSpy.mock.calls[0][0])).toContain("Usage: server-cx <command>");
    expect(String(logSpy.mock.calls[1][0])).toContain("Usage: server-cx <command>");
  });

  it("prints the version", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(run(parseArgs(["--version"]))).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith(`server-cx v${VERSION}`);
  });

  it("runs the hash command", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(run(parseArgs(["--debug", "hash", "Example.com"]))).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith("60493049");
  });

  it("exits with 1 on an unknown command", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await expect(run(parseArgs(["frobnicate"]))).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Unknown command: frobnicate");
  });
});
