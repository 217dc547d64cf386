import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node:child_process", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:child_process")>();
  return { ...actual, spawn: vi.fn() };
});

import { ChildProcess, spawn } from "node:child_process";
import { ShellCommandRunner } from "../src/wm/launcher.js";

let child: ChildProcess;

beforeEach(() => {
  child = new ChildProcess();
  vi.spyOn(child, "unref").mockImplementation(() => undefined);
  vi.mocked(spawn).mockReset().mockReturnValue(child);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ShellCommandRunner", () => {
  it("spawns the command detached through the shell and lets it go", () => {
    new ShellCommandRunner().run("firefox --new-window");

    expect(spawn).toHaveBeenCalledWith("firefox --new-window", {
      shell: true,
      detached: true,
      stdio: "ignore",
    });
    expect(child.unref).toHaveBeenCalledTimes(1);
    expect(child.listenerCount("error")).toBe(1);
  });

  it("reports a spawn failure instead of crashing", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new ShellCommandRunner().run("firefox");

    child.emit("error", new Error("spawn /bin/sh ENOENT"));
    expect(consoleError).toHaveBeenCalledWith(
      expect.stringContaining('Failed to launch "firefox": spawn /bin/sh ENOENT')
    );
  });
});
