import { describe, expect, test, vi } from "vitest";
import type { CommandRunner } from "../src/desktop/command-runner.js";
import { PlatformScreenGrabber } from "../src/screenshot/platform-grabber.js";

function runnerReturning(outputs: Record<string, string | Error>) {
  const runner = vi.fn<CommandRunner>(async (file) => {
    const out = outputs[file];
    if (out instanceof Error) throw out;
    return { stdout: out ?? "" };
  });
  return runner;
}

describe("PlatformScreenGrabber", () => {
  test("uses interactive screencapture on macOS", async () => {
    const runner = runnerReturning({});
    const grabber = new PlatformScreenGrabber(runner, "darwin", {});

    await expect(grabber.grab("/tmp/a.png")).resolves.toBe(true);
    expect(runner).toHaveBeenCalledWith("screencapture", ["-i", "-x", "/tmp/a.png"]);
  });

  test("pipes the slurp geometry into grim on Wayland", async () => {
    const runner = runnerReturning({ slurp: "10,20 300x200\n" });
    const grabber = new PlatformScreenGrabber(runner, "linux", { WAYLAND_DISPLAY: "wayland-0" });

    await expect(grabber.grab("/tmp/a.png")).resolves.toBe(true);
    expect(runner).toHaveBeenLastCalledWith("grim", ["-g", "10,20 300x200", "/tmp/a.png"]);
  });

  test("treats a failed selection as cancellation", async () => {
    const runner = runnerReturning({ slurp: new Error("command_failed:slurp:1") });
    const grabber = new PlatformScreenGrabber(runner, "linux", { WAYLAND_DISPLAY: "wayland-0" });

    await expect(grabber.grab("/tmp/a.png")).resolves.toBe(false);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  test("reports a missing tool", async () => {
    const runner = runnerReturning({ import: new Error("command_missing:import") });
    const grabber = new PlatformScreenGrabber(runner, "linux", {});

    await expect(grabber.grab("/tmp/a.png")).rejects.toThrow("screenshot_tool_failed:import");
  });

  test("escapes the output path in the PowerShell capture script", async () => {
    const runner = runnerReturning({});
    const grabber = new PlatformScreenGrabber(runner, "win32", {});

    await grabber.grab("C:\\Users\\o'neil\\shot.png");
    const args = runner.mock.calls[0]?.[1] ?? [];
    expect(args.slice(0, 3)).toEqual(["-NoProfile", "-NonInteractive", "-Command"]);
    expect(args[3]).toContain("$bmp.Save('C:\\Users\\o''neil\\shot.png', [System.Drawing.Imaging.ImageFormat]::Png)");
  });
});
