import { existsSync } from "node:fs";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { readPngSize } from "../src/screenshot/image-file.js";
import type { ScreenGrabber } from "../src/screenshot/platform-grabber.js";
import { ScreenshotManager, screenshotFileName } from "../src/screenshot/screenshot-manager.js";
import { pngHeader } from "./helpers/png.js";

const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "screenshots-"));
  dirs.push(dir);
  return dir;
}

function grabberWriting(content: Buffer | null): ScreenGrabber {
  return {
    grab: vi.fn(async (filePath: string) => {
      if (!content) return false;
      await writeFile(filePath, content);
      return true;
    }),
  };
}

const fixedNow = () => new Date(2026, 2, 1, 9, 5, 7);

afterEach(async () => {
  vi.restoreAllMocks();
  while (dirs.length > 0) {
    const dir = dirs.pop();
    if (dir) await rm(dir, { recursive: true, force: true });
  }
});

describe("screenshotFileName", () => {
  test("uses local date and time", () => {
    expect(screenshotFileName(fixedNow())).toBe("screenshot_20260301_090507.png");
  });
});

describe("readPngSize", () => {
  test("reads dimensions from the header", () => {
    expect(readPngSize(pngHeader(640, 480))).toEqual({ width: 640, height: 480 });
  });

  test("rejects other data", () => {
    expect(readPngSize(Buffer.from("GIF89a-not-a-png-at-all-really"))).toBeNull();
  });
});

describe("ScreenshotManager", () => {
  test("creates the directory and returns the saved region", async () => {
    const dir = path.join(await tempDir(), "shots");
    const manager = new ScreenshotManager(dir, grabberWriting(pngHeader(320, 200)), fixedNow);

    const shot = await manager.capture();

    expect(shot).toEqual({
      path: path.join(dir, "screenshot_20260301_090507.png"),
      width: 320,
      height: 200,
    });
    expect(existsSync(path.join(dir, "screenshot_20260301_090507.png"))).toBe(true);
  });

  test("returns null when the selection is cancelled", async () => {
    const dir = await tempDir();
    const manager = new ScreenshotManager(dir, grabberWriting(null), fixedNow);
    await expect(manager.capture()).resolves.toBeNull();
  });

  test("treats a region of five pixels or less as cancelled and removes the file", async () => {
    const dir = await tempDir();
    const manager = new ScreenshotManager(dir, grabberWriting(pngHeader(5, 300)), fixedNow);

    await expect(manager.capture()).resolves.toBeNull();
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  test("rejects files that are not png images", async () => {
    const dir = await tempDir();
    const manager = new ScreenshotManager(
      dir,
      grabberWriting(Buffer.from("definitely not an image file")),
      fixedNow
    );

    await expect(manager.capture()).rejects.toThrow("screenshot_invalid_image");
    await expect(readdir(dir)).resolves.toEqual([]);
  });
});
