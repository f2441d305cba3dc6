import { mkdir, readFile, rm } from "node:fs/promises";
import path from "node:path";
import { logger } from "../observability/logger.js";
import { readPngSize } from "./image-file.js";
import type { ScreenGrabber } from "./platform-grabber.js";

export type Screenshot = {
  path: string;
  width: number;
  height: number;
};

// smaller selections count as a cancelled drag
const MIN_REGION_PX = 5;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function screenshotFileName(at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `screenshot_${date}_${time}.png`;
}

async function readIfPresent(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch {
    return null;
  }
}

export class ScreenshotManager {
  private dirReady = false;

  constructor(
    readonly screenshotsDir: string,
    private readonly grabber: ScreenGrabber,
    private readonly now: () => Date = () => new Date()
  ) {}

  async prepare(): Promise<void> {
    if (this.dirReady) return;
    await mkdir(this.screenshotsDir, { recursive: true });
    this.dirReady = true;
  }

  async capture(): Promise<Screenshot | null> {
    await this.prepare();
    const filePath = path.join(this.screenshotsDir, screenshotFileName(this.now()));

    const grabbed = await this.grabber.grab(filePath);
    const data = grabbed ? await readIfPresent(filePath) : null;
    if (!data) {
      logger.info("screenshot selection cancelled");
      return null;
    }

    const size = readPngSize(data);
    if (!size) {
      await rm(filePath, { force: true });
      throw new Error("screenshot_invalid_image");
    }
    if (size.width <= MIN_REGION_PX || size.height <= MIN_REGION_PX) {
      await rm(filePath, { force: true });
      logger.info("screenshot region too small, treated as cancelled", undefined, size);
      return null;
    }

    logger.info("screenshot saved", undefined, { path: filePath, ...size });
    return { path: filePath, ...size };
  }
}
