import { readFile } from "node:fs/promises";
import { logger } from "../observability/logger.js";

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export type ImageSize = { width: number; height: number };

export function readPngSize(buffer: Buffer): ImageSize | null {
  if (buffer.length < 24) return null;
  if (!buffer.subarray(0, 8).equals(PNG_SIGNATURE)) return null;
  if (buffer.toString("ascii", 12, 16) !== "IHDR") return null;
  return {
    width: buffer.readUInt32BE(16),
    height: buffer.readUInt32BE(20),
  };
}

export async function readImageBase64(imagePath: string): Promise<string | null> {
  try {
    const data = await readFile(imagePath);
    return data.toString("base64");
  } catch (error) {
    logger.error("failed to encode image as base64", undefined, { imagePath, error });
    return null;
  }
}
