import { copyFile, access } from "node:fs/promises";
import { constants } from "node:fs";
import dotenv from "dotenv";

export type EnvFileStatus = "existing" | "created";

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureEnvFile(paths: {
  envPath: string;
  examplePath: string;
}): Promise<EnvFileStatus> {
  if (await exists(paths.envPath)) return "existing";
  if (!(await exists(paths.examplePath))) {
    throw new Error(`config_env_template_missing:${paths.examplePath}`);
  }
  await copyFile(paths.examplePath, paths.envPath, constants.COPYFILE_EXCL);
  return "created";
}

export function loadEnvFile(envPath: string): void {
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw result.error;
  }
}
