#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { startApp } from "./app.js";
import { loadAppConfig } from "./config/app.js";
import { ensureEnvFile, loadEnvFile } from "./config/env-file.js";
import { configureLogger, fileSink, logger } from "./observability/logger.js";

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

async function main(): Promise<void> {
  const envPath = path.resolve(".env");
  const envStatus = await ensureEnvFile({
    envPath,
    examplePath: path.join(packageRoot, ".env.example"),
  });
  loadEnvFile(envPath);

  const config = loadAppConfig();
  configureLogger({ level: config.logLevel, sink: fileSink(config.logFile) });
  if (envStatus === "created") {
    logger.info("created .env from .env.example", undefined, { envPath });
  }

  const app = await startApp(config);
  process.once("SIGINT", () => app.shutdown("SIGINT"));
  process.once("SIGTERM", () => app.shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error("startup failed", undefined, { error });
  process.exitCode = 1;
});
