import { execFile } from "node:child_process";
import { logger } from "../observability/logger.js";

export type CommandResult = { stdout: string };

export type RunCommandOptions = {
  input?: string | undefined;
  timeoutMs?: number | undefined;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 120000;

function errorCode(error: Error): string | number | undefined {
  const code: unknown = "code" in error ? error.code : undefined;
  return typeof code === "string" || typeof code === "number" ? code : undefined;
}

export const runCommand: CommandRunner = (file, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      file,
      args,
      { timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS, windowsHide: true },
      (error, stdout) => {
        if (!error) {
          resolve({ stdout: String(stdout) });
          return;
        }
        const code = errorCode(error);
        if (code === "ENOENT") {
          reject(new Error(`command_missing:${file}`));
          return;
        }
        reject(new Error(`command_failed:${file}:${code ?? "unknown"}`));
      }
    );
    if (options.input !== undefined) {
      // A tool may exit before reading its input; the exit status settles the promise.
      child.stdin?.on("error", (error) => {
        logger.debug("command stdin closed early", undefined, { file, error });
      });
      child.stdin?.end(options.input);
    }
  });

export function isMissingCommand(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith("command_missing:");
}
