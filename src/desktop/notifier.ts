import { logger } from "../observability/logger.js";
import { runCommand, type CommandRunner } from "./command-runner.js";

const APP_NAME = "askbar";

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function notificationCommand(
  platform: NodeJS.Platform,
  title: string,
  body: string
): { file: string; args: string[] } | null {
  if (platform === "linux") {
    return { file: "notify-send", args: ["--app-name", APP_NAME, title, body] };
  }
  if (platform === "darwin") {
    return {
      file: "osascript",
      args: ["-e", `display notification ${appleScriptString(body)} with title ${appleScriptString(title)}`],
    };
  }
  return null;
}

export async function notify(
  title: string,
  body: string,
  deps: { runner?: CommandRunner; platform?: NodeJS.Platform } = {}
): Promise<void> {
  const command = notificationCommand(deps.platform ?? process.platform, title, body);
  if (!command) {
    logger.debug("notifications unsupported on this platform", undefined, { title });
    return;
  }
  try {
    await (deps.runner ?? runCommand)(command.file, command.args, { timeoutMs: 5000 });
  } catch (error) {
    logger.warn("notification failed", undefined, { tool: command.file, error });
  }
}
