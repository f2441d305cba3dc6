import { logger } from "../observability/logger.js";
import { runCommand, type CommandRunner } from "./command-runner.js";

type ClipboardCommand = { file: string; args: string[] };

export function clipboardCommands(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = process.env
): ClipboardCommand[] {
  if (platform === "darwin") return [{ file: "pbcopy", args: [] }];
  if (platform === "win32") return [{ file: "clip", args: [] }];
  const x11: ClipboardCommand[] = [
    { file: "xclip", args: ["-selection", "clipboard"] },
    { file: "xsel", args: ["--clipboard", "--input"] },
  ];
  return env.WAYLAND_DISPLAY ? [{ file: "wl-copy", args: [] }, ...x11] : x11;
}

export async function copyToClipboard(
  text: string,
  deps: { runner?: CommandRunner; platform?: NodeJS.Platform; env?: NodeJS.ProcessEnv } = {}
): Promise<void> {
  const runner = deps.runner ?? runCommand;
  const platform = deps.platform ?? process.platform;
  for (const command of clipboardCommands(platform, deps.env ?? process.env)) {
    try {
      await runner(command.file, command.args, { input: text, timeoutMs: 5000 });
      logger.debug("copied to clipboard", undefined, { tool: command.file, chars: text.length });
      return;
    } catch (error) {
      logger.debug("clipboard tool failed", undefined, { tool: command.file, error });
    }
  }
  throw new Error(`clipboard_unavailable:${platform}`);
}
