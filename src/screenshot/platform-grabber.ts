import { isMissingCommand, runCommand, type CommandRunner } from "../desktop/command-runner.js";
import { logger } from "../observability/logger.js";

export type ScreenGrabber = {
  grab: (filePath: string) => Promise<boolean>;
};

function powershellCapture(filePath: string): string {
  const quoted = `'${filePath.replace(/'/g, "''")}'`;
  return [
    "Add-Type -AssemblyName System.Windows.Forms,System.Drawing",
    "$b = [System.Windows.Forms.Screen]::PrimaryScreen.Bounds",
    "$bmp = New-Object System.Drawing.Bitmap $b.Width, $b.Height",
    "$g = [System.Drawing.Graphics]::FromImage($bmp)",
    "$g.CopyFromScreen($b.Location, [System.Drawing.Point]::Empty, $b.Size)",
    `$bmp.Save(${quoted}, [System.Drawing.Imaging.ImageFormat]::Png)`,
  ].join("; ");
}

export class PlatformScreenGrabber implements ScreenGrabber {
  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async grab(filePath: string): Promise<boolean> {
    if (this.platform === "darwin") {
      return this.run("screencapture", ["-i", "-x", filePath]);
    }
    if (this.platform === "win32") {
      return this.run("powershell.exe", [
        "-NoProfile",
        "-NonInteractive",
        "-Command",
        powershellCapture(filePath),
      ]);
    }
    if (this.env.WAYLAND_DISPLAY) {
      const geometry = await this.output("slurp", []);
      if (!geometry) return false;
      return this.run("grim", ["-g", geometry, filePath]);
    }
    return this.run("import", [filePath]);
  }

  private async run(tool: string, args: string[]): Promise<boolean> {
    return (await this.output(tool, args)) !== null;
  }

  private async output(tool: string, args: string[]): Promise<string | null> {
    try {
      const { stdout } = await this.runner(tool, args);
      return stdout.trim();
    } catch (error) {
      if (isMissingCommand(error)) {
        throw new Error(`screenshot_tool_failed:${tool}`);
      }
      logger.info("screen selection cancelled", undefined, { tool, error });
      return null;
    }
  }
}
