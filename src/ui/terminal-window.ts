import { createInterface, type Interface, type Key } from "node:readline";
import type { HistoryStore } from "../history/history-store.js";
import { logger } from "../observability/logger.js";
import type { Screenshot, ScreenshotManager } from "../screenshot/screenshot-manager.js";
import type { AskSession } from "../session/ask-session.js";
import { parseCommand, type WindowCommand } from "./commands.js";
import { helpText, historyLine, renderExchange } from "./render.js";
import type { Styler } from "./theme.js";

const NOTIFY_BODY_CHARS = 120;

export type WindowDeps = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal: boolean;
  session: AskSession;
  history: Pick<HistoryStore, "list" | "get" | "delete" | "clear">;
  screenshots: Pick<ScreenshotManager, "capture">;
  copy: (text: string) => Promise<void>;
  notify: (title: string, body: string) => Promise<void>;
  styler: Styler;
  historyPageSize: number;
  hotkeys: { app: string; screenshot: string };
  onQuit: () => void;
};

function describeWindowError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (message.startsWith("clipboard_unavailable:")) {
    return "No clipboard tool found (install wl-clipboard, xclip or xsel).";
  }
  if (message.startsWith("screenshot_tool_failed:")) {
    return `Screenshot tool not found: ${message.slice("screenshot_tool_failed:".length)}`;
  }
  if (message === "screenshot_invalid_image") {
    return "The screenshot tool did not produce a PNG image.";
  }
  return message;
}

export class TerminalWindow {
  private readonly rl: Interface;
  private visible = false;
  private closed = false;
  private readonly onKeypress = (_str: string | undefined, key: Key | undefined) => {
    // readline reports a lone Escape with meta set
    if (key?.name === "escape" && !key.ctrl) this.handleEscape();
  };

  constructor(private readonly deps: WindowDeps) {
    this.rl = createInterface({ input: deps.input, output: deps.output, terminal: deps.terminal });
    this.rl.on("line", (line) => {
      this.handleLine(line).catch((error: unknown) => {
        logger.error("window command failed", undefined, { error });
        this.error(describeWindowError(error));
      });
    });
    this.rl.on("close", () => {
      if (!this.closed) {
        this.closed = true;
        deps.onQuit();
      }
    });
    if (deps.terminal) deps.input.on("keypress", this.onKeypress);
  }

  get isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    if (this.closed) return;
    const { styler, session, hotkeys } = this.deps;
    this.visible = true;
    this.writeLine("");
    this.writeLine(styler.accent(`askbar - ${session.model}`));
    this.writeLine(styler.muted(`Escape hides, ${hotkeys.app} toggles, /help lists commands.`));
    this.renderHistory(null);
    this.prompt();
  }

  hide(): void {
    if (this.closed || !this.visible) return;
    this.visible = false;
    this.deps.session.detachScreenshot();
    this.writeLine("");
    this.writeLine(this.deps.styler.muted(`Hidden. Press ${this.deps.hotkeys.app} to show.`));
  }

  toggle(): void {
    if (this.visible) this.hide();
    else this.show();
  }

  handleEscape(): void {
    if (!this.visible) return;
    if (this.deps.session.stop()) return;
    this.hide();
  }

  async captureScreenshot(): Promise<void> {
    if (this.closed) return;
    let shot: Screenshot | null;
    try {
      shot = await this.deps.screenshots.capture();
    } catch (error) {
      logger.error("screenshot failed", undefined, { error });
      this.show();
      this.error(describeWindowError(error));
      return;
    }
    if (!shot) {
      if (!this.visible) this.show();
      this.status("Screenshot cancelled.");
      return;
    }
    this.deps.session.attachScreenshot(shot.path);
    if (!this.visible) this.show();
    this.status(`Screenshot attached (${shot.width}x${shot.height}). Ask a question about it.`);
  }

  async handleLine(line: string): Promise<void> {
    if (!this.visible) {
      logger.debug("input ignored while hidden");
      return;
    }
    await this.run(parseCommand(line));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.input.removeListener("keypress", this.onKeypress);
    this.rl.close();
  }

  private async run(command: WindowCommand): Promise<void> {
    const { session, history, styler } = this.deps;
    switch (command.kind) {
      case "empty":
        this.prompt();
        return;
      case "ask":
        await this.ask(command.query);
        return;
      case "help":
        this.writeLine(helpText(this.deps.hotkeys));
        break;
      case "shot":
        await this.captureScreenshot();
        break;
      case "detach":
        if (session.attachedScreenshot) {
          session.detachScreenshot();
          this.status("Screenshot detached.");
        } else {
          this.status("No screenshot attached.");
        }
        break;
      case "stop":
        if (!session.stop()) this.status("Nothing is being generated.");
        break;
      case "copy":
        await this.copyResponse();
        break;
      case "history":
        this.renderHistory(command.filter);
        break;
      case "open": {
        const item = history.get(command.id);
        if (!item) {
          this.error(`No history item #${command.id}.`);
          break;
        }
        session.showResponse(item.response);
        this.writeLine(renderExchange(item));
        break;
      }
      case "delete":
        if (history.delete(command.id)) this.status(`Deleted #${command.id}.`);
        else this.error(`No history item #${command.id}.`);
        break;
      case "clear-history": {
        const count = history.clear();
        this.status(`Cleared ${count} history item${count === 1 ? "" : "s"}.`);
        break;
      }
      case "hide":
        this.hide();
        return;
      case "quit":
        this.writeLine(styler.muted("Bye."));
        this.close();
        this.deps.onQuit();
        return;
      case "invalid":
        this.error(command.message);
        break;
    }
    this.prompt();
  }

  private async ask(query: string): Promise<void> {
    const { session, styler } = this.deps;
    if (session.state === "generating") {
      this.status("Still answering. Press Escape or type /stop first.");
      return;
    }
    this.writeLine("");
    let wroteText = false;
    const outcome = await session.ask(query, {
      onChunk: (delta) => {
        wroteText = true;
        if (this.visible) this.deps.output.write(delta);
      },
      onComplete: (response) => {
        if (this.visible) {
          this.writeLine("");
        } else {
          this.notifyHidden(response);
        }
      },
      onStopped: () => {
        if (wroteText) this.writeLine("");
        this.writeLine(styler.muted("Generation stopped by user."));
      },
      onError: (message) => {
        if (wroteText) this.writeLine("");
        this.error(message);
      },
    });
    if (outcome && this.visible) this.prompt();
  }

  private async copyResponse(): Promise<void> {
    const text = this.deps.session.currentResponse;
    if (!text) {
      this.status("Nothing to copy yet.");
      return;
    }
    try {
      await this.deps.copy(text);
      this.status("Response copied to clipboard");
    } catch (error) {
      logger.warn("copy failed", undefined, { error });
      this.error(describeWindowError(error));
    }
  }

  private renderHistory(filter: string | null): void {
    const items = this.deps.history.list({
      limit: this.deps.historyPageSize,
      filter: filter ?? undefined,
    });
    if (items.length === 0) {
      this.writeLine(this.deps.styler.muted(filter ? `No history matches "${filter}".` : "No history yet."));
      return;
    }
    for (const item of items) {
      this.writeLine(this.deps.styler.muted(historyLine(item)));
    }
  }

  private notifyHidden(response: string): void {
    const body =
      response.length > NOTIFY_BODY_CHARS ? `${response.slice(0, NOTIFY_BODY_CHARS)}...` : response;
    this.deps.notify("askbar: answer ready", body).catch((error: unknown) => {
      logger.warn("notification failed", undefined, { error });
    });
  }

  private prompt(): void {
    if (this.closed || !this.visible) return;
    const marker = this.deps.session.attachedScreenshot ? "[img] " : "";
    this.rl.setPrompt(this.deps.styler.prompt(`${marker}> `));
    this.rl.prompt();
  }

  private status(text: string): void {
    this.writeLine(this.deps.styler.status(text));
  }

  private error(text: string): void {
    this.writeLine(this.deps.styler.error(text));
  }

  private writeLine(text: string): void {
    if (this.closed) return;
    this.deps.output.write(`${text}\n`);
  }
}
