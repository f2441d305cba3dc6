import type { AppConfig } from "./config/app.js";
import { copyToClipboard } from "./desktop/clipboard.js";
import { notify } from "./desktop/notifier.js";
import { HistoryStore } from "./history/history-store.js";
import { HotkeyManager, type KeySource } from "./hotkeys/hotkey-manager.js";
import { TerminalKeySource } from "./hotkeys/terminal-key-source.js";
import type { LmConfig } from "./llm/chat-completions.js";
import { logger } from "./observability/logger.js";
import { PlatformScreenGrabber, type ScreenGrabber } from "./screenshot/platform-grabber.js";
import { ScreenshotManager } from "./screenshot/screenshot-manager.js";
import { AskSession, type AskSessionDeps } from "./session/ask-session.js";
import { TerminalWindow } from "./ui/terminal-window.js";
import { createStyler } from "./ui/theme.js";

export type AppIo = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal: boolean;
  color: boolean;
};

export type AppOverrides = {
  io?: AppIo;
  keySource?: KeySource | null;
  grabber?: ScreenGrabber;
  copy?: (text: string) => Promise<void>;
  notify?: (title: string, body: string) => Promise<void>;
  streamChat?: AskSessionDeps["streamChat"];
  exit?: (code: number) => void;
};

export type RunningApp = {
  session: AskSession;
  history: HistoryStore;
  window: TerminalWindow;
  hotkeys: HotkeyManager;
  shutdown: (reason: string) => void;
};

function stdio(): AppIo {
  const terminal = Boolean(process.stdin.isTTY && process.stdout.isTTY);
  return { input: process.stdin, output: process.stdout, terminal, color: terminal };
}

export function buildLmConfig(config: AppConfig): LmConfig {
  if (!config.apiKey) {
    logger.warn("OPENAI_API_KEY is not set; requests are sent without credentials");
  }
  return {
    baseUrl: config.apiUrl,
    model: config.model,
    ...(config.apiKey ? { apiKey: config.apiKey } : {}),
  };
}

export async function startApp(config: AppConfig, overrides: AppOverrides = {}): Promise<RunningApp> {
  const io = overrides.io ?? stdio();
  const exit = overrides.exit ?? ((code: number) => process.exit(code));

  const history = await HistoryStore.open(config.dbPath);
  logger.info("history store opened", undefined, { dbPath: config.dbPath });

  const lm = buildLmConfig(config);
  const session = new AskSession({
    history,
    lm,
    generation: {
      systemPrompt: config.systemPrompt,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      timeoutMs: config.timeoutMs,
      stream: config.stream,
    },
    ...(overrides.streamChat ? { streamChat: overrides.streamChat } : {}),
  });

  const screenshots = new ScreenshotManager(
    config.screenshotsDir,
    overrides.grabber ?? new PlatformScreenGrabber()
  );
  await screenshots.prepare();

  let stopped = false;
  let shutdown: (reason: string) => void = () => undefined;

  const window = new TerminalWindow({
    input: io.input,
    output: io.output,
    terminal: io.terminal,
    session,
    history,
    screenshots,
    copy: overrides.copy ?? ((text) => copyToClipboard(text)),
    notify: overrides.notify ?? ((title, body) => notify(title, body)),
    styler: createStyler(config.theme, { color: io.color }),
    historyPageSize: config.historyPageSize,
    hotkeys: { app: config.appHotkey, screenshot: config.screenshotHotkey },
    onQuit: () => shutdown("quit"),
  });
  window.show();

  const keySource =
    overrides.keySource !== undefined
      ? overrides.keySource
      : io.terminal
        ? new TerminalKeySource(io.input)
        : null;
  const hotkeys = new HotkeyManager(keySource, { debugMode: config.debugHotkeys });
  hotkeys.register(config.appHotkey, () => window.toggle());
  hotkeys.register(config.screenshotHotkey, () => window.captureScreenshot());

  shutdown = (reason) => {
    if (stopped) return;
    stopped = true;
    logger.info("shutting down", undefined, { reason });
    session.stop();
    hotkeys.stop();
    window.close();
    history.close();
    exit(0);
  };

  logger.info("askbar started", undefined, {
    model: config.model,
    appHotkey: config.appHotkey,
    screenshotHotkey: config.screenshotHotkey,
    hotkeyCapture: !config.debugHotkeys && keySource !== null,
  });
  return { session, history, window, hotkeys, shutdown };
}
