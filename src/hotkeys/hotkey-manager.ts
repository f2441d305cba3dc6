import { logger } from "../observability/logger.js";
import {
  formatHotkey,
  matchesHotkey,
  parseHotkey,
  type HotkeyCombo,
  type KeyStroke,
} from "./combo.js";

export type HotkeyCallback = () => void | Promise<void>;

export type KeySource = {
  readonly foldsShift: boolean;
  start: (onStroke: (stroke: KeyStroke) => void) => void;
  stop: () => void;
};

type Registration = {
  combo: HotkeyCombo;
  callback: HotkeyCallback;
};

export class HotkeyManager {
  private readonly registrations = new Map<string, Registration>();
  private attached = false;

  constructor(
    private readonly source: KeySource | null,
    private readonly options: { debugMode: boolean } = { debugMode: false }
  ) {
    if (options.debugMode) {
      logger.info("hotkey capture disabled (debug mode)");
      return;
    }
    if (source) {
      source.start((stroke) => {
        this.dispatch(stroke);
      });
      this.attached = true;
      logger.info("hotkey manager started");
    }
  }

  get debugMode(): boolean {
    return this.options.debugMode;
  }

  register(hotkey: string, callback: HotkeyCallback): boolean {
    let combo: HotkeyCombo;
    try {
      combo = parseHotkey(hotkey);
    } catch (error) {
      logger.error("hotkey registration failed", undefined, { hotkey, error });
      return false;
    }
    const canonical = formatHotkey(combo);
    this.registrations.set(canonical, { combo, callback });
    logger.info(this.options.debugMode ? "hotkey stored without capture" : "hotkey registered", undefined, {
      hotkey: canonical,
    });
    return true;
  }

  unregister(hotkey: string): boolean {
    let canonical: string;
    try {
      canonical = formatHotkey(parseHotkey(hotkey));
    } catch {
      return false;
    }
    const removed = this.registrations.delete(canonical);
    if (removed) logger.info("hotkey removed", undefined, { hotkey: canonical });
    return removed;
  }

  registered(): string[] {
    return [...this.registrations.keys()];
  }

  dispatch(stroke: KeyStroke): number {
    const foldShift = this.source?.foldsShift ?? false;
    let count = 0;
    for (const [hotkey, registration] of this.registrations) {
      if (!matchesHotkey(registration.combo, stroke, { foldShift })) continue;
      count += 1;
      try {
        const result = registration.callback();
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logger.error("hotkey callback failed", undefined, { hotkey, error });
          });
        }
      } catch (error) {
        logger.error("hotkey callback failed", undefined, { hotkey, error });
      }
    }
    return count;
  }

  stop(): void {
    for (const hotkey of this.registered()) {
      this.unregister(hotkey);
    }
    if (this.attached && this.source) {
      this.source.stop();
      this.attached = false;
    }
    logger.info("hotkey manager stopped");
  }
}
