import { emitKeypressEvents, type Key } from "node:readline";
import type { KeyStroke } from "./combo.js";
import { normalizeKeyName } from "./combo.js";
import type { KeySource } from "./hotkey-manager.js";

const CTRL_SPACE_SEQUENCE = "\u0000";

// Alt arrives as an escape prefix (readline `meta`); Super/Cmd is never reported.
export function toKeyStroke(str: string | undefined, key: Key | undefined): KeyStroke | null {
  if (key?.sequence === CTRL_SPACE_SEQUENCE || str === CTRL_SPACE_SEQUENCE) {
    return { ctrl: true, alt: false, shift: false, meta: false, key: "space" };
  }
  const rawName = key?.name ?? (str && str.length === 1 ? str : undefined);
  if (!rawName) return null;
  const name = normalizeKeyName(rawName);
  if (!name) return null;
  return {
    ctrl: Boolean(key?.ctrl),
    alt: Boolean(key?.meta) && name !== "escape",
    shift: Boolean(key?.shift),
    meta: false,
    key: name,
  };
}

export class TerminalKeySource implements KeySource {
  readonly foldsShift = true;
  private listener: ((str: string | undefined, key: Key | undefined) => void) | null = null;

  constructor(private readonly input: NodeJS.ReadableStream = process.stdin) {}

  start(onStroke: (stroke: KeyStroke) => void): void {
    if (this.listener) return;
    emitKeypressEvents(this.input);
    this.listener = (str, key) => {
      const stroke = toKeyStroke(str, key);
      if (stroke) onStroke(stroke);
    };
    this.input.on("keypress", this.listener);
  }

  stop(): void {
    if (!this.listener) return;
    this.input.removeListener("keypress", this.listener);
    this.listener = null;
  }
}
