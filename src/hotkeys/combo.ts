export type HotkeyCombo = {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
  key: string;
};

export type KeyStroke = HotkeyCombo;

type Modifier = "ctrl" | "alt" | "shift" | "meta";

const MODIFIER_ALIASES: Record<string, Modifier> = {
  ctrl: "ctrl",
  control: "ctrl",
  alt: "alt",
  option: "alt",
  shift: "shift",
  meta: "meta",
  cmd: "meta",
  command: "meta",
  super: "meta",
  win: "meta",
};

const KEY_ALIASES: Record<string, string> = {
  return: "enter",
  esc: "escape",
  del: "delete",
  spacebar: "space",
};

const NAMED_KEYS = new Set([
  "space",
  "enter",
  "tab",
  "escape",
  "backspace",
  "delete",
  "up",
  "down",
  "left",
  "right",
]);

export function normalizeKeyName(token: string): string | null {
  const lower = token.toLowerCase();
  const aliased = KEY_ALIASES[lower] ?? lower;
  if (NAMED_KEYS.has(aliased)) return aliased;
  if (/^f([1-9]|1[0-9]|2[0-4])$/.test(aliased)) return aliased;
  if (/^[a-z0-9]$/.test(aliased)) return aliased;
  if (aliased.length === 1 && /[!-/:-@[-`{-~]/.test(aliased)) return aliased;
  return null;
}

// `ctrl++` binds the plus key
export function parseHotkey(text: string): HotkeyCombo {
  const raw = text.trim();
  const tokens = raw.endsWith("++")
    ? [...raw.slice(0, -2).split("+"), "+"]
    : raw.split("+");

  const combo: HotkeyCombo = { ctrl: false, alt: false, shift: false, meta: false, key: "" };
  for (const token of tokens.map((t) => t.trim())) {
    if (!token) throw new Error(`hotkey_invalid:${text}`);
    const modifier = MODIFIER_ALIASES[token.toLowerCase()];
    if (modifier) {
      combo[modifier] = true;
      continue;
    }
    const key = normalizeKeyName(token);
    if (!key || combo.key) throw new Error(`hotkey_invalid:${text}`);
    combo.key = key;
  }
  if (!combo.key) throw new Error(`hotkey_invalid:${text}`);
  return combo;
}

export function formatHotkey(combo: HotkeyCombo): string {
  const parts: string[] = [];
  if (combo.ctrl) parts.push("ctrl");
  if (combo.alt) parts.push("alt");
  if (combo.shift) parts.push("shift");
  if (combo.meta) parts.push("meta");
  parts.push(combo.key);
  return parts.join("+");
}

export type MatchOptions = {
  // Shift is not required while Ctrl is held.
  foldShift?: boolean;
};

export function matchesHotkey(
  combo: HotkeyCombo,
  stroke: KeyStroke,
  options: MatchOptions = {}
): boolean {
  if (combo.key !== stroke.key) return false;
  if (combo.ctrl !== stroke.ctrl || combo.alt !== stroke.alt || combo.meta !== stroke.meta) {
    return false;
  }
  if (combo.shift === stroke.shift) return true;
  return Boolean(options.foldShift) && combo.ctrl && combo.shift && !stroke.shift;
}
