import { describe, expect, test } from "vitest";
import { formatHotkey, matchesHotkey, parseHotkey } from "../src/hotkeys/combo.js";

describe("parseHotkey", () => {
  test("parses modifiers and key case-insensitively", () => {
    expect(parseHotkey("Ctrl+Shift+Space")).toEqual({
      ctrl: true,
      alt: false,
      shift: true,
      meta: false,
      key: "space",
    });
  });

  test("accepts modifier and key aliases", () => {
    expect(formatHotkey(parseHotkey("cmd+option+Return"))).toBe("alt+meta+enter");
    expect(formatHotkey(parseHotkey("control+esc"))).toBe("ctrl+escape");
    expect(formatHotkey(parseHotkey("shift+F12"))).toBe("shift+f12");
  });

  test("supports a literal plus key", () => {
    expect(formatHotkey(parseHotkey("ctrl++"))).toBe("ctrl++");
  });

  test("rejects combinations without exactly one key", () => {
    expect(() => parseHotkey("ctrl+shift")).toThrow("hotkey_invalid:ctrl+shift");
    expect(() => parseHotkey("ctrl+a+b")).toThrow("hotkey_invalid:ctrl+a+b");
    expect(() => parseHotkey("ctrl+pagedown")).toThrow("hotkey_invalid:ctrl+pagedown");
    expect(() => parseHotkey("")).toThrow("hotkey_invalid:");
  });
});

describe("matchesHotkey", () => {
  const combo = parseHotkey("ctrl+shift+s");

  test("requires identical modifiers by default", () => {
    expect(matchesHotkey(combo, { ctrl: true, alt: false, shift: true, meta: false, key: "s" })).toBe(
      true
    );
    expect(matchesHotkey(combo, { ctrl: true, alt: false, shift: false, meta: false, key: "s" })).toBe(
      false
    );
  });

  test("folds shift into ctrl chords when asked", () => {
    const stroke = { ctrl: true, alt: false, shift: false, meta: false, key: "s" };
    expect(matchesHotkey(combo, stroke, { foldShift: true })).toBe(true);
    expect(matchesHotkey(parseHotkey("shift+s"), { ...stroke, ctrl: false }, { foldShift: true })).toBe(
      false
    );
  });

  test("never matches a different key", () => {
    expect(
      matchesHotkey(combo, { ctrl: true, alt: false, shift: true, meta: false, key: "d" }, { foldShift: true })
    ).toBe(false);
  });
});
