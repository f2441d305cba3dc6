import { styleText } from "node:util";
import type { Theme } from "../config/app.js";

type StyleFormat = Parameters<typeof styleText>[0];

type Role = "prompt" | "accent" | "status" | "error" | "muted";

export type Palette = Record<Role, StyleFormat>;

export const PALETTES: Record<Theme, Palette> = {
  dark: {
    prompt: "cyan",
    accent: "bold",
    status: "green",
    error: "red",
    muted: "gray",
  },
  light: {
    prompt: "blue",
    accent: "bold",
    status: "magenta",
    error: "red",
    muted: "dim",
  },
};

export type Styler = Record<Role, (text: string) => string>;

export function createStyler(theme: Theme, options: { color: boolean }): Styler {
  const palette = PALETTES[theme];
  const style = (role: Role) => (text: string) =>
    options.color ? styleText(palette[role], text) : text;
  return {
    prompt: style("prompt"),
    accent: style("accent"),
    status: style("status"),
    error: style("error"),
    muted: style("muted"),
  };
}
