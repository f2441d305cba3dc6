import { z } from "zod";
import { parseLogLevel, type LogLevel } from "../observability/logger.js";
import { formatHotkey, parseHotkey } from "../hotkeys/combo.js";

export type Theme = "dark" | "light";

const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant. Answer briefly and to the point.";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function optionalTrimmed() {
  return z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    });
}

function numberFrom(defaultValue: number, schema: z.ZodNumber) {
  return optionalTrimmed().pipe(z.coerce.number().pipe(schema).default(defaultValue));
}

const booleanFlag = (defaultValue: boolean) =>
  optionalTrimmed().pipe(
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return defaultValue;
        const lower = value.toLowerCase();
        if (TRUE_VALUES.has(lower)) return true;
        if (FALSE_VALUES.has(lower)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
        return z.NEVER;
      })
  );

const hotkeyString = (defaultValue: string) =>
  optionalTrimmed().transform((value, ctx) => {
    const raw = value ?? defaultValue;
    try {
      return formatHotkey(parseHotkey(raw));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid key combination "${raw}"` });
      return z.NEVER;
    }
  });

export const appEnvSchema = z.object({
  OPENAI_API_KEY: optionalTrimmed().transform((value) => value ?? ""),
  OPENAI_API_URL: optionalTrimmed()
    .pipe(z.string().url().default("https://api.openai.com/v1"))
    .transform((value) => value.replace(/\/+$/, "")),
  OPENAI_MODEL: optionalTrimmed().pipe(z.string().min(1).default("gpt-4o-mini")),
  OPENAI_TIMEOUT_MS: numberFrom(60000, z.number().int().min(1000).max(600000)),
  SYSTEM_PROMPT: optionalTrimmed().transform((value) => value ?? DEFAULT_SYSTEM_PROMPT),
  TEMPERATURE: numberFrom(0.7, z.number().min(0).max(2)),
  MAX_TOKENS: numberFrom(1000, z.number().int().positive()),
  STREAM_RESPONSES: booleanFlag(true),
  THEME: z
    .string()
    .optional()
    .transform((value): Theme => (value?.trim().toLowerCase() === "light" ? "light" : "dark")),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value): LogLevel => parseLogLevel(value)),
  DEBUG_HOTKEYS: z
    .string()
    .optional()
    .transform((value) => ["1", "true", "yes"].includes((value ?? "").trim().toLowerCase())),
  SCREENSHOTS_DIR: optionalTrimmed().transform((value) => value ?? "data/screenshots"),
  DB_PATH: optionalTrimmed().transform((value) => value ?? "data/history.db"),
  LOG_FILE: optionalTrimmed().transform((value) => value ?? "data/askbar.log"),
  APP_HOTKEY: hotkeyString("ctrl+shift+space"),
  SCREENSHOT_HOTKEY: hotkeyString("ctrl+shift+s"),
  HISTORY_PAGE_SIZE: numberFrom(10, z.number().int().min(1).max(100)),
});

export type AppConfig = Readonly<{
  apiKey: string;
  apiUrl: string;
  model: string;
  timeoutMs: number;
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  stream: boolean;
  theme: Theme;
  logLevel: LogLevel;
  debugHotkeys: boolean;
  screenshotsDir: string;
  dbPath: string;
  logFile: string;
  appHotkey: string;
  screenshotHotkey: string;
  historyPageSize: number;
}>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    .join("; ");
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`config_invalid:${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return Object.freeze({
    apiKey: e.OPENAI_API_KEY,
    apiUrl: e.OPENAI_API_URL,
    model: e.OPENAI_MODEL,
    timeoutMs: e.OPENAI_TIMEOUT_MS,
    systemPrompt: e.SYSTEM_PROMPT,
    temperature: e.TEMPERATURE,
    maxTokens: e.MAX_TOKENS,
    stream: e.STREAM_RESPONSES,
    theme: e.THEME,
    logLevel: e.LOG_LEVEL,
    debugHotkeys: e.DEBUG_HOTKEYS,
    screenshotsDir: e.SCREENSHOTS_DIR,
    dbPath: e.DB_PATH,
    logFile: e.LOG_FILE,
    appHotkey: e.APP_HOTKEY,
    screenshotHotkey: e.SCREENSHOT_HOTKEY,
    historyPageSize: e.HISTORY_PAGE_SIZE,
  });
}
