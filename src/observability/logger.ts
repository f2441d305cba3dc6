import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import type { RequestContext } from "./request-context.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_MAX_CHARS = 2000;
const REDACTED = "[REDACTED]";

export type LogSink = (level: LogLevel, line: string) => void;

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

let threshold: LogLevel = "info";
let sink: LogSink = consoleSink;

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "warning") return "warn";
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

export function configureLogger(options: { level: LogLevel; sink?: LogSink }): void {
  threshold = options.level;
  sink = options.sink ?? consoleSink;
}

/** A line that cannot be appended goes to stderr with the reason. */
export function fileSink(filePath: string): LogSink {
  let dirReady = false;
  return (_level, line) => {
    try {
      if (!dirReady) {
        mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
        dirReady = true;
      }
      appendFileSync(filePath, `${line}\n`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`log write failed (${reason}): ${line}`);
    }
  };
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function readMaxChars(): number {
  const raw = Number(process.env.LOG_MAX_CHARS);
  if (!Number.isFinite(raw)) return DEFAULT_MAX_CHARS;
  return Math.max(100, Math.floor(raw));
}

function replaceSecrets(text: string): string {
  let out = text;
  const apiKey = process.env.OPENAI_API_KEY;
  if (apiKey) {
    out = out.split(apiKey).join(REDACTED);
  }
  out = out.replace(/Bearer\s+[A-Za-z0-9._~+/=-]+/gi, `Bearer ${REDACTED}`);
  return out;
}

export function truncateForLog(text: string, maxChars = readMaxChars()): string {
  if (text.length <= maxChars) return text;
  const suffix = "...[truncated]";
  if (maxChars <= suffix.length) return suffix.slice(0, maxChars);
  return `${text.slice(0, Math.max(0, maxChars - suffix.length))}${suffix}`;
}

export function redactForLog(value: unknown): unknown {
  if (typeof value === "string") {
    return truncateForLog(replaceSecrets(value));
  }
  if (value instanceof Error) {
    return { name: value.name, message: truncateForLog(replaceSecrets(value.message)) };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactForLog(item));
  }
  if (!value || typeof value !== "object") return value;

  const out: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (/authorization|token|api[_-]?key/i.test(key)) {
      out[key] = REDACTED;
      continue;
    }
    out[key] = redactForLog(raw);
  }
  return out;
}

function toPathOnly(endpoint: string): string {
  try {
    const url = new URL(endpoint);
    return url.pathname;
  } catch {
    return endpoint.split("?")[0] ?? endpoint;
  }
}

type LogFields = Record<string, unknown>;

function normalizeFields(fields?: LogFields): LogFields {
  if (!fields) return {};
  const normalized: LogFields = { ...fields };
  const endpoint = normalized["http.endpoint"];
  if (typeof endpoint === "string") {
    normalized["http.endpoint"] = toPathOnly(endpoint);
  }
  const redacted = redactForLog(normalized);
  return redacted && typeof redacted === "object" ? { ...redacted } : {};
}

function emit(level: LogLevel, message: string, ctx?: RequestContext, fields?: LogFields): void {
  if (!isLevelEnabled(level)) return;
  const payload: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(ctx
      ? {
          requestId: ctx.requestId,
          ask: {
            historyId: ctx.historyId,
            model: ctx.model,
            hasScreenshot: ctx.hasScreenshot,
          },
        }
      : {}),
    ...normalizeFields(fields),
  };
  sink(level, JSON.stringify(payload));
}

export const logger = {
  debug(message: string, ctx?: RequestContext, fields?: LogFields): void {
    emit("debug", message, ctx, fields);
  },
  info(message: string, ctx?: RequestContext, fields?: LogFields): void {
    emit("info", message, ctx, fields);
  },
  warn(message: string, ctx?: RequestContext, fields?: LogFields): void {
    emit("warn", message, ctx, fields);
  },
  error(message: string, ctx?: RequestContext, fields?: LogFields): void {
    emit("error", message, ctx, fields);
  },
};
