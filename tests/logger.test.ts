import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import {
  configureLogger,
  fileSink,
  isLevelEnabled,
  logger,
  parseLogLevel,
  redactForLog,
  truncateForLog,
} from "../src/observability/logger.js";

describe("logger helpers", () => {
  const originalKey = process.env.OPENAI_API_KEY;

  afterEach(() => {
    if (originalKey === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = originalKey;
    configureLogger({ level: "info" });
    vi.restoreAllMocks();
  });

  test("redacts api key values and authorization headers", () => {
    process.env.OPENAI_API_KEY = "test-secret";
    const input = {
      Authorization: "Bearer test-secret",
      nested: { apiKey: "test-secret", text: "hello test-secret world" },
    };
    const out = redactForLog(input) as {
      Authorization: string;
      nested: { apiKey: string; text: string };
    };

    expect(out.Authorization).toBe("[REDACTED]");
    expect(out.nested.apiKey).toBe("[REDACTED]");
    expect(out.nested.text).toBe("hello [REDACTED] world");
  });

  test("serializes errors by name and message", () => {
    const out = redactForLog(new Error("llm_timeout:1000"));
    expect(out).toEqual({ name: "Error", message: "llm_timeout:1000" });
  });

  test("truncate limits long text", () => {
    const out = truncateForLog("a".repeat(50), 20);
    expect(out).toBe(`${"a".repeat(6)}...[truncated]`);
  });

  test("parses log levels case-insensitively with an info fallback", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("Warning")).toBe("warn");
    expect(parseLogLevel("error")).toBe("error");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });

  test("drops lines below the configured threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    configureLogger({ level: "warn" });

    logger.info("hidden");
    logger.warn("shown", undefined, { "http.endpoint": "https://api.example.test/v1/chat/completions?x=1" });

    expect(isLevelEnabled("info")).toBe(false);
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(warn.mock.calls[0]?.[0])) as Record<string, unknown>;
    expect(line.level).toBe("warn");
    expect(line.message).toBe("shown");
    expect(line["http.endpoint"]).toBe("/v1/chat/completions");
  });
});

describe("log sinks", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    configureLogger({ level: "info" });
    vi.restoreAllMocks();
    while (dirs.length > 0) {
      const dir = dirs.pop();
      if (dir) await rm(dir, { recursive: true, force: true });
    }
  });

  test("a custom sink receives the level and the JSON line instead of the console", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const lines: Array<[string, string]> = [];
    configureLogger({ level: "info", sink: (level, line) => lines.push([level, line]) });

    logger.info("generation finished");

    expect(log).not.toHaveBeenCalled();
    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe("info");
    const parsed = JSON.parse(lines[0]?.[1] ?? "{}") as Record<string, unknown>;
    expect(parsed.message).toBe("generation finished");
  });

  test("the file sink appends lines and creates the directory", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "askbar-log-"));
    dirs.push(dir);
    const filePath = path.join(dir, "nested", "askbar.log");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    configureLogger({ level: "debug", sink: fileSink(filePath) });

    logger.debug("first");
    logger.info("second");

    expect(log).not.toHaveBeenCalled();
    const written = (await readFile(filePath, "utf8")).trim().split("\n");
    expect(written.map((line) => (JSON.parse(line) as { message: string }).message)).toEqual([
      "first",
      "second",
    ]);
  });
});
