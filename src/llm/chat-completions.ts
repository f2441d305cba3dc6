import { logger } from "../observability/logger.js";
import type { RequestContext } from "../observability/request-context.js";
import { buildHttpErrorMessage, isAbortError, normalizeRequestError } from "./errors.js";
import type { ChatMessage } from "./messages.js";
import { SSE_DONE, SseDecoder } from "./sse.js";

export type LmConfig = {
  baseUrl: string;
  apiKey?: string;
  model: string;
};

export type ChatCompletionOptions = {
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
  requestContext?: RequestContext | undefined;
};

type ChatRequestBody = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  stream: boolean;
};

type ChatCompletionChoice = {
  message?: { content?: string | null };
  delta?: { content?: string | null };
  finish_reason?: string | null;
};

export type ChatCompletionResponse = {
  choices?: ChatCompletionChoice[];
  error?: { message?: string };
  [key: string]: unknown;
};

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TIMEOUT_MS = 60000;

export function buildChatRequestBody(
  cfg: LmConfig,
  messages: ChatMessage[],
  opts: { temperature?: number | undefined; maxTokens?: number | undefined; stream?: boolean } = {}
): ChatRequestBody {
  return {
    model: cfg.model,
    messages,
    temperature: opts.temperature ?? DEFAULT_TEMPERATURE,
    max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
    stream: opts.stream ?? false,
  };
}

export function buildRequestHeaders(cfg: LmConfig): Record<string, string> {
  return {
    "Content-Type": "application/json",
    ...(cfg.apiKey ? { Authorization: `Bearer ${cfg.apiKey}` } : {}),
    ...(cfg.baseUrl.includes("openrouter.ai") ? { "X-Title": "askbar" } : {}),
  };
}

function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function postChatCompletion(
  cfg: LmConfig,
  body: ChatRequestBody,
  opts: ChatCompletionOptions
): Promise<Response> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort();
  if (opts.signal?.aborted) controller.abort();
  opts.signal?.addEventListener("abort", forwardAbort, { once: true });

  const endpoint = `${cfg.baseUrl}/chat/completions`;
  const startedAt = Date.now();
  let res: Response;
  try {
    res = await fetch(endpoint, {
      method: "POST",
      headers: buildRequestHeaders(cfg),
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (error) {
    if (timedOut) throw new Error(`llm_timeout:${timeoutMs}`);
    if (opts.signal?.aborted || isAbortError(error)) throw error;
    throw normalizeRequestError(error);
  } finally {
    clearTimeout(timeoutId);
  }

  logger.debug("chat completion response headers", opts.requestContext, {
    "http.endpoint": endpoint,
    "http.status": res.status,
    durationMs: Date.now() - startedAt,
    stream: body.stream,
  });

  if (!res.ok) {
    opts.signal?.removeEventListener("abort", forwardAbort);
    const text = await res.text();
    throw new Error(buildHttpErrorMessage(res.status, text, cfg.apiKey ?? ""));
  }
  return res;
}

export function extractMessageText(resp: ChatCompletionResponse): string {
  const content = resp.choices?.[0]?.message?.content;
  return typeof content === "string" ? content : "";
}

export async function createChatCompletion(
  cfg: LmConfig,
  messages: ChatMessage[],
  opts: ChatCompletionOptions = {}
): Promise<string> {
  const body = buildChatRequestBody(cfg, messages, { ...opts, stream: false });
  const res = await postChatCompletion(cfg, body, opts);
  let parsed: unknown;
  try {
    parsed = await res.json();
  } catch (error) {
    if (opts.signal?.aborted) throw error;
    throw new Error("llm_invalid_json");
  }
  if (!isChatCompletionResponse(parsed)) {
    throw new Error("llm_invalid_json");
  }
  return extractMessageText(parsed);
}

type StreamEventResult = { text: string; finished: boolean };

function readStreamEvent(data: string, ctx?: RequestContext): StreamEventResult | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    logger.warn("skipping undecodable stream event", ctx, { data });
    return null;
  }
  if (!isChatCompletionResponse(parsed)) return null;
  if (parsed.error) {
    throw new Error(`llm_stream_error:${parsed.error.message ?? "unknown"}`);
  }
  const choice = parsed.choices?.[0];
  const content = choice?.delta?.content;
  const finishReason = choice?.finish_reason;
  if (typeof finishReason === "string") {
    logger.info("generation finished", ctx, { finishReason });
  }
  return {
    text: typeof content === "string" ? content : "",
    finished: typeof finishReason === "string",
  };
}

// Aborting opts.signal ends the stream without an error.
export async function* streamChatCompletion(
  cfg: LmConfig,
  messages: ChatMessage[],
  opts: ChatCompletionOptions = {}
): AsyncGenerator<string, void, undefined> {
  const body = buildChatRequestBody(cfg, messages, { ...opts, stream: true });
  let res: Response;
  try {
    res = await postChatCompletion(cfg, body, opts);
  } catch (error) {
    if (opts.signal?.aborted) return;
    throw error;
  }
  if (!res.body) {
    throw new Error("llm_stream_error:empty response body");
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  const sse = new SseDecoder();
  const cancelRead = () => {
    reader.cancel().catch((error: unknown) => {
      logger.debug("stream cancel failed", opts.requestContext, { error });
    });
  };
  const readChunk = async () => {
    try {
      return await reader.read();
    } catch (error) {
      if (opts.signal?.aborted) return null;
      throw new Error(
        `llm_stream_error:${error instanceof Error ? error.message : String(error)}`
      );
    }
  };
  opts.signal?.addEventListener("abort", cancelRead, { once: true });

  let finished = false;
  try {
    while (!finished) {
      const chunk = await readChunk();
      if (!chunk || opts.signal?.aborted) {
        logger.info("generation cancelled", opts.requestContext);
        return;
      }
      const events = chunk.done
        ? sse.end()
        : sse.push(decoder.decode(chunk.value, { stream: true }));
      for (const data of events) {
        if (data.trim() === SSE_DONE) {
          finished = true;
          break;
        }
        const event = readStreamEvent(data, opts.requestContext);
        if (!event) continue;
        if (event.text) yield event.text;
        if (event.finished) {
          finished = true;
          break;
        }
      }
      if (chunk.done) finished = true;
    }
  } finally {
    opts.signal?.removeEventListener("abort", cancelRead);
    await reader.cancel().catch((error: unknown) => {
      logger.debug("stream cancel failed", opts.requestContext, { error });
    });
    reader.releaseLock();
  }
}
