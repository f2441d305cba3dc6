import type { HistoryStore } from "../history/history-store.js";
import {
  createChatCompletion,
  streamChatCompletion,
  type ChatCompletionOptions,
  type LmConfig,
} from "../llm/chat-completions.js";
import { describeLmError } from "../llm/errors.js";
import { buildAskMessages, type ChatMessage } from "../llm/messages.js";
import { logger } from "../observability/logger.js";
import {
  buildRequestContext,
  withHistoryId,
  type RequestContext,
} from "../observability/request-context.js";

export const GENERATING_PLACEHOLDER = "[Generating...]";
export const STOP_MARKER = "*Generation stopped by user*";

export type SessionState = "idle" | "generating";

export type AskStatus = "completed" | "stopped" | "failed";

export type AskOutcome = {
  status: AskStatus;
  response: string;
  historyId: number;
};

export type AskListener = {
  onChunk?: (delta: string) => void;
  onComplete?: (response: string) => void;
  onStopped?: (partial: string) => void;
  onError?: (message: string, error: unknown) => void;
};

export type GenerationSettings = {
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  stream: boolean;
};

export type AskSessionDeps = {
  history: Pick<HistoryStore, "add" | "updateResponse">;
  lm: LmConfig;
  generation: GenerationSettings;
  streamChat?: typeof streamChatCompletion;
  completeChat?: typeof createChatCompletion;
  buildMessages?: typeof buildAskMessages;
};

type ActiveAsk = {
  controller: AbortController;
};

export function appendStopMarker(partial: string): string {
  if (partial.endsWith(STOP_MARKER)) return partial;
  return partial ? `${partial}\n\n${STOP_MARKER}` : STOP_MARKER;
}

export function appendErrorNote(partial: string, description: string): string {
  return partial ? `${partial}\n\n*Error: ${description}*` : `Error: ${description}`;
}

export class AskSession {
  private active: ActiveAsk | null = null;
  private screenshotPath: string | null = null;
  private latestResponse = "";

  constructor(private readonly deps: AskSessionDeps) {}

  get state(): SessionState {
    return this.active ? "generating" : "idle";
  }

  get attachedScreenshot(): string | null {
    return this.screenshotPath;
  }

  get currentResponse(): string {
    return this.latestResponse;
  }

  get model(): string {
    return this.deps.lm.model;
  }

  attachScreenshot(screenshotPath: string | null): void {
    this.screenshotPath = screenshotPath;
  }

  detachScreenshot(): void {
    this.screenshotPath = null;
  }

  showResponse(response: string): void {
    this.latestResponse = response;
  }

  async ask(query: string, listener: AskListener = {}): Promise<AskOutcome | null> {
    const text = query.trim();
    if (!text || this.active) return null;

    const active: ActiveAsk = { controller: new AbortController() };
    this.active = active;
    this.latestResponse = "";
    const screenshotPath = this.screenshotPath;
    const { generation, lm } = this.deps;
    let ctx = buildRequestContext({ model: lm.model, screenshotPath });

    try {
      const messages = await (this.deps.buildMessages ?? buildAskMessages)({
        systemPrompt: generation.systemPrompt,
        query: text,
        screenshotPath,
      });
      const historyId = this.deps.history.add({
        query: text,
        response: GENERATING_PLACEHOLDER,
        hasScreenshot: Boolean(screenshotPath),
        screenshotPath,
        modelName: lm.model,
        metadata: { temperature: generation.temperature, max_tokens: generation.maxTokens },
      });
      ctx = withHistoryId(ctx, historyId);
      logger.info(screenshotPath ? "sending request with image" : "sending text request", ctx);

      return await this.run(messages, historyId, active.controller.signal, listener, ctx);
    } finally {
      this.active = null;
    }
  }

  stop(): boolean {
    if (!this.active || this.active.controller.signal.aborted) return false;
    logger.info("generation stop requested");
    this.active.controller.abort();
    return true;
  }

  private async run(
    messages: ChatMessage[],
    historyId: number,
    signal: AbortSignal,
    listener: AskListener,
    ctx: RequestContext
  ): Promise<AskOutcome> {
    const { generation, lm } = this.deps;
    const options: ChatCompletionOptions = {
      temperature: generation.temperature,
      maxTokens: generation.maxTokens,
      timeoutMs: generation.timeoutMs,
      signal,
      requestContext: ctx,
    };
    let full = "";

    try {
      if (generation.stream) {
        for await (const delta of (this.deps.streamChat ?? streamChatCompletion)(lm, messages, options)) {
          full += delta;
          this.latestResponse = full;
          listener.onChunk?.(delta);
        }
      } else {
        full = await (this.deps.completeChat ?? createChatCompletion)(lm, messages, options);
        if (!signal.aborted) {
          this.latestResponse = full;
          listener.onChunk?.(full);
        }
      }
    } catch (error) {
      if (!signal.aborted) {
        const description = describeLmError(error);
        const response = appendErrorNote(full, description);
        logger.error("generation failed", ctx, { error });
        this.latestResponse = response;
        this.saveResponse(historyId, response, ctx);
        listener.onError?.(description, error);
        return { status: "failed", response, historyId };
      }
    }

    if (signal.aborted) {
      const response = appendStopMarker(full);
      this.latestResponse = response;
      this.saveResponse(historyId, response, ctx);
      listener.onStopped?.(full);
      return { status: "stopped", response, historyId };
    }

    this.saveResponse(historyId, full, ctx);
    listener.onComplete?.(full);
    return { status: "completed", response: full, historyId };
  }

  private saveResponse(historyId: number, response: string, ctx: RequestContext): void {
    try {
      this.deps.history.updateResponse(historyId, response);
    } catch (error) {
      logger.error("failed to update history item", ctx, { error });
    }
  }
}
