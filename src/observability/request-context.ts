export type RequestContext = {
  requestId: string;
  historyId: number | null;
  model: string;
  hasScreenshot: boolean;
};

function randomId(): string {
  return Math.random().toString(36).slice(2, 10);
}

export function buildRequestContext(input: {
  model: string;
  screenshotPath?: string | null;
  historyId?: number | null;
}): RequestContext {
  return {
    requestId: `${Date.now().toString(36)}-${randomId()}`,
    historyId: input.historyId ?? null,
    model: input.model,
    hasScreenshot: Boolean(input.screenshotPath),
  };
}

export function withHistoryId(ctx: RequestContext, historyId: number): RequestContext {
  return { ...ctx, historyId };
}
