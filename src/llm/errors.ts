export function extractErrorCauseInfo(error: Error): { name: string; code: string } {
  const cause: unknown = error.cause;
  if (!cause || typeof cause !== "object") {
    return { name: "", code: "" };
  }
  const name = "name" in cause ? cause.name : undefined;
  const code = "code" in cause ? cause.code : undefined;
  return {
    name: typeof name === "string" ? name : "",
    code: typeof code === "string" ? code : "",
  };
}

export function buildHttpErrorMessage(status: number, body: string, apiKey: string): string {
  const trimmed = body.slice(0, 300);
  const redacted = apiKey ? trimmed.split(apiKey).join("[REDACTED]") : trimmed;
  return `llm_http_error:${status}:${redacted}`;
}

export function normalizeRequestError(error: unknown): Error {
  const rawError = error instanceof Error ? error : new Error(String(error));
  if (rawError.message.startsWith("llm_")) {
    return rawError;
  }
  const cause = extractErrorCauseInfo(rawError);
  return new Error(
    `llm_network_error:${cause.code || cause.name || rawError.message || "fetch_failed"}`
  );
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function httpStatusOf(message: string): number | null {
  const match = /^llm_http_error:(\d{3}):/.exec(message);
  return match?.[1] ? Number(match[1]) : null;
}

export function describeLmError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (message.startsWith("llm_timeout:")) {
    return "The request timed out. Try again in a moment.";
  }
  if (message.startsWith("llm_network_error:")) {
    return "Could not reach the model API. Check the API URL and your connection.";
  }
  const status = httpStatusOf(message);
  if (status === 401 || status === 403) {
    return "The API rejected the credentials. Check OPENAI_API_KEY.";
  }
  if (status === 429) {
    return "Rate limited by the model API. Wait a little and retry.";
  }
  if (status !== null) {
    return `The model API returned an error (HTTP ${status}).`;
  }
  if (message.startsWith("llm_stream_error:")) {
    return `The model API reported an error: ${message.slice("llm_stream_error:".length)}`;
  }
  return "Something went wrong while generating the answer.";
}
