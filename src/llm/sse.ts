export const SSE_DONE = "[DONE]";

export class SseDecoder {
  private buffer = "";
  private dataLines: string[] = [];

  push(text: string): string[] {
    this.buffer += text;
    const events: string[] = [];
    let newline = this.buffer.search(/\r?\n|\r/);
    while (newline >= 0) {
      const line = this.buffer.slice(0, newline);
      const breakLength = this.buffer.startsWith("\r\n", newline) ? 2 : 1;
      this.buffer = this.buffer.slice(newline + breakLength);
      const event = this.acceptLine(line);
      if (event !== null) events.push(event);
      newline = this.buffer.search(/\r?\n|\r/);
    }
    return events;
  }

  end(): string[] {
    const events: string[] = [];
    if (this.buffer.length > 0) {
      const event = this.acceptLine(this.buffer);
      this.buffer = "";
      if (event !== null) events.push(event);
    }
    const last = this.acceptLine("");
    if (last !== null) events.push(last);
    return events;
  }

  private acceptLine(line: string): string | null {
    if (line === "") {
      if (this.dataLines.length === 0) return null;
      const data = this.dataLines.join("\n");
      this.dataLines = [];
      return data;
    }
    if (line.startsWith(":")) return null;
    const colon = line.indexOf(":");
    const field = colon < 0 ? line : line.slice(0, colon);
    if (field !== "data") return null;
    let value = colon < 0 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);
    this.dataLines.push(value);
    return null;
  }
}
