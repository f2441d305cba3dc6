import { readImageBase64 } from "../screenshot/image-file.js";

export type TextContentPart = {
  type: "text";
  text: string;
};

export type ImageContentPart = {
  type: "image_url";
  image_url: { url: string };
};

export type ContentPart = TextContentPart | ImageContentPart;

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "assistant"; content: string }
  | { role: "user"; content: string | ContentPart[] };

export function systemMessage(content: string): ChatMessage {
  return { role: "system", content };
}

export function userMessage(content: string): ChatMessage {
  return { role: "user", content };
}

export function assistantMessage(content: string): ChatMessage {
  return { role: "assistant", content };
}

export async function imageMessage(text: string, imagePath: string): Promise<ChatMessage> {
  const base64 = await readImageBase64(imagePath);
  if (!base64) {
    return { role: "user", content: [{ type: "text", text }] };
  }
  return {
    role: "user",
    content: [
      { type: "text", text },
      { type: "image_url", image_url: { url: `data:image/png;base64,${base64}` } },
    ],
  };
}

export async function buildAskMessages(input: {
  systemPrompt: string;
  query: string;
  screenshotPath?: string | null;
}): Promise<ChatMessage[]> {
  const user = input.screenshotPath
    ? await imageMessage(input.query, input.screenshotPath)
    : userMessage(input.query);
  return [systemMessage(input.systemPrompt), user];
}
