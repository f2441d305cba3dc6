import type { HistoryItem } from "../history/history-store.js";

const LABEL_MAX_CHARS = 60;

export function historyLabel(query: string): string {
  const oneLine = query.replace(/\s+/g, " ").trim();
  return oneLine.length > LABEL_MAX_CHARS ? `${oneLine.slice(0, LABEL_MAX_CHARS)}...` : oneLine;
}

export function shortTimestamp(timestamp: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})/.exec(timestamp);
  return match ? `${match[1]} ${match[2]}` : timestamp;
}

export function historyLine(item: HistoryItem): string {
  const image = item.hasScreenshot ? " [img]" : "";
  return `#${item.id}  ${shortTimestamp(item.timestamp)}${image}  ${historyLabel(item.query)}`;
}

export function renderExchange(item: HistoryItem): string {
  const lines = [`Q: ${item.query}`];
  if (item.screenshotPath) lines.push(`Image: ${item.screenshotPath}`);
  lines.push("", item.response);
  return lines.join("\n");
}

export function helpText(hotkeys: { app: string; screenshot: string }): string {
  return [
    "Type a question and press Enter.",
    "  /shot              capture a screen region and attach it",
    "  /detach            drop the attached screenshot",
    "  /stop              stop the running answer (also Escape)",
    "  /copy              copy the current answer",
    "  /history [filter]  list recent questions",
    "  /open <id>         show a stored answer",
    "  /delete <id>       delete a history item",
    "  /clear-history     delete all history",
    "  /hide              hide the window (also Escape)",
    "  /quit              exit",
    `Hotkeys: ${hotkeys.app} show/hide, ${hotkeys.screenshot} screenshot`,
  ].join("\n");
}
