export type WindowCommand =
  | { kind: "empty" }
  | { kind: "ask"; query: string }
  | { kind: "help" }
  | { kind: "shot" }
  | { kind: "detach" }
  | { kind: "stop" }
  | { kind: "copy" }
  | { kind: "history"; filter: string | null }
  | { kind: "open"; id: number }
  | { kind: "delete"; id: number }
  | { kind: "clear-history" }
  | { kind: "hide" }
  | { kind: "quit" }
  | { kind: "invalid"; message: string };

const SIMPLE_COMMANDS = {
  "/help": { kind: "help" },
  "/shot": { kind: "shot" },
  "/detach": { kind: "detach" },
  "/stop": { kind: "stop" },
  "/copy": { kind: "copy" },
  "/clear-history": { kind: "clear-history" },
  "/hide": { kind: "hide" },
  "/quit": { kind: "quit" },
} as const satisfies Record<string, WindowCommand>;

function isSimpleCommand(name: string): name is keyof typeof SIMPLE_COMMANDS {
  return Object.hasOwn(SIMPLE_COMMANDS, name);
}

function parseId(name: string, arg: string): WindowCommand {
  if (!/^\d+$/.test(arg)) {
    return { kind: "invalid", message: `Usage: ${name} <id>` };
  }
  const id = Number(arg);
  return name === "/open" ? { kind: "open", id } : { kind: "delete", id };
}

export function parseCommand(line: string): WindowCommand {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  if (text === "?") return { kind: "help" };
  if (!text.startsWith("/")) return { kind: "ask", query: text };

  const space = text.search(/\s/);
  const name = (space === -1 ? text : text.slice(0, space)).toLowerCase();
  const arg = space === -1 ? "" : text.slice(space + 1).trim();

  if (name === "/history") return { kind: "history", filter: arg || null };
  if (name === "/open" || name === "/delete") return parseId(name, arg);
  if (isSimpleCommand(name)) {
    if (arg) return { kind: "invalid", message: `${name} takes no arguments` };
    return SIMPLE_COMMANDS[name];
  }
  return { kind: "invalid", message: `Unknown command ${name}. Type /help for the list.` };
}
