export type CommandName = "in" | "at" | "settz";

const COMMANDS: readonly CommandName[] = ["in", "at", "settz"];

export type RouteDecision =
  | { kind: "ignore"; reason: string }
  | { kind: "command"; command: CommandName; args: string };

function isCommandName(name: string): name is CommandName {
  return COMMANDS.some((c) => c === name);
}

export function routeText(prefix: string, text: string): RouteDecision {
  const t = text.trim();
  if (!t.startsWith(prefix)) return { kind: "ignore", reason: "no_prefix" };

  const m = t.slice(prefix.length).match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!m) return { kind: "ignore", reason: "no_command" };
  const name = m[1].toLowerCase();
  if (!isCommandName(name)) return { kind: "ignore", reason: "unknown_command" };
  return { kind: "command", command: name, args: (m[2] ?? "").trim() };
}
