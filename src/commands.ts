export type Command =
  | { type: "enable" }
  | { type: "disable" }
  | { type: "status" }
  | { type: "help" }
  | { type: "show-filter" }
  | { type: "enable-filter" }
  | { type: "disable-filter" }
  | { type: "set-filter"; filter: string }
  | { type: "unknown" };

const SIMPLE_COMMANDS = new Map<string, Command>([
  ["enable", { type: "enable" }],
  ["disable", { type: "disable" }],
  ["status", { type: "status" }],
  ["help", { type: "help" }],
  ["filter", { type: "show-filter" }],
  ["filter enable", { type: "enable-filter" }],
  ["filter disable", { type: "disable-filter" }],
]);

export function parseCommand(text: string): Command {
  const trimmed = text.trim();
  const simple = SIMPLE_COMMANDS.get(trimmed.toLowerCase());
  if (simple) return simple;

  // the pattern keeps its original case
  const filterMatch = trimmed.match(/^filter (.*)$/i);
  if (filterMatch) return { type: "set-filter", filter: filterMatch[1] };

  return { type: "unknown" };
}

export const HELP_TEXT = [
  "Commands:",
  "  enable          notify me about reviews of my changes",
  "  disable         stop notifying me",
  "  status          show whether notifications are on",
  "  filter          show my filter",
  "  filter <regex>  hide notifications matching <regex>",
  "  filter enable   turn my filter on",
  "  filter disable  turn my filter off",
  "  help            show this message",
].join("\n");
