export const COMMANDS = [
  "start",
  "menu",
  "status",
  "check",
  "keywords",
  "settarget",
  "reset",
] as const;

export type CommandName = (typeof COMMANDS)[number];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Reads `/name` or `/name@botname` from the start of a message. Returns null
 * for plain text and for commands the bot does not know.
 */
export function parseCommand(text: string): CommandName | null {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  const name = match?.[1]?.toLowerCase();
  return name !== undefined && isCommandName(name) ? name : null;
}
