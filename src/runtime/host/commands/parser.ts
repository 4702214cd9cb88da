export type ParsedCommand = {
  name: string;
  args: string;
};

const COMMAND_PATTERN = /^!?([a-z]+)(?:\s+([\s\S]*))?$/;

/**
 * Splits `!name args` (the `!` is optional) into its parts.
 * Returns null for anything else, including a name followed directly by punctuation.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const matched = COMMAND_PATTERN.exec(text);
  if (!matched) {
    return null;
  }
  return {
    name: matched[1],
    args: (matched[2] ?? "").trimEnd(),
  };
}

/** Removes a leading mention of `selfId` so `@bot games` reads like `games`. */
export function stripLeadingMention(text: string, selfId: string): string {
  const trimmed = text.trimStart();
  for (const token of [`<@${selfId}>`, `<@!${selfId}>`]) {
    if (trimmed.startsWith(token)) {
      return trimmed.slice(token.length).trimStart();
    }
  }
  return text;
}
