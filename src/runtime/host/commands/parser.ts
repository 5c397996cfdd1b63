import {
  COMMAND_VERBS,
  type CommandVerb,
  type ContainerVerb,
  type ParseResult,
} from "./types";

const CONTAINER_VERBS: ReadonlySet<CommandVerb> = new Set<CommandVerb>([
  "start",
  "stop",
  "restart",
  "logs",
]);

function isCommandVerb(token: string): token is CommandVerb {
  return (COMMAND_VERBS as readonly string[]).includes(token);
}

function isContainerVerb(verb: CommandVerb): verb is ContainerVerb {
  return CONTAINER_VERBS.has(verb);
}

/**
 * Returns the text following the first mention token that the message starts
 * with, or null when the message does not address the bot.
 */
export function stripMention(text: string, mentionTokens: readonly string[]): string | null {
  const trimmed = text.trim();
  for (const token of mentionTokens) {
    if (token && trimmed.startsWith(token)) {
      return trimmed.slice(token.length).trim();
    }
  }
  return null;
}

/**
 * Parses `<mention> <verb> [name]`. Tokens after the container name are
 * ignored, as are arguments to `status` and `help`.
 */
export function parseCommand(text: string, mentionTokens: readonly string[]): ParseResult {
  const body = stripMention(text, mentionTokens);
  if (body === null) {
    return { success: false, error: { code: "not_addressed" } };
  }

  const [first = "", argument] = body.split(/\s+/).filter(Boolean);
  const token = first.toLowerCase();
  if (!isCommandVerb(token)) {
    return { success: false, error: { code: "unknown_verb", token: first } };
  }

  if (!isContainerVerb(token)) {
    return { success: true, command: { verb: token } };
  }
  if (!argument) {
    return { success: false, error: { code: "missing_argument", verb: token } };
  }
  return { success: true, command: { verb: token, argument } };
}
