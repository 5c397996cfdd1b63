const MAX_CAUSE_LENGTH = 200;
const REDACTED = "[redacted]";

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

export class RuntimeTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "RuntimeTimeoutError";
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new RuntimeTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function readStderr(error: Error): string {
  if (!("stderr" in error) || typeof error.stderr !== "string") {
    return "";
  }
  const lines = error.stderr
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.at(-1) ?? "";
}

export function redactSecrets(text: string, secrets: readonly string[]): string {
  let result = text;
  for (const secret of secrets) {
    // Very short values would blank out ordinary words.
    if (secret.length < 4) {
      continue;
    }
    result = result.split(secret).join(REDACTED);
  }
  return result;
}

/**
 * Cause of a failed CLI call without the command line, which carries the
 * runtime endpoint. Empty when the error did not come from a subprocess.
 */
function readSubprocessCause(error: Error): string {
  if ("timedOut" in error && error.timedOut === true) {
    const match = /timed out after (\d+) milliseconds/.exec(error.message);
    return match ? `timed out after ${match[1]}ms` : "timed out";
  }
  if ("code" in error && error.code === "ENOENT") {
    return "container CLI not found";
  }
  if (!("command" in error) || typeof error.command !== "string" || !error.command) {
    return "";
  }
  const firstLine = error.message.split("\n")[0] ?? "";
  const commandAt = firstLine.indexOf(`: ${error.command}`);
  return (commandAt === -1 ? firstLine : firstLine.slice(0, commandAt)).trim();
}

/**
 * One-line cause suitable for a chat reply: the runtime's own stderr message
 * when there is one, otherwise the first line of the error message. No stack.
 */
export function summarizeError(error: unknown, secrets: readonly string[] = []): string {
  const err = toError(error);
  const source = readStderr(err) || readSubprocessCause(err) || err.message;
  const firstLine =
    source
      .split("\n")
      .map((line) => line.trim())
      .find(Boolean) ?? "unknown error";
  const redacted = redactSecrets(firstLine, secrets);
  if (redacted.length <= MAX_CAUSE_LENGTH) {
    return redacted;
  }
  return `${redacted.slice(0, MAX_CAUSE_LENGTH - 1)}…`;
}
