import type {
  ActionVerb,
  ContainerStatusRow,
  ContainerVerb,
  DispatchResult,
  SuccessPayload,
  UsageError,
} from "./types";

export const DEFAULT_LOG_MAX_CHARS = 1900;

export type ReplyRenderOptions = {
  // Upper bound for the log excerpt inside a `logs` reply.
  logMaxChars?: number;
};

const STATUS_COLUMNS = ["Container", "Status", "Address", "Port", "Password"] as const;

const DONE_TEXT: Record<ActionVerb, string> = {
  start: "started",
  stop: "stopped",
  restart: "restarted",
};

const ALREADY_TEXT: Record<Exclude<ActionVerb, "restart">, string> = {
  start: "is already running",
  stop: "is already stopped",
};

const FAILED_ACTION_TEXT: Record<ContainerVerb, string> = {
  start: "start",
  stop: "stop",
  restart: "restart",
  logs: "fetch logs for",
};

function codeBlock(body: string): string {
  return `\`\`\`\n${body}\n\`\`\``;
}

// Keeps log output from closing the surrounding code block early.
function neutralizeFences(text: string): string {
  return text.replace(/```/g, "'''");
}

function statusCells(row: ContainerStatusRow): string[] {
  return [row.shortName, row.state, row.displayAddress, row.displayPort, row.displayCredential];
}

/**
 * Bordered fixed-width table, one line per container. Column widths follow
 * the longest cell so the layout only depends on the rows.
 */
export function formatStatusTable(rows: readonly ContainerStatusRow[]): string {
  const body = rows.map(statusCells);
  const widths = STATUS_COLUMNS.map((header, index) =>
    Math.max(header.length, ...body.map((cells) => cells[index]?.length ?? 0)),
  );
  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
  const line = (cells: readonly string[]) =>
    `|${cells.map((cell, index) => ` ${cell.padEnd(widths[index] ?? 0)} `).join("|")}|`;

  return [border, line(STATUS_COLUMNS), border, ...body.map((cells) => line(cells)), border].join(
    "\n",
  );
}

export function renderStatusTable(rows: readonly ContainerStatusRow[]): string {
  if (rows.length === 0) {
    return "No containers are configured.";
  }
  return codeBlock(formatStatusTable(rows));
}

export function renderHelp(logTailLines: number): string {
  return [
    "Mention me followed by a command:",
    "`status` - show every container with its address",
    "`start <name>` - start a container",
    "`stop <name>` - stop a container",
    "`restart <name>` - restart a container",
    `\`logs <name>\` - show the last ${logTailLines} log lines`,
    "`help` - show this message",
  ].join("\n");
}

/**
 * Keeps the newest part of the output within `maxChars`, cut at a line
 * boundary when one is available.
 */
export function tailText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  const tail = text.slice(text.length - maxChars);
  const firstBreak = tail.indexOf("\n");
  if (firstBreak === -1 || firstBreak === tail.length - 1) {
    return { text: tail, truncated: true };
  }
  return { text: tail.slice(firstBreak + 1), truncated: true };
}

function renderSuccess(payload: SuccessPayload, options: ReplyRenderOptions): string {
  switch (payload.type) {
    case "status":
      return renderStatusTable(payload.rows);
    case "action":
      if (payload.outcome === "already" && payload.verb !== "restart") {
        return `Container '${payload.name}' ${ALREADY_TEXT[payload.verb]}.`;
      }
      return `Container '${payload.name}' ${DONE_TEXT[payload.verb]}.`;
    case "logs": {
      if (!payload.output.trim()) {
        return `No logs for '${payload.name}' yet.`;
      }
      const maxChars = options.logMaxChars ?? DEFAULT_LOG_MAX_CHARS;
      const tail = tailText(neutralizeFences(payload.output), maxChars);
      const heading = tail.truncated
        ? `Last log lines for '${payload.name}' (truncated):`
        : `Last ${payload.tailLines} log lines for '${payload.name}':`;
      return `${heading}\n${codeBlock(tail.text)}`;
    }
    case "help":
      return renderHelp(payload.logTailLines);
  }
}

function renderUsage(error: UsageError): string {
  if (error.code === "missing_argument") {
    return `Please name a container: \`${error.verb} <name>\`. Type \`help\` for instructions.`;
  }
  if (!error.token) {
    return "Invalid command format. Type `help` for instructions.";
  }
  return `Unknown command '${error.token}'. Type \`help\` for instructions.`;
}

export function renderDispatchResult(
  result: DispatchResult,
  options: ReplyRenderOptions = {},
): string {
  switch (result.kind) {
    case "success":
      return renderSuccess(result.payload, options);
    case "not_found":
      if (result.known.length === 0) {
        return `Container '${result.name}' is not known. No containers are configured.`;
      }
      return `Container '${result.name}' is not known. Available: ${result.known.join(", ")}.`;
    case "unauthorized":
      return "You are not allowed to manage containers here.";
    case "runtime_error":
      return `Could not ${FAILED_ACTION_TEXT[result.verb]} '${result.name}': ${result.cause}`;
    case "unknown":
      return renderUsage(result.error);
  }
}
