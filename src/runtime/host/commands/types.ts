export const COMMAND_VERBS = ["status", "start", "stop", "restart", "logs", "help"] as const;
export type CommandVerb = (typeof COMMAND_VERBS)[number];

// Verbs that act on one named container.
export type ContainerVerb = "start" | "stop" | "restart" | "logs";
export type GlobalVerb = Exclude<CommandVerb, ContainerVerb>;

export type ParsedCommand =
  | { verb: GlobalVerb; argument?: undefined }
  | { verb: ContainerVerb; argument: string };

export type ParseError =
  | { code: "not_addressed" }
  | { code: "unknown_verb"; token: string }
  | { code: "missing_argument"; verb: ContainerVerb };

export type UsageError = Exclude<ParseError, { code: "not_addressed" }>;

export type ParseResult =
  | { success: true; command: ParsedCommand }
  | { success: false; error: ParseError };

export interface InvocationOrigin {
  originId: string;
  channelId: string;
  authorId: string;
}

export type CommandInvocation = ParsedCommand & InvocationOrigin;

export type ContainerStateLabel = "running" | "offline" | "not found";

export interface ContainerStatusRow {
  shortName: string;
  state: ContainerStateLabel;
  displayAddress: string;
  displayPort: string;
  displayCredential: string;
}

export type ActionVerb = Exclude<ContainerVerb, "logs">;

export type SuccessPayload =
  | { type: "status"; rows: ContainerStatusRow[] }
  | { type: "action"; verb: ActionVerb; name: string; outcome: "done" | "already" }
  | { type: "logs"; name: string; output: string; tailLines: number }
  | { type: "help"; logTailLines: number };

export type DispatchResult =
  | { kind: "success"; payload: SuccessPayload }
  | { kind: "not_found"; name: string; known: string[] }
  | { kind: "unauthorized" }
  | { kind: "runtime_error"; verb: ContainerVerb; name: string; cause: string }
  | { kind: "unknown"; error: UsageError };
