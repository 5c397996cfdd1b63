import { isContainerActive, type RuntimeGateway } from "../../../container/types";
import { logger } from "../../../logger";
import { isAllowed, type AuthorizationScope } from "./access";
import { summarizeError, withTimeout } from "./errors";
import { parseCommand } from "./parser";
import type { ContainerRegistry, ContainerSpec } from "./registry";
import type {
  ActionVerb,
  CommandInvocation,
  ContainerStatusRow,
  ContainerVerb,
  DispatchResult,
} from "./types";

export const DEFAULT_RUNTIME_TIMEOUT_MS = 15_000;
export const DEFAULT_LOG_TAIL_LINES = 30;

export interface CommandDispatcherOptions {
  registry: ContainerRegistry;
  scope: AuthorizationScope;
  runtime: RuntimeGateway;
  timeoutMs?: number;
  logTailLines?: number;
  // Values scrubbed from any error text shown to users.
  secrets?: readonly string[];
}

export interface CommandMessage {
  text: string;
  originId?: string;
  channelId: string;
  authorId: string;
  mentionTokens: readonly string[];
}

const ACTION_PAST_TENSE: Record<ActionVerb, string> = {
  start: "started",
  stop: "stopped",
  restart: "restarted",
};

/**
 * Turns one inbound chat message into at most one DispatchResult. Holds only
 * read-only state, so concurrent calls are safe; every runtime call is
 * re-issued per command and bounded by `timeoutMs`.
 */
export class CommandDispatcher {
  private readonly registry: ContainerRegistry;
  private readonly scope: AuthorizationScope;
  private readonly runtime: RuntimeGateway;
  private readonly timeoutMs: number;
  private readonly logTailLines: number;
  private readonly secrets: readonly string[];

  constructor(options: CommandDispatcherOptions) {
    this.registry = options.registry;
    this.scope = options.scope;
    this.runtime = options.runtime;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RUNTIME_TIMEOUT_MS;
    this.logTailLines = options.logTailLines ?? DEFAULT_LOG_TAIL_LINES;
    this.secrets = options.secrets ?? [];
  }

  /**
   * Returns null when the message must be dropped without a reply: the origin
   * is not allow-listed, or the message does not address the bot.
   */
  async handle(message: CommandMessage): Promise<DispatchResult | null> {
    const parsed = parseCommand(message.text, message.mentionTokens);

    if (!isAllowed(this.scope, message.originId, message.channelId, message.authorId)) {
      if (this.scope.replyOnDenied && parsed.success) {
        logger.info(
          { originId: message.originId, channelId: message.channelId, authorId: message.authorId },
          "Rejected command from unauthorized origin",
        );
        return { kind: "unauthorized" };
      }
      logger.debug(
        { originId: message.originId, channelId: message.channelId },
        "Dropped message from unauthorized origin",
      );
      return null;
    }

    if (!parsed.success) {
      if (parsed.error.code === "not_addressed") {
        return null;
      }
      return { kind: "unknown", error: parsed.error };
    }

    return this.execute({
      ...parsed.command,
      originId: message.originId ?? "",
      channelId: message.channelId,
      authorId: message.authorId,
    });
  }

  async execute(invocation: CommandInvocation): Promise<DispatchResult> {
    logger.info(
      {
        verb: invocation.verb,
        argument: invocation.argument,
        channelId: invocation.channelId,
        authorId: invocation.authorId,
      },
      "Dispatching container command",
    );

    switch (invocation.verb) {
      case "help":
        return { kind: "success", payload: { type: "help", logTailLines: this.logTailLines } };
      case "status":
        return { kind: "success", payload: { type: "status", rows: await this.collectStatus() } };
      default:
        break;
    }

    const spec = this.registry.resolve(invocation.argument);
    if (!spec) {
      return { kind: "not_found", name: invocation.argument, known: this.registry.names() };
    }

    try {
      return await this.runContainerVerb(invocation.verb, spec);
    } catch (err) {
      logger.warn(
        { err, verb: invocation.verb, container: spec.container },
        "Container command failed",
      );
      return {
        kind: "runtime_error",
        verb: invocation.verb,
        name: spec.shortName,
        cause: summarizeError(err, this.secrets),
      };
    }
  }

  private async runContainerVerb(verb: ContainerVerb, spec: ContainerSpec): Promise<DispatchResult> {
    const id = spec.container;

    if (verb === "logs") {
      const output = await this.call("logs", id, this.runtime.fetchLogs(id, this.logTailLines));
      return {
        kind: "success",
        payload: {
          type: "logs",
          name: spec.shortName,
          output: output.trimEnd(),
          tailLines: this.logTailLines,
        },
      };
    }

    if (verb === "restart") {
      await this.call("restart", id, this.runtime.restart(id));
      return this.actionResult(verb, spec, "done");
    }

    // start and stop check live state first so repeating them is harmless
    const state = await this.call("inspect", id, this.runtime.inspect(id));
    if (!state) {
      throw new Error(`no container named "${id}" exists on the runtime`);
    }
    const active = state.running || isContainerActive(state.status);
    const alreadyInTargetState = verb === "start" ? active : !active;
    if (alreadyInTargetState) {
      return this.actionResult(verb, spec, "already");
    }

    if (verb === "start") {
      await this.call("start", id, this.runtime.start(id));
    } else {
      await this.call("stop", id, this.runtime.stop(id));
    }
    logger.info({ container: id, action: ACTION_PAST_TENSE[verb] }, "Container state changed");
    return this.actionResult(verb, spec, "done");
  }

  private actionResult(
    verb: ActionVerb,
    spec: ContainerSpec,
    outcome: "done" | "already",
  ): DispatchResult {
    return { kind: "success", payload: { type: "action", verb, name: spec.shortName, outcome } };
  }

  // A failed or slow lookup marks that row offline; it never fails the table.
  private async collectStatus(): Promise<ContainerStatusRow[]> {
    return Promise.all(
      this.registry.list().map(async (spec): Promise<ContainerStatusRow> => {
        const row = {
          shortName: spec.shortName,
          displayAddress: spec.displayAddress,
          displayPort: spec.displayPort,
          displayCredential: spec.displayCredential,
        };
        try {
          const state = await this.call(
            "inspect",
            spec.container,
            this.runtime.inspect(spec.container),
          );
          if (!state) {
            return { ...row, state: "not found" };
          }
          const active = state.running || isContainerActive(state.status);
          return { ...row, state: active ? "running" : "offline" };
        } catch (err) {
          logger.warn({ err, container: spec.container }, "Container status lookup failed");
          return { ...row, state: "offline" };
        }
      }),
    );
  }

  private call<T>(operation: string, identifier: string, promise: Promise<T>): Promise<T> {
    return withTimeout(promise, this.timeoutMs, `${operation} ${identifier}`);
  }
}
