import type { HarbormasterConfig } from "../../../config";
import type { RuntimeGateway } from "../../../container/types";
import { ContainerRuntime } from "../../../container/runtime";
import { resolvePublicAddress } from "../../../infra/public-ip";
import { logger } from "../../../logger";
import { createAuthorizationScope } from "./access";
import { CommandDispatcher } from "./dispatch";
import { ContainerRegistry, needsPublicAddress } from "./registry";
import type { ReplyRenderOptions } from "./render";

export { CommandDispatcher, type CommandMessage } from "./dispatch";
export { ContainerRegistry } from "./registry";
export {
  formatStatusTable,
  renderDispatchResult,
  renderStatusTable,
  type ReplyRenderOptions,
} from "./render";
export type { DispatchResult } from "./types";

export interface CommandStack {
  dispatcher: CommandDispatcher;
  registry: ContainerRegistry;
  runtime: RuntimeGateway;
  renderOptions: ReplyRenderOptions;
}

export interface CommandStackOptions {
  // Overrides the docker/podman CLI gateway built from `runtime`.
  runtime?: RuntimeGateway;
}

export function createContainerRuntime(config: HarbormasterConfig): ContainerRuntime {
  return new ContainerRuntime({
    backend: config.runtime?.backend,
    host: config.runtime?.host,
    binary: config.runtime?.binary,
    timeoutMs: config.runtime?.timeoutMs,
    stopTimeoutSec: config.runtime?.stopTimeoutSec,
  });
}

/**
 * Builds the read-only command pipeline from a loaded config. The public
 * address is looked up once, here, and only when an entry asks for it.
 */
export async function createCommandStack(
  config: HarbormasterConfig,
  options: CommandStackOptions = {},
): Promise<CommandStack> {
  const entries = config.containers ?? [];
  const publicAddress = needsPublicAddress(entries)
    ? await resolvePublicAddress(config.publicAddress)
    : undefined;
  const registry = ContainerRegistry.fromConfig(entries, { publicAddress });
  const runtime = options.runtime ?? createContainerRuntime(config);
  const botToken = config.channels?.discord?.botToken;

  const dispatcher = new CommandDispatcher({
    registry,
    scope: createAuthorizationScope(config.access),
    runtime,
    timeoutMs: config.runtime?.timeoutMs,
    logTailLines: config.commands?.logTailLines,
    secrets: botToken ? [botToken] : [],
  });
  logger.info({ containers: registry.names() }, "Container registry loaded");

  return {
    dispatcher,
    registry,
    runtime,
    renderOptions: { logMaxChars: config.commands?.logMaxChars },
  };
}
