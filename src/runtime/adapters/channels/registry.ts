import type { ChannelPlugin } from "./plugin";
import type { InboundMessage } from "./types";
import { logger } from "../../../logger";

export type ChannelMessageHandler = (msg: InboundMessage, plugin: ChannelPlugin) => Promise<void>;

export class ChannelRegistry {
  private plugins: Map<string, ChannelPlugin> = new Map();
  private messageHandler?: ChannelMessageHandler;

  register(plugin: ChannelPlugin): void {
    if (this.plugins.has(plugin.id)) {
      throw new Error(`Plugin with id ${plugin.id} already registered`);
    }
    this.plugins.set(plugin.id, plugin);

    plugin.on("message", (msg: InboundMessage) => {
      const handler = this.messageHandler;
      if (!handler) {
        return;
      }
      // Each message runs on its own promise; a slow command never blocks another channel.
      handler(msg, plugin).catch((err: unknown) => {
        logger.error({ err, channelId: plugin.id, messageId: msg.id }, "Message handler failed");
      });
    });

    plugin.on("error", (error: Error) => {
      logger.error({ err: error, channelId: plugin.id }, "Channel plugin error");
    });

    logger.info({ channelId: plugin.id, name: plugin.name }, "Channel plugin registered");
  }

  get(id: string): ChannelPlugin | undefined {
    return this.plugins.get(id);
  }

  list(): ChannelPlugin[] {
    return Array.from(this.plugins.values());
  }

  setMessageHandler(handler: ChannelMessageHandler): void {
    this.messageHandler = handler;
  }

  // Rejects with the first failure; a bot that cannot reach its chat gateway has nothing to do.
  async connectAll(): Promise<void> {
    const plugins = this.list();
    const results = await Promise.allSettled(plugins.map((plugin) => plugin.connect()));

    let firstFailure: unknown;
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        logger.error(
          { err: result.reason, channelId: plugins[index]?.id },
          "Failed to connect channel plugin",
        );
        firstFailure ??= result.reason;
      }
    });
    if (firstFailure !== undefined) {
      throw firstFailure;
    }
  }

  async disconnectAll(): Promise<void> {
    const plugins = this.list();
    const results = await Promise.allSettled(plugins.map((plugin) => plugin.disconnect()));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        logger.error(
          { err: result.reason, channelId: plugins[index]?.id },
          "Failed to disconnect channel plugin",
        );
      }
    });
  }
}
