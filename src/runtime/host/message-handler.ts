import type { ChannelPlugin } from "../adapters/channels/plugin";
import type { InboundMessage } from "../adapters/channels/types";
import type { CommandDispatcher } from "./commands/dispatch";
import { logger } from "../../logger";
import { renderDispatchResult, type ReplyRenderOptions } from "./commands/render";

/**
 * Routes one inbound chat message through the dispatcher and posts the rendered
 * reply back to the channel it came from. Messages the dispatcher drops get no
 * reply at all.
 */
export class MessageHandler {
  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly renderOptions: ReplyRenderOptions = {},
  ) {}

  async handle(message: InboundMessage, channel: ChannelPlugin): Promise<void> {
    const startedAt = Date.now();
    if (!message.text.trim()) {
      return;
    }

    const result = await this.dispatcher.handle({
      text: message.text,
      originId: message.originId,
      channelId: message.peerId,
      authorId: message.senderId,
      mentionTokens: message.mentionTokens,
    });
    if (!result) {
      return;
    }

    const text = renderDispatchResult(result, this.renderOptions);
    try {
      await channel.reply(message.peerId, text, message.id);
    } catch (err) {
      logger.error(
        { err, channel: channel.id, peerId: message.peerId, messageId: message.id },
        "Failed to deliver command reply",
      );
      return;
    }

    logger.info(
      {
        channel: channel.id,
        peerId: message.peerId,
        senderId: message.senderId,
        kind: result.kind,
        durationMs: Date.now() - startedAt,
      },
      "Command handled",
    );
  }
}
