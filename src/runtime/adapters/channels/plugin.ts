import { EventEmitter } from "node:events";
import type { ChannelStatus, InboundMessage, OutboundMessage } from "./types";
import { chunkText, getChannelTextLimit } from "../../../utils/text-chunk";

export interface ChannelPlugin extends EventEmitter {
  readonly id: string;
  readonly name: string;

  // Lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  // Status
  getStatus(): ChannelStatus;
  isConnected(): boolean;

  // Messaging
  send(peerId: string, message: OutboundMessage): Promise<string>; // Returns message ID
  // Sends one logical reply, split across messages when it exceeds the platform limit
  reply(peerId: string, text: string, replyToId?: string): Promise<string[]>;

  // Events (via EventEmitter)
  // 'message' - (msg: InboundMessage) => void
  // 'error' - (error: Error) => void
  // 'status' - (status: ChannelStatus) => void
}

// Base class with common functionality
export abstract class BaseChannelPlugin extends EventEmitter implements ChannelPlugin {
  abstract readonly id: string;
  abstract readonly name: string;
  protected status: ChannelStatus = "disconnected";

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract send(peerId: string, message: OutboundMessage): Promise<string>;

  getStatus(): ChannelStatus {
    return this.status;
  }

  isConnected(): boolean {
    return this.status === "connected";
  }

  async reply(peerId: string, text: string, replyToId?: string): Promise<string[]> {
    const ids: string[] = [];
    for (const chunk of chunkText(text, getChannelTextLimit(this.id))) {
      // Only the first chunk quotes the original message.
      const quoted = ids.length === 0 ? replyToId : undefined;
      ids.push(await this.send(peerId, { text: chunk, replyToId: quoted }));
    }
    return ids;
  }

  protected setStatus(status: ChannelStatus): void {
    this.status = status;
    this.emit("status", status);
  }

  protected emitMessage(msg: InboundMessage): void {
    this.emit("message", msg);
  }

  protected emitError(error: Error): void {
    if (this.listenerCount("error") === 0) {
      return;
    }
    this.emit("error", error);
  }
}
