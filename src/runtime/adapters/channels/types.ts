// Normalized message format (platform-agnostic)
export interface InboundMessage {
  id: string;
  channel: string; // "discord", ...
  peerId: string; // Chat/channel ID
  peerType: "dm" | "group" | "channel";
  originId?: string; // Server/guild the channel belongs to; absent for DMs
  senderId: string;
  senderName?: string;
  text: string;
  // Literal tokens that address the bot at the start of `text`, e.g. "<@123>"
  mentionTokens: string[];
  replyToId?: string;
  timestamp: Date;
  raw: unknown; // Original platform message
}

export interface OutboundMessage {
  text: string;
  replyToId?: string;
}

export type ChannelStatus = "connected" | "connecting" | "disconnected" | "error";
