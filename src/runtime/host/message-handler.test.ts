import { beforeEach, describe, expect, it, vi } from "vitest";
import type { RuntimeGateway } from "../../container/types";
import type { InboundMessage, OutboundMessage } from "../adapters/channels/types";
import { BaseChannelPlugin } from "../adapters/channels/plugin";
import { createAuthorizationScope } from "./commands/access";
import { CommandDispatcher } from "./commands/dispatch";
import { ContainerRegistry } from "./commands/registry";
import { MessageHandler } from "./message-handler";

vi.mock("../../logger", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

class FakeChannel extends BaseChannelPlugin {
  readonly id = "discord";
  readonly name = "Fake";
  readonly sent: Array<{ peerId: string; message: OutboundMessage }> = [];
  failNext = false;

  async connect(): Promise<void> {
    this.setStatus("connected");
  }

  async disconnect(): Promise<void> {
    this.setStatus("disconnected");
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("Missing Access");
    }
    this.sent.push({ peerId, message });
    return `sent-${this.sent.length}`;
  }
}

function createRuntime(): RuntimeGateway {
  return {
    listContainers: vi.fn(async () => []),
    inspect: vi.fn(async (identifier: string) => ({
      id: `id-${identifier}`,
      identifier,
      running: true,
      status: "running" as const,
    })),
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    restart: vi.fn(async () => {}),
    fetchLogs: vi.fn(async () => ""),
    isAvailable: vi.fn(async () => true),
  };
}

function inbound(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: "msg-1",
    channel: "discord",
    peerId: "channel-1",
    peerType: "group",
    originId: "guild-1",
    senderId: "user-1",
    text,
    mentionTokens: ["<@42>", "<@!42>"],
    timestamp: new Date(0),
    raw: {},
    ...overrides,
  };
}

describe("MessageHandler", () => {
  let channel: FakeChannel;
  let runtime: RuntimeGateway;
  let handler: MessageHandler;

  beforeEach(() => {
    channel = new FakeChannel();
    runtime = createRuntime();
    const dispatcher = new CommandDispatcher({
      registry: ContainerRegistry.fromConfig([{ name: "web", address: "10.0.0.5", port: "8080" }]),
      scope: createAuthorizationScope({
        allowedGuilds: ["guild-1"],
        allowedChannels: ["channel-1"],
      }),
      runtime,
    });
    handler = new MessageHandler(dispatcher, { logMaxChars: 1900 });
  });

  it("replies in the originating channel, quoting the command", async () => {
    await handler.handle(inbound("<@42> start web"), channel);
    expect(channel.sent).toEqual([
      {
        peerId: "channel-1",
        message: { text: "Container 'web' is already running.", replyToId: "msg-1" },
      },
    ]);
    expect(runtime.start).not.toHaveBeenCalled();
  });

  it("stays silent for messages that are not commands", async () => {
    await handler.handle(inbound("hello there"), channel);
    await handler.handle(inbound("   "), channel);
    expect(channel.sent).toEqual([]);
  });

  it("stays silent for unauthorized channels", async () => {
    await handler.handle(inbound("<@42> status", { peerId: "channel-2" }), channel);
    expect(channel.sent).toEqual([]);
    expect(runtime.inspect).not.toHaveBeenCalled();
  });

  it("ignores direct messages", async () => {
    await handler.handle(inbound("<@42> status", { originId: undefined, peerType: "dm" }), channel);
    expect(channel.sent).toEqual([]);
  });

  it("does not throw when the reply cannot be delivered", async () => {
    channel.failNext = true;
    await expect(handler.handle(inbound("<@42> help"), channel)).resolves.toBeUndefined();
    expect(channel.sent).toEqual([]);
  });
});
