import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { InboundMessage } from "../types";
import { DiscordPlugin } from "./plugin";

type MockClient = {
  listeners: Array<{
    type?: string;
    handle: (data: unknown, client: MockClient) => Promise<void>;
  }>;
  rest: {
    post: ReturnType<typeof vi.fn>;
  };
};

const mockState = vi.hoisted(() => {
  const mockClients: MockClient[] = [];
  const mockGateways: MockGatewayPlugin[] = [];

  class MockReadyListener {
    readonly type = "READY";

    async handle(_data: unknown, _client: MockClient): Promise<void> {}
  }

  class MockMessageCreateListener {
    readonly type = "MESSAGE_CREATE";

    async handle(_data: unknown, _client: MockClient): Promise<void> {}
  }

  class MockGatewayPlugin {
    readonly id = "gateway";
    readonly emitter = new EventEmitter();
    readonly disconnect = vi.fn();
    readonly options: { reconnect?: { maxAttempts: number } };

    constructor(options: { reconnect?: { maxAttempts: number } }) {
      this.options = options;
      mockGateways.push(this);
    }
  }

  const ClientMock = vi.fn().mockImplementation(function ClientMockImpl(_options, handlers) {
    const client: MockClient = {
      listeners: handlers?.listeners ?? [],
      rest: {
        post: vi.fn().mockResolvedValue({ id: "sent-123" }),
      },
    };
    mockClients.push(client);
    return client;
  });

  return {
    mockClients,
    mockGateways,
    MockReadyListener,
    MockMessageCreateListener,
    MockGatewayPlugin,
    ClientMock,
  };
});

const { mockClients, mockGateways } = mockState;
const activePlugins: DiscordPlugin[] = [];
const originalFetch = globalThis.fetch;

vi.mock("@buape/carbon", () => ({
  Client: mockState.ClientMock,
  ReadyListener: mockState.MockReadyListener,
  MessageCreateListener: mockState.MockMessageCreateListener,
}));

vi.mock("@buape/carbon/gateway", () => ({
  GatewayPlugin: mockState.MockGatewayPlugin,
  GatewayIntents: {
    Guilds: 1,
    GuildMessages: 2,
    MessageContent: 4,
  },
}));

function findListener(client: MockClient, type: string) {
  const listener = client.listeners.find((item) => item.type === type);
  if (!listener) {
    throw new Error(`${type} listener not found`);
  }
  return listener;
}

describe("DiscordPlugin (carbon)", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockClients.length = 0;
    mockGateways.length = 0;

    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({ id: "app-123" }),
    }) as unknown as typeof fetch;
  });

  afterEach(async () => {
    await Promise.all(activePlugins.splice(0).map((plugin) => plugin.disconnect()));
    globalThis.fetch = originalFetch;
  });

  async function connectPlugin(
    plugin: DiscordPlugin,
    readyUser: Record<string, unknown> = { id: "bot-42", username: "Harbor", discriminator: "0" },
  ): Promise<MockClient> {
    activePlugins.push(plugin);
    const connectPromise = plugin.connect();
    for (let i = 0; i < 20 && mockClients.length === 0; i += 1) {
      await Promise.resolve();
    }

    const client = mockClients.at(-1);
    if (!client) {
      throw new Error("client not created");
    }

    await findListener(client, "READY").handle({ user: readyUser }, client);
    await connectPromise;
    return client;
  }

  it("connects and exposes mention tokens after READY", async () => {
    const plugin = new DiscordPlugin({ botToken: "Bot test-token" });
    expect(plugin.getMentionTokens()).toEqual([]);

    await connectPlugin(plugin);

    expect(plugin.getStatus()).toBe("connected");
    expect(plugin.getMentionTokens()).toEqual(["<@bot-42>", "<@!bot-42>"]);
    expect(globalThis.fetch).toHaveBeenCalledWith(
      "https://discord.com/api/v10/oauth2/applications/@me",
      { headers: { Authorization: "Bot test-token" } },
    );
  });

  it("falls back to the application id when READY carries no user id", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });

    await connectPlugin(plugin, { username: "Harbor" });

    expect(plugin.getMentionTokens()).toEqual(["<@app-123>", "<@!app-123>"]);
  });

  it("fails to connect with an invalid token", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 401,
      json: async () => ({}),
    }) as unknown as typeof fetch;
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    activePlugins.push(plugin);

    await expect(plugin.connect()).rejects.toThrow("Discord authentication failed");
    expect(plugin.getStatus()).toBe("error");
  });

  it("disconnects gateway", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    await connectPlugin(plugin);

    await plugin.disconnect();

    expect(mockGateways[0]?.disconnect).toHaveBeenCalled();
    expect(plugin.getStatus()).toBe("disconnected");
  });

  it("sends a reply without pinging anyone", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    const client = await connectPlugin(plugin);

    const messageId = await plugin.send("channel-123", {
      text: "Container 'minecraft' started.",
      replyToId: "msg-9",
    });

    expect(messageId).toBe("sent-123");
    expect(client.rest.post).toHaveBeenCalledWith("/channels/channel-123/messages", {
      body: {
        content: "Container 'minecraft' started.",
        allowed_mentions: { parse: [] },
        message_reference: { message_id: "msg-9", fail_if_not_exists: false },
      },
    });
  });

  it("splits long replies and only quotes the original on the first part", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    const client = await connectPlugin(plugin);
    const text = `${"a".repeat(1500)}\n${"b".repeat(1500)}`;

    const ids = await plugin.reply("channel-123", text, "msg-9");

    expect(ids).toEqual(["sent-123", "sent-123"]);
    expect(client.rest.post).toHaveBeenCalledTimes(2);
    const [first, second] = client.rest.post.mock.calls.map(
      (call) => (call[1] as { body: { content: string; message_reference?: unknown } }).body,
    );
    expect(first?.content).toBe("a".repeat(1500));
    expect(first?.message_reference).toEqual({ message_id: "msg-9", fail_if_not_exists: false });
    expect(second?.content).toBe("b".repeat(1500));
    expect(second?.message_reference).toBeUndefined();
  });

  it("rejects sends while disconnected", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });

    await expect(plugin.send("channel-123", { text: "hi" })).rejects.toThrow(
      "Discord client is not connected",
    );
  });

  it("emits normalized inbound messages", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    const client = await connectPlugin(plugin);

    const received: InboundMessage[] = [];
    plugin.on("message", (msg: InboundMessage) => {
      received.push(msg);
    });

    await findListener(client, "MESSAGE_CREATE").handle(
      {
        guild_id: "guild-1",
        author: { id: "user-1", username: "alice", bot: false },
        message: {
          id: "msg-123",
          channelId: "chan-1",
          content: "<@bot-42> status",
          timestamp: "2026-03-01T10:00:00.000Z",
        },
      },
      client,
    );

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      id: "msg-123",
      channel: "discord",
      peerId: "chan-1",
      peerType: "group",
      originId: "guild-1",
      senderId: "user-1",
      senderName: "alice",
      text: "<@bot-42> status",
      mentionTokens: ["<@bot-42>", "<@!bot-42>"],
    });
    expect(received[0]?.timestamp.toISOString()).toBe("2026-03-01T10:00:00.000Z");
  });

  it("ignores bot messages", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    const client = await connectPlugin(plugin);

    let received = false;
    plugin.on("message", () => {
      received = true;
    });

    await findListener(client, "MESSAGE_CREATE").handle(
      {
        author: { id: "bot-1", username: "bot", bot: true },
        message: {
          id: "msg-123",
          channelId: "chan-1",
          content: "<@bot-42> stop minecraft",
          timestamp: new Date().toISOString(),
        },
      },
      client,
    );

    expect(received).toBe(false);
  });

  it("disables reconnect after auth failure to prevent connection storm", async () => {
    const plugin = new DiscordPlugin({ botToken: "test-token" });
    await connectPlugin(plugin);

    const internal = plugin as unknown as {
      handleAuthFailure: (source: string, error: unknown) => void;
    };
    internal.handleAuthFailure("test", new Error("Fatal Gateway error: 4004"));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(mockGateways[0]?.disconnect).toHaveBeenCalled();
    expect(mockGateways[0]?.options.reconnect).toEqual({ maxAttempts: 0 });
    expect(plugin.getStatus()).toBe("error");
    await expect(plugin.connect()).rejects.toThrow("Discord authentication failed");
  });
});
