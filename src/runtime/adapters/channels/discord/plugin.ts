import { Client, MessageCreateListener, ReadyListener } from "@buape/carbon";
import { GatewayIntents, GatewayPlugin } from "@buape/carbon/gateway";
import { Routes } from "discord-api-types/v10";
import { EventEmitter } from "node:events";
import type { InboundMessage, OutboundMessage } from "../types";
import { logger } from "../../../../logger";
import { BaseChannelPlugin } from "../plugin";

const READY_TIMEOUT_MS = 20_000;
const MAX_GATEWAY_RECONNECT_ATTEMPTS = 20;

type CarbonMessageCreateEvent = Parameters<MessageCreateListener["handle"]>[0];
type CarbonReadyEvent = Parameters<ReadyListener["handle"]>[0];

export interface DiscordPluginConfig {
  botToken: string;
}

interface ReadyResult {
  tag?: string;
  userId?: string;
  error?: Error;
}

class CarbonReadyBridge extends ReadyListener {
  constructor(private readonly onReady: (data: CarbonReadyEvent) => void) {
    super();
  }

  async handle(data: CarbonReadyEvent, _client: Client): Promise<void> {
    this.onReady(data);
  }
}

class CarbonMessageBridge extends MessageCreateListener {
  constructor(
    private readonly onMessage: (data: CarbonMessageCreateEvent, client: Client) => Promise<void>,
  ) {
    super();
  }

  async handle(data: CarbonMessageCreateEvent, client: Client): Promise<void> {
    await this.onMessage(data, client);
  }
}

export class DiscordPlugin extends BaseChannelPlugin {
  readonly id = "discord";
  readonly name = "Discord";

  private client: Client | null = null;
  private gateway: GatewayPlugin | null = null;
  private config: DiscordPluginConfig;
  private botUserId: string | null = null;
  private disabledReason?: string;
  private connectInFlight: Promise<void> | null = null;

  constructor(config: DiscordPluginConfig) {
    super();
    this.config = {
      ...config,
      botToken: normalizeDiscordToken(config.botToken),
    };
  }

  /**
   * Discord renders a user mention as `<@id>`, or `<@!id>` when the member has a
   * nickname. Empty until the gateway reports READY.
   */
  getMentionTokens(): string[] {
    if (!this.botUserId) {
      return [];
    }
    return [`<@${this.botUserId}>`, `<@!${this.botUserId}>`];
  }

  async connect(): Promise<void> {
    if (this.connectInFlight) {
      return this.connectInFlight;
    }

    const run = this.connectInternal();
    this.connectInFlight = run;
    return run.finally(() => {
      this.connectInFlight = null;
    });
  }

  private async connectInternal(): Promise<void> {
    if (this.status === "connecting" || this.status === "connected") {
      return;
    }
    if (this.disabledReason) {
      throw new Error(this.disabledReason);
    }
    this.setStatus("connecting");

    let readyTimeout: ReturnType<typeof setTimeout> | null = null;
    let settleReady: ((result: ReadyResult) => void) | null = null;

    try {
      const readyPromise = new Promise<ReadyResult>((resolve) => {
        settleReady = resolve;
      });

      const listeners = [
        new CarbonReadyBridge((event) => {
          settleReady?.({
            tag: formatUserTag(event.user?.username, event.user?.discriminator),
            userId: event.user?.id,
          });
        }),
        new CarbonMessageBridge(async (event) => {
          this.handleMessage(event);
        }),
      ];

      const gateway = new GatewayPlugin({
        intents:
          GatewayIntents.Guilds | GatewayIntents.GuildMessages | GatewayIntents.MessageContent,
        reconnect: { maxAttempts: MAX_GATEWAY_RECONNECT_ATTEMPTS },
      });

      const applicationId = await fetchApplicationId(this.config.botToken);

      const client = new Client(
        {
          baseUrl: "http://localhost",
          clientId: applicationId,
          publicKey: "unused",
          token: this.config.botToken,
          disableDeployRoute: true,
          disableEventsRoute: true,
          disableInteractionsRoute: true,
        },
        { listeners },
        [gateway],
      );

      const gatewayEmitter = getGatewayEmitter(gateway);
      const onGatewayError = (err: unknown) => {
        const error = toError(err);
        if (this.isAuthFailureError(error)) {
          this.handleAuthFailure("gatewayError", error);
        }
        logger.error({ err: error }, "Discord gateway error");
        this.emitError(error);
        settleReady?.({ error });
      };
      gatewayEmitter?.on("error", onGatewayError);

      this.client = client;
      this.gateway = gateway;

      readyTimeout = setTimeout(() => {
        settleReady?.({ error: new Error("Discord gateway ready timeout") });
      }, READY_TIMEOUT_MS);

      const readyResult = await readyPromise;
      if (readyResult.error) {
        throw readyResult.error;
      }
      // Fall back to the application id, which equals the bot user id for bot accounts.
      this.botUserId = readyResult.userId ?? applicationId;

      this.setStatus("connected");
      logger.info(
        { botUserId: this.botUserId },
        `Discord bot ready as ${readyResult.tag ?? "unknown"}`,
      );

      if (readyTimeout) {
        clearTimeout(readyTimeout);
        readyTimeout = null;
      }
      gatewayEmitter?.removeListener("error", onGatewayError);
    } catch (err) {
      if (readyTimeout) {
        clearTimeout(readyTimeout);
      }
      this.setStatus("error");
      await this.disconnect().catch((disconnectErr: unknown) => {
        logger.warn({ err: disconnectErr }, "Discord cleanup after failed connect did not finish");
      });
      throw err;
    }
  }

  async disconnect(): Promise<void> {
    try {
      disableReconnect(this.gateway);
      this.gateway?.disconnect();
    } finally {
      this.gateway = null;
      this.client = null;
      if (this.status !== "error") {
        this.setStatus("disconnected");
      }
      logger.info("Discord bot disconnected");
    }
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    if (!this.client) {
      throw new Error("Discord client is not connected");
    }

    const content = message.text.trim();
    if (!content) {
      throw new Error("Discord outbound message is empty");
    }

    const body: {
      content: string;
      allowed_mentions: { parse: never[] };
      message_reference?: { message_id: string; fail_if_not_exists: boolean };
    } = { content, allowed_mentions: { parse: [] } };

    if (message.replyToId) {
      body.message_reference = {
        message_id: message.replyToId,
        fail_if_not_exists: false,
      };
    }

    const sent: unknown = await this.client.rest.post(Routes.channelMessages(peerId), { body });
    return readStringId(sent) ?? "unknown";
  }

  private handleMessage(event: CarbonMessageCreateEvent): void {
    const author = event.author;
    const msg = event.message;

    if (!author || author.bot) {
      return;
    }

    const guildId = event.guild_id ?? event.guild?.id;
    const channelId = msg.channelId;

    // Carbon event objects hold circular references (client, guild); keep plain fields only.
    const rawData = {
      messageId: msg.id,
      channelId,
      guildId,
      authorId: author.id,
      authorUsername: author.username,
      content: msg.content,
      timestamp: msg.timestamp,
    };

    const inbound: InboundMessage = {
      id: msg.id,
      channel: this.id,
      peerId: channelId,
      peerType: guildId ? "group" : "dm",
      originId: guildId ?? undefined,
      senderId: author.id,
      senderName: author.username,
      text: msg.content ?? "",
      mentionTokens: this.getMentionTokens(),
      replyToId: msg.messageReference?.message_id || undefined,
      timestamp: msg.timestamp ? new Date(msg.timestamp) : new Date(),
      raw: rawData,
    };

    this.emitMessage(inbound);
  }

  private isAuthFailureError(error: unknown): boolean {
    const message = toError(error).message.toLowerCase();
    return (
      message.includes("4004") ||
      message.includes("authentication failed") ||
      message.includes("invalid token")
    );
  }

  private handleAuthFailure(source: string, error: unknown): void {
    if (this.disabledReason) {
      return;
    }
    this.disabledReason =
      "Discord authentication failed (token invalid/reset). Update channels.discord.botToken and restart.";
    logger.error(
      { source, err: toError(error) },
      "Discord authentication failed; disabling reconnect to avoid connection storm",
    );
    disableReconnect(this.gateway);
    this.setStatus("error");
    this.emitError(new Error(this.disabledReason));
    void this.disconnect().catch((err: unknown) => {
      logger.warn({ err }, "Discord disconnect after auth failure did not finish");
    });
  }
}

function normalizeDiscordToken(raw: string): string {
  return raw.trim().replace(/^Bot\s+/i, "");
}

function formatUserTag(username: string | undefined, discriminator: string | undefined): string {
  const safeName = username?.trim() || "unknown";
  if (!discriminator || discriminator === "0") {
    return safeName;
  }
  return `${safeName}#${discriminator}`;
}

function getGatewayEmitter(gateway?: GatewayPlugin | null): EventEmitter | undefined {
  return (gateway as unknown as { emitter?: EventEmitter } | undefined)?.emitter;
}

// Carbon keeps reconnect options private; zeroing them stops a storm of reconnects.
function disableReconnect(gateway: GatewayPlugin | null): void {
  if (!gateway) {
    return;
  }
  const reconnectOptions = (
    gateway as unknown as { options?: { reconnect?: { maxAttempts: number } } }
  ).options;
  if (reconnectOptions) {
    reconnectOptions.reconnect = { maxAttempts: 0 };
  }
}

function readStringId(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("id" in value)) {
    return undefined;
  }
  return typeof value.id === "string" ? value.id : undefined;
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

async function fetchApplicationId(token: string): Promise<string> {
  const response = await fetch("https://discord.com/api/v10/oauth2/applications/@me", {
    headers: {
      Authorization: `Bot ${token}`,
    },
  });

  if (response.status === 401) {
    throw new Error("Discord authentication failed: invalid token");
  }
  if (!response.ok) {
    throw new Error(`Discord API /oauth2/applications/@me failed (${response.status})`);
  }

  const data: unknown = await response.json();
  const id = readStringId(data);
  if (!id) {
    throw new Error("Discord API returned no application id");
  }

  return id;
}
