import type { HarbormasterConfig } from "../../config";
import type { RuntimeHostOptions, RuntimeStatus } from "./types";
import { loadConfig, resolveConfigPath } from "../../config";
import { configureLogger, logger } from "../../logger";
import { DiscordPlugin } from "../adapters/channels/discord/plugin";
import { ChannelRegistry } from "../adapters/channels/registry";
import { createCommandStack, type CommandStack } from "./commands";
import { HealthCheck } from "./health";
import { Lifecycle } from "./lifecycle";
import { MessageHandler } from "./message-handler";

const HEALTH_CHECK_INTERVAL_MS = 30_000;

export class RuntimeHost {
  private running = false;
  private startedAt: Date | null = null;
  private health: HealthCheck;
  private channelRegistry: ChannelRegistry;
  private commands: CommandStack | null = null;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private options: RuntimeHostOptions = {}) {
    this.health = new HealthCheck();
    this.channelRegistry = new ChannelRegistry();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    logger.info("Starting Harbormaster...");

    // 1. Check for existing instance and write PID
    try {
      Lifecycle.writePid();
    } catch (error) {
      this.fail(error instanceof Error ? error.message : String(error));
    }

    // 2. Load config
    const config = this.loadConfigOrExit();
    configureLogger(config.logging?.level);

    const botToken = config.channels?.discord?.botToken?.trim();
    if (config.channels?.discord?.enabled === false || !botToken) {
      this.fail("Discord bot token is not configured (channels.discord.botToken).");
    }

    // 3. Build the command pipeline
    this.commands = await createCommandStack(config);
    const handler = new MessageHandler(this.commands.dispatcher, this.commands.renderOptions);

    // 4. Connect Discord
    const discord = new DiscordPlugin({ botToken });
    this.channelRegistry.register(discord);
    this.channelRegistry.setMessageHandler((msg, channel) => handler.handle(msg, channel));
    try {
      await this.channelRegistry.connectAll();
      logger.info("Discord channel connected");
    } catch (error) {
      this.fail(
        `Failed to connect to Discord: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    // 5. Setup Health Checks
    this.setupHealthChecks();
    await this.health.check();
    this.health.startLoop(HEALTH_CHECK_INTERVAL_MS);

    if (this.health.isHealthy()) {
      logger.info("Health check: all components healthy");
    } else {
      for (const result of this.health.getResults()) {
        if (result.status !== "healthy") {
          logger.warn(
            `Health check: component ${result.name} is ${result.status} - ${typeof result.details?.error === "string" ? result.details.error : "no details"}`,
          );
        }
      }
    }

    this.running = true;
    this.startedAt = new Date();

    logger.info(`Harbormaster started (PID: ${process.pid})`);
    if (this.options.daemon) {
      logger.info("Running in daemon mode");
    }

    this.keepAlive();
  }

  private loadConfigOrExit(): HarbormasterConfig {
    const configPath = resolveConfigPath(this.options.configPath);
    const result = loadConfig(configPath);
    if (!result.success || !result.config) {
      const details = result.errors?.join("; ") || "Unknown config error";
      this.fail(`Failed to load configuration from ${configPath}: ${details}`);
    }
    logger.info({ path: configPath }, "Configuration loaded");
    return result.config;
  }

  private setupHealthChecks() {
    this.health.register("runtime", async () => {
      const runtime = this.commands?.runtime;
      const available = runtime ? await runtime.isAvailable() : false;
      return {
        name: "runtime",
        status: available ? "healthy" : "unhealthy",
        lastCheck: new Date(),
        details: available ? undefined : { error: "Container runtime is not reachable" },
      };
    });

    this.health.register("channels", async () => {
      const channels = this.channelRegistry.list();
      const connected = channels.filter((c) => c.getStatus() === "connected");
      return {
        name: "channels",
        status: connected.length > 0 ? "healthy" : "degraded",
        lastCheck: new Date(),
        details: {
          total: channels.length,
          connected: connected.length,
        },
      };
    });
  }

  // Startup failures are not recoverable per command; stop the process.
  private fail(message: string): never {
    logger.error(message);
    Lifecycle.removePid();
    process.exit(1);
  }

  async stop(exitCode = 0): Promise<void> {
    if (!this.running) {
      return;
    }

    logger.info("Shutting down...");

    await this.channelRegistry.disconnectAll();
    this.health.stopLoop();
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }

    Lifecycle.removePid();

    this.running = false;
    this.startedAt = null;

    logger.info("Harbormaster stopped cleanly.");
    process.exit(exitCode);
  }

  getStatus(): RuntimeStatus {
    return {
      running: this.running,
      pid: this.running ? process.pid : null,
      uptime: this.startedAt ? Math.floor((Date.now() - this.startedAt.getTime()) / 1000) : 0,
      startedAt: this.startedAt,
      health: {
        overall: this.health.getOverallStatus(),
        components: this.health.getResults(),
      },
      containers: this.commands?.registry.names() ?? [],
    };
  }

  private keepAlive() {
    // The gateway socket alone may not hold the event loop open
    this.keepAliveTimer = setInterval(() => {
      if (!this.running && this.keepAliveTimer) {
        clearInterval(this.keepAliveTimer);
      }
    }, 1000);
  }
}
