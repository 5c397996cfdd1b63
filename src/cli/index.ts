#!/usr/bin/env tsx
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("harbormaster")
  .description("Chat-driven remote control for Docker and Podman containers")
  .version(APP_VERSION);

program
  .command("start")
  .description("Start the bot")
  .option("-d, --daemon", "Run as background daemon")
  .option("-f, --foreground", "Run in foreground (default)")
  .option("-c, --config <path>", "Config file path")
  .action(async (options) => {
    const { startRuntime } = await import("./commands/start");
    await startRuntime(options);
  });

program
  .command("stop")
  .description("Stop a running bot")
  .option("-c, --config <path>", "Config file path")
  .action(async (options) => {
    const { stopRuntime } = await import("./commands/stop");
    await stopRuntime({ config: options.config });
  });

program
  .command("status")
  .description("Show whether the bot is running")
  .option("-c, --config <path>", "Config file path")
  .action(async (options) => {
    const { showStatus } = await import("./commands/status");
    await showStatus({ config: options.config });
  });

const configCmd = program
  .command("config")
  .description("Validate configuration")
  .option("-c, --config <path>", "Config file path")
  .option("--doctor", "Run extended checks, including a runtime probe")
  .action(async (options) => {
    const { validateConfig, doctorConfig } = await import("./commands/config");
    if (options.doctor) {
      await doctorConfig(options.config);
      return;
    }
    await validateConfig(options.config);
  });

configCmd
  .command("snapshot [configPath]")
  .description("Show config path/hash snapshot")
  .option("--json", "Output machine-readable JSON")
  .action(async (configPath: string | undefined, options) => {
    const { snapshotConfig } = await import("./commands/config");
    const parentConfig: unknown = configCmd.opts().config;
    await snapshotConfig({
      config: configPath ?? (typeof parentConfig === "string" ? parentConfig : undefined),
      json: Boolean(options.json),
    });
  });

program
  .command("containers")
  .description("Print the container status table from this machine")
  .option("-c, --config <path>", "Config file path")
  .option("--json", "Output machine-readable JSON")
  .action(async (options) => {
    const { showContainers } = await import("./commands/containers");
    await showContainers(options);
  });

await program.parseAsync();

export { program };
