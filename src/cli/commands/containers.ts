import pc from "picocolors";
import { loadConfig } from "../../config";
import { configureLogger } from "../../logger";
import { createCommandStack, formatStatusTable } from "../../runtime/host/commands";

export type ContainersCommandOptions = {
  config?: string;
  json?: boolean;
};

/**
 * Prints the same status table the bot answers with, queried from this
 * machine. Runs as the local operator, so the chat allow-lists do not apply.
 */
export async function showContainers(options: ContainersCommandOptions = {}) {
  const result = loadConfig(options.config);
  if (!result.success || !result.config) {
    console.error("Error: failed to load configuration.");
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  // Keep progress logs out of the table unless the config asks for more.
  configureLogger(result.config.logging?.level === "info" ? "warn" : result.config.logging?.level);
  const stack = await createCommandStack(result.config);
  const outcome = await stack.dispatcher.execute({
    verb: "status",
    originId: "cli",
    channelId: "cli",
    authorId: "cli",
  });
  if (outcome.kind !== "success" || outcome.payload.type !== "status") {
    console.error(pc.red("Error: status query returned no table."));
    process.exit(1);
  }

  const rows = outcome.payload.rows;
  if (options.json) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  if (rows.length === 0) {
    console.log(pc.yellow("No containers are configured."));
    return;
  }
  console.log(formatStatusTable(rows));
}
