import pc from "picocolors";
import type { HarbormasterConfig } from "../../config";
import { loadConfig, readConfigSnapshot, type ConfigSnapshot } from "../../config";
import type { RuntimeGateway } from "../../container/types";
import { createContainerRuntime } from "../../runtime/host/commands";

export type DoctorReport = {
  errors: string[];
  warnings: string[];
};

export async function validateConfig(configPath?: string) {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log("✅ Config check passed. The config file is valid.");
    return;
  }
  console.error("❌ Config check failed. Invalid config file:");
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exit(1);
}

/**
 * Static checks that decide whether the bot can start and answer anyone.
 */
export function collectDoctorReport(
  config: HarbormasterConfig,
  unresolvedEnv: string[] = [],
): DoctorReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  const discord = config.channels?.discord;
  if (discord?.enabled === false) {
    errors.push("channels.discord.enabled is false; the bot has no chat gateway.");
  } else if (!discord?.botToken?.trim()) {
    errors.push("channels.discord.botToken is not set.");
  }

  for (const entry of unresolvedEnv) {
    errors.push(`Unresolved environment reference at ${entry}`);
  }

  const access = config.access;
  if (!access?.allowedGuilds?.length) {
    warnings.push("access.allowedGuilds is empty; every message will be ignored.");
  }
  if (!access?.allowedChannels?.length) {
    warnings.push("access.allowedChannels is empty; every message will be ignored.");
  }

  if (!config.containers?.length) {
    warnings.push("No containers are configured; only status and help will answer.");
  }

  return { errors, warnings };
}

/**
 * Asks the runtime for its container list and reports configured entries it
 * does not know. Unreachable runtimes are a blocking issue.
 */
export async function probeRuntime(
  config: HarbormasterConfig,
  runtime: RuntimeGateway,
): Promise<DoctorReport> {
  const errors: string[] = [];
  const warnings: string[] = [];
  const backend = config.runtime?.backend ?? "docker";

  if (!(await runtime.isAvailable())) {
    errors.push(
      `The ${backend} runtime is not reachable${config.runtime?.host ? ` at ${config.runtime.host}` : ""}.`,
    );
    return { errors, warnings };
  }

  try {
    const known = new Set((await runtime.listContainers()).map((entry) => entry.identifier));
    for (const entry of config.containers ?? []) {
      const identifier = entry.container ?? entry.name;
      if (!known.has(identifier)) {
        warnings.push(`Container "${identifier}" (${entry.name}) does not exist on the runtime.`);
      }
    }
  } catch (error) {
    warnings.push(
      `Could not list containers: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return { errors, warnings };
}

function printDoctorReport(report: DoctorReport): void {
  if (report.errors.length === 0) {
    console.log(pc.green("✅ Config check passed. The config is runnable."));
  } else {
    console.error(pc.red("❌ Config check failed with blocking issues:"));
    for (const error of report.errors) {
      console.error(`- ${error}`);
    }
  }

  if (report.warnings.length > 0) {
    console.warn(pc.yellow("\n⚠️ Warnings:"));
    for (const warn of report.warnings) {
      console.warn(`- ${warn}`);
    }
  }
}

export async function doctorConfig(configPath?: string) {
  const snapshot = readConfigSnapshot(configPath);
  if (!snapshot.load.success || !snapshot.effectiveConfig) {
    console.error("❌ Config check failed. Invalid config file:");
    for (const error of snapshot.load.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  const config = snapshot.effectiveConfig;
  const report = collectDoctorReport(config, snapshot.unresolvedEnv);
  const probe = await probeRuntime(config, createContainerRuntime(config));
  const merged: DoctorReport = {
    errors: [...report.errors, ...probe.errors],
    warnings: [...report.warnings, ...probe.warnings],
  };

  printDoctorReport(merged);
  if (merged.errors.length > 0) {
    process.exit(1);
  }
}

function printSnapshot(snapshot: ConfigSnapshot, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        {
          path: snapshot.path,
          exists: snapshot.exists,
          rawHash: snapshot.rawHash,
          valid: snapshot.load.success,
          errors: snapshot.load.errors ?? [],
          unresolvedEnv: snapshot.unresolvedEnv,
        },
        null,
        2,
      ),
    );
    return;
  }
  console.log(`Path: ${snapshot.path}`);
  console.log(`Exists: ${snapshot.exists ? "yes" : "no"}`);
  console.log(`Hash: ${snapshot.rawHash}`);
  console.log(`Valid: ${snapshot.load.success ? pc.green("yes") : pc.red("no")}`);
  for (const error of snapshot.load.errors ?? []) {
    console.log(`- ${error}`);
  }
}

export async function snapshotConfig(options: { config?: string; json?: boolean }) {
  const snapshot = readConfigSnapshot(options.config);
  printSnapshot(snapshot, Boolean(options.json));
  if (!snapshot.load.success) {
    process.exit(1);
  }
}
