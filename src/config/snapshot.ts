import crypto from "node:crypto";
import fs from "node:fs";
import type { HarbormasterConfig } from "./schema";
import { findUnresolvedEnvVars } from "./env";
import { loadConfig, resolveConfigPath, type ConfigLoadResult } from "./loader";

export interface ConfigSnapshot {
  path: string;
  exists: boolean;
  rawHash: string;
  load: ConfigLoadResult;
  effectiveConfig: HarbormasterConfig | null;
  unresolvedEnv: string[];
}

export function hashConfigRaw(raw: string | null): string {
  return crypto
    .createHash("sha256")
    .update(raw ?? "")
    .digest("hex");
}

export function readConfigSnapshot(configPath?: string): ConfigSnapshot {
  const path = resolveConfigPath(configPath);
  const exists = fs.existsSync(path);
  const raw = exists ? fs.readFileSync(path, "utf-8") : null;
  const load = loadConfig(path);
  const effectiveConfig = load.success ? (load.config ?? null) : null;

  return {
    path,
    exists,
    rawHash: hashConfigRaw(raw),
    load,
    effectiveConfig,
    unresolvedEnv: effectiveConfig ? findUnresolvedEnvVars(effectiveConfig) : [],
  };
}
