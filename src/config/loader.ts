import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { processIncludes } from "./includes";
import { HarbormasterConfigSchema, type HarbormasterConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: HarbormasterConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.HARBORMASTER_CONFIG;
  if (customPath) {
    return path.resolve(expandHomePath(customPath));
  }
  if (envPath) {
    return path.resolve(expandHomePath(envPath));
  }
  return path.join(os.homedir(), ".harbormaster", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown, configPath: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  const paths = isRecord(obj.paths) ? { ...obj.paths } : {};
  const baseDir =
    typeof paths.baseDir === "string" && paths.baseDir.trim()
      ? expandHomePath(paths.baseDir)
      : path.dirname(configPath);
  paths.baseDir = baseDir;
  paths.logs =
    typeof paths.logs === "string" ? expandHomePath(paths.logs) : path.join(baseDir, "logs");
  obj.paths = paths;

  const logging = isRecord(obj.logging) ? { ...obj.logging } : {};
  if (!Object.hasOwn(logging, "level")) {
    logging.level = "info";
  }
  obj.logging = logging;

  const runtime = isRecord(obj.runtime) ? { ...obj.runtime } : {};
  if (!Object.hasOwn(runtime, "backend")) {
    runtime.backend = "docker";
  }
  obj.runtime = runtime;

  if (!Object.hasOwn(obj, "containers")) {
    obj.containers = [];
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  const envFiles = [".env", ".env.var"];

  for (const envFile of envFiles) {
    const envPath = path.join(configDir, envFile);
    if (!fs.existsSync(envPath)) {
      continue;
    }
    const result = loadDotEnv({ path: envPath, override: false, quiet: true });
    if (result.error) {
      throw result.error;
    }
  }
}

function parseConfigText(raw: string): unknown {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const first = parseErrors[0];
    throw new Error(`Invalid JSONC (${printParseErrorCode(first.error)} at offset ${first.offset})`);
  }
  return parsed;
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    let config = parseConfigText(fs.readFileSync(resolvedPath, "utf-8"));
    config = processIncludes(config, resolvedPath);
    config = replaceEnvVars(config);
    config = applyConfigDefaults(config, resolvedPath);

    const result = HarbormasterConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, path: resolvedPath };
    }

    return { success: true, config: result.data, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
