import { parse as parseJsonc } from "jsonc-parser";
import fs from "node:fs";
import path from "node:path";

export const INCLUDE_KEY = "$include";
const MAX_INCLUDE_DEPTH = 10;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Arrays concatenate so that an included file can contribute containers.
function deepMerge(target: unknown, source: unknown): unknown {
  if (Array.isArray(target) && Array.isArray(source)) {
    return [...target, ...source];
  }
  if (isPlainObject(target) && isPlainObject(source)) {
    const result: Record<string, unknown> = { ...target };
    for (const key of Object.keys(source)) {
      result[key] = key in result ? deepMerge(result[key], source[key]) : source[key];
    }
    return result;
  }
  return source;
}

function readIncludeFile(fullPath: string): unknown {
  if (!fs.existsSync(fullPath)) {
    throw new Error(`Included config file not found: ${fullPath}`);
  }
  return parseJsonc(fs.readFileSync(fullPath, "utf-8"));
}

export function processIncludes(
  config: unknown,
  basePath: string,
  depth = 0,
  chain: readonly string[] = [path.resolve(basePath)],
): unknown {
  if (depth > MAX_INCLUDE_DEPTH) {
    throw new Error(`Max include depth exceeded: ${basePath}`);
  }
  if (!isPlainObject(config)) {
    return config;
  }

  const rest: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (key !== INCLUDE_KEY) {
      rest[key] = value;
    }
  }
  if (!(INCLUDE_KEY in config)) {
    return rest;
  }

  const includeValue = config[INCLUDE_KEY];
  const includes = Array.isArray(includeValue) ? includeValue : [includeValue];

  let merged: unknown = {};
  for (const includePath of includes) {
    const fullPath = path.resolve(path.dirname(basePath), String(includePath));
    if (chain.includes(fullPath)) {
      throw new Error(`Circular config include: ${[...chain, fullPath].join(" -> ")}`);
    }
    const processed = processIncludes(readIncludeFile(fullPath), fullPath, depth + 1, [
      ...chain,
      fullPath,
    ]);
    merged = deepMerge(merged, processed);
  }
  return deepMerge(merged, rest);
}
