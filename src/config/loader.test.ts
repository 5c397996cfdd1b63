import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, resolveConfigPath } from "./loader";

const ENV_KEY = "HARBORMASTER_LOADER_TEST_TOKEN";
const ORIGINAL_ENV = process.env[ENV_KEY];
const ORIGINAL_CONFIG_ENV = process.env.HARBORMASTER_CONFIG;
const tempDirs: string[] = [];

function createConfigDir(config: Record<string, unknown>): { dir: string; configPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harbormaster-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
  return { dir, configPath };
}

afterEach(() => {
  if (ORIGINAL_ENV === undefined) {
    delete process.env[ENV_KEY];
  } else {
    process.env[ENV_KEY] = ORIGINAL_ENV;
  }
  if (ORIGINAL_CONFIG_ENV === undefined) {
    delete process.env.HARBORMASTER_CONFIG;
  } else {
    process.env.HARBORMASTER_CONFIG = ORIGINAL_CONFIG_ENV;
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("reports a missing config file", () => {
    const result = loadConfig("/nonexistent/harbormaster/config.jsonc");

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Config file not found: /nonexistent/harbormaster/config.jsonc"]);
  });

  it("parses JSONC with comments and applies defaults", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harbormaster-loader-"));
    tempDirs.push(dir);
    const configPath = path.join(dir, "config.jsonc");
    fs.writeFileSync(
      configPath,
      `{
        // managed containers
        "containers": [{ "name": "minecraft", "port": 25565 }],
      }`,
      "utf-8",
    );

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.logging?.level).toBe("info");
    expect(result.config?.runtime?.backend).toBe("docker");
    expect(result.config?.paths?.baseDir).toBe(dir);
    expect(result.config?.paths?.logs).toBe(path.join(dir, "logs"));
    expect(result.config?.containers).toEqual([{ name: "minecraft", port: "25565" }]);
  });

  it("loads .env beside the config without overriding the process env", () => {
    const { dir, configPath } = createConfigDir({
      channels: { discord: { botToken: `\${${ENV_KEY}}` } },
    });
    fs.writeFileSync(path.join(dir, ".env"), `${ENV_KEY}=from-dotenv\n`, "utf-8");
    delete process.env[ENV_KEY];

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.channels?.discord?.botToken).toBe("from-dotenv");
  });

  it("prefers an already exported variable over .env", () => {
    const { dir, configPath } = createConfigDir({
      channels: { discord: { botToken: `\${${ENV_KEY}}` } },
    });
    fs.writeFileSync(path.join(dir, ".env"), `${ENV_KEY}=from-dotenv\n`, "utf-8");
    process.env[ENV_KEY] = "from-shell";

    const result = loadConfig(configPath);

    expect(result.config?.channels?.discord?.botToken).toBe("from-shell");
  });

  it("merges $include files and concatenates container lists", () => {
    const { dir, configPath } = createConfigDir({
      $include: "./containers.jsonc",
      containers: [{ name: "valheim" }],
    });
    fs.writeFileSync(
      path.join(dir, "containers.jsonc"),
      JSON.stringify({ containers: [{ name: "minecraft" }], runtime: { backend: "podman" } }),
      "utf-8",
    );

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.containers?.map((entry) => entry.name)).toEqual(["minecraft", "valheim"]);
    expect(result.config?.runtime?.backend).toBe("podman");
  });

  it("rejects circular includes", () => {
    const { dir, configPath } = createConfigDir({ $include: "./other.jsonc" });
    fs.writeFileSync(path.join(dir, "other.jsonc"), JSON.stringify({ $include: "./config.jsonc" }));

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toContain("Circular config include");
  });

  it("returns schema issues with their paths", () => {
    const { configPath } = createConfigDir({ runtime: { timeoutMs: -1 } });

    const result = loadConfig(configPath);

    expect(result.success).toBe(false);
    expect(result.errors?.[0]?.startsWith("runtime.timeoutMs:")).toBe(true);
  });
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path over the environment", () => {
    process.env.HARBORMASTER_CONFIG = "/etc/harbormaster/config.jsonc";
    expect(resolveConfigPath("/tmp/custom.jsonc")).toBe("/tmp/custom.jsonc");
    expect(resolveConfigPath()).toBe("/etc/harbormaster/config.jsonc");
  });

  it("defaults to the home directory", () => {
    delete process.env.HARBORMASTER_CONFIG;
    expect(resolveConfigPath()).toBe(path.join(os.homedir(), ".harbormaster", "config.jsonc"));
  });
});
