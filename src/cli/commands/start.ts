import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, resolveConfigPath } from "../../config";
import { Lifecycle } from "../../runtime/host/lifecycle";
import { resolveRuntimePaths } from "./runtime-paths";

export type RuntimeStartOptions = {
  config?: string;
  daemon?: boolean;
  foreground?: boolean;
};

export type RuntimeLaunchTarget = {
  command: string;
  args: string[];
};

export function resolveRuntimeStartMode(
  options: RuntimeStartOptions = {},
): "daemon" | "foreground" {
  if (options.foreground) {
    return "foreground";
  }
  return options.daemon ? "daemon" : "foreground";
}

// The host runs from its TypeScript source through the tsx loader.
export function resolveRuntimeLaunchTarget(execPath: string, hostScript: string): RuntimeLaunchTarget {
  return { command: execPath, args: ["--import", "tsx", hostScript] };
}

export async function startRuntime(options: RuntimeStartOptions = {}) {
  const configPath = options.config ? path.resolve(options.config) : resolveConfigPath();
  const configResult = loadConfig(configPath);
  if (!configResult.success || !configResult.config) {
    console.error("Error: failed to load configuration.");
    for (const error of configResult.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  const runtime = resolveRuntimePaths(configPath, configResult.config.paths);
  process.env.HARBORMASTER_PID_FILE = runtime.pidFile;

  if (Lifecycle.checkExisting()) {
    console.error("Error: Harbormaster is already running.");
    process.exit(1);
  }

  const hostScript = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    "../../runtime/host/main.ts",
  );
  const target = resolveRuntimeLaunchTarget(process.execPath, hostScript);
  const env = {
    ...process.env,
    HARBORMASTER_CONFIG: runtime.configPath,
    HARBORMASTER_PID_FILE: runtime.pidFile,
  };

  console.log(`Starting Harbormaster with config: ${runtime.configPath}`);

  if (resolveRuntimeStartMode(options) === "daemon") {
    console.log("Running in daemon mode...");
    fs.mkdirSync(runtime.logsDir, { recursive: true });
    fs.mkdirSync(runtime.dataDir, { recursive: true });
    const out = fs.openSync(runtime.logFile, "a");
    const err = fs.openSync(runtime.logFile, "a");

    const subprocess = spawn(target.command, target.args, {
      detached: true,
      stdio: ["ignore", out, err],
      env: { ...env, HARBORMASTER_DAEMON: "true" },
    });

    subprocess.unref();
    console.log(`Harbormaster started in background (PID: ${subprocess.pid})`);
    console.log(`Logs: ${runtime.logFile}`);
    return;
  }

  const subprocess = spawn(target.command, target.args, { stdio: "inherit", env });
  subprocess.on("exit", (code) => {
    process.exit(code || 0);
  });
}
