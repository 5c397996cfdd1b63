import path from "node:path";
import { loadConfig, resolveConfigPath, type HarbormasterConfig } from "../../config";

export type RuntimePaths = {
  configPath: string;
  baseDir: string;
  dataDir: string;
  logsDir: string;
  pidFile: string;
  logFile: string;
};

type PathsConfig = NonNullable<HarbormasterConfig["paths"]>;

/**
 * Where the daemon keeps its PID file and log. `paths.baseDir` and
 * `paths.logs` from the config win over the config file's own directory.
 */
export function resolveRuntimePaths(configPath?: string, paths: PathsConfig = {}): RuntimePaths {
  const resolvedConfig = configPath ? path.resolve(configPath) : resolveConfigPath();
  const baseDir = paths.baseDir ? path.resolve(paths.baseDir) : path.dirname(resolvedConfig);
  const dataDir = path.join(baseDir, "data");
  const logsDir = paths.logs ? path.resolve(paths.logs) : path.join(baseDir, "logs");
  return {
    configPath: resolvedConfig,
    baseDir,
    dataDir,
    logsDir,
    pidFile: path.join(dataDir, "harbormaster.pid"),
    logFile: path.join(logsDir, "harbormaster.log"),
  };
}

// Falls back to the config file's directory when the config cannot be loaded.
export function resolveConfiguredRuntimePaths(configPath?: string): RuntimePaths {
  const resolvedConfig = configPath ? path.resolve(configPath) : resolveConfigPath();
  const result = loadConfig(resolvedConfig);
  return resolveRuntimePaths(resolvedConfig, result.config?.paths);
}
