import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

type Env = Record<string, string | undefined>;

function shouldColorizeLogs(env: Env): boolean {
  if (env.NO_COLOR === "1" || env.NO_COLOR === "true") {
    return false;
  }
  if (env.HARBORMASTER_DAEMON === "true") {
    return false;
  }
  return Boolean(process.stdout.isTTY);
}

/**
 * Pretty output for terminals and daemon log files; `HARBORMASTER_LOG_FORMAT=json`
 * keeps pino's line-delimited JSON for log shippers.
 */
export function resolveLogTransport(env: Env = process.env): pino.TransportSingleOptions | undefined {
  if (env.HARBORMASTER_LOG_FORMAT?.trim().toLowerCase() === "json") {
    return undefined;
  }
  return {
    target: "pino-pretty",
    options: {
      colorize: shouldColorizeLogs(env),
      ignore: "pid,hostname",
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export const logger = pino({
  level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  // The bot token must never reach a log line, whatever object carries it.
  redact: {
    paths: ["botToken", "*.botToken", "config.channels.discord.botToken", "token"],
    censor: "[redacted]",
  },
  transport: resolveLogTransport(),
});

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
