import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { logger } from "../../logger";

export function resolvePidFile(): string {
  const envPath = process.env.HARBORMASTER_PID_FILE;
  if (envPath && envPath.trim().length > 0) {
    return path.resolve(envPath);
  }
  return path.resolve(process.cwd(), "data/harbormaster.pid");
}

function ensureDataDir() {
  const dataDir = path.dirname(resolvePidFile());
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }
}

function readPid(pidFile: string): number {
  return Number.parseInt(fs.readFileSync(pidFile, "utf8").trim(), 10);
}

/**
 * Checks if a process with the given PID is actually running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks if the process exists without actually sending a signal
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Manages the PID file that keeps a second bot from answering the same channel.
 */
export const Lifecycle = {
  writePid(): void {
    ensureDataDir();
    if (this.checkExisting()) {
      throw new Error("Harbormaster is already running (PID file exists and process is active).");
    }
    fs.writeFileSync(resolvePidFile(), process.pid.toString(), "utf8");
  },

  removePid(): void {
    const pidFile = resolvePidFile();
    if (fs.existsSync(pidFile) && readPid(pidFile) === process.pid) {
      fs.unlinkSync(pidFile);
    }
  },

  checkExisting(): boolean {
    const pidFile = resolvePidFile();
    if (!fs.existsSync(pidFile)) {
      return false;
    }
    const pid = readPid(pidFile);
    if (!Number.isNaN(pid) && isProcessRunning(pid)) {
      return true;
    }
    logger.warn({ pid, pidFile }, "Stale PID file found, cleaning up");
    fs.unlinkSync(pidFile);
    return false;
  },

  getPid(): number | null {
    const pidFile = resolvePidFile();
    if (!fs.existsSync(pidFile)) {
      return null;
    }
    const pid = readPid(pidFile);
    return Number.isNaN(pid) ? null : pid;
  },

  isDaemon(): boolean {
    return process.env.HARBORMASTER_DAEMON === "true" || process.argv.includes("--daemon");
  },
};
