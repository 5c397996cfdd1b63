import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Lifecycle, resolvePidFile } from "./lifecycle";

vi.mock("../../logger", () => ({
  logger: {
    warn: vi.fn(),
  },
}));

describe("Lifecycle", () => {
  let tempDir: string;
  let pidFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "harbormaster-lifecycle-"));
    pidFile = path.join(tempDir, "run", "harbormaster.pid");
    vi.stubEnv("HARBORMASTER_PID_FILE", pidFile);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("resolves the PID file from the environment", () => {
    expect(resolvePidFile()).toBe(pidFile);
  });

  it("writes and removes its own PID", () => {
    Lifecycle.writePid();
    expect(fs.readFileSync(pidFile, "utf8")).toBe(String(process.pid));
    expect(Lifecycle.getPid()).toBe(process.pid);

    Lifecycle.removePid();
    expect(fs.existsSync(pidFile)).toBe(false);
    expect(Lifecycle.getPid()).toBeNull();
  });

  it("refuses to start while another live process holds the PID file", () => {
    Lifecycle.writePid();
    expect(() => Lifecycle.writePid()).toThrow(
      "Harbormaster is already running (PID file exists and process is active).",
    );
  });

  it("cleans up a stale PID file", () => {
    fs.mkdirSync(path.dirname(pidFile), { recursive: true });
    fs.writeFileSync(pidFile, "not-a-pid", "utf8");

    expect(Lifecycle.checkExisting()).toBe(false);
    expect(fs.existsSync(pidFile)).toBe(false);
  });

  it("leaves a PID file owned by another process in place", () => {
    fs.mkdirSync(path.dirname(pidFile), { recursive: true });
    fs.writeFileSync(pidFile, String(process.pid + 1_000_000), "utf8");

    Lifecycle.removePid();
    expect(fs.existsSync(pidFile)).toBe(true);
  });
});
