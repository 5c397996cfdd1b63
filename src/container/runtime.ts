import { execa, ExecaError } from "execa";
import { logger } from "../logger";
import {
  isContainerActive,
  normalizeContainerStatus,
  type ContainerBackend,
  type ContainerListEntry,
  type ContainerRuntimeState,
  type RuntimeGateway,
} from "./types";

export interface ContainerRuntimeOptions {
  backend?: ContainerBackend;
  // Endpoint of the engine API, e.g. unix:///run/podman/podman.sock
  host?: string;
  binary?: string;
  timeoutMs?: number;
  stopTimeoutSec?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_STOP_TIMEOUT_SEC = 10;
const INSPECT_FORMAT = "{{.Id}}\t{{.State.Status}}\t{{.State.StartedAt}}";
const LIST_FORMAT = "{{.ID}}\t{{.Names}}\t{{.State}}";
const NO_SUCH_CONTAINER = /no such (container|object)|no container with name or id/i;

export class ContainerRuntime implements RuntimeGateway {
  readonly backend: ContainerBackend;
  private readonly binary: string;
  private readonly host?: string;
  private readonly timeoutMs: number;
  private readonly stopTimeoutSec: number;

  constructor(options: ContainerRuntimeOptions = {}) {
    this.backend = options.backend ?? "docker";
    this.binary = options.binary ?? this.backend;
    this.host = options.host;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stopTimeoutSec = options.stopTimeoutSec ?? DEFAULT_STOP_TIMEOUT_SEC;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.run(["info"]);
      return true;
    } catch {
      return false;
    }
  }

  async listContainers(): Promise<ContainerListEntry[]> {
    const result = await this.run(["ps", "-a", "--format", LIST_FORMAT]);
    const containers: ContainerListEntry[] = [];

    for (const line of result.stdout.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      const [id = "", names = "", state] = line.split("\t");
      const status = normalizeContainerStatus(state);
      // docker prints comma-separated names; the first one is the primary name
      const identifier = names.split(",")[0]?.trim() ?? "";
      containers.push({ id, identifier, status, running: isContainerActive(status) });
    }

    return containers;
  }

  async inspect(identifier: string): Promise<ContainerRuntimeState | undefined> {
    try {
      // Without --type the CLI also matches images, volumes and networks of the same name.
      const result = await this.run([
        "inspect",
        "--type",
        "container",
        "--format",
        INSPECT_FORMAT,
        identifier,
      ]);
      const [id = "", state, startedAt] = result.stdout.trim().split("\t");
      const status = normalizeContainerStatus(state);
      return {
        id,
        identifier,
        status,
        running: isContainerActive(status),
        startedAt: startedAt?.trim() || undefined,
      };
    } catch (err) {
      if (err instanceof ExecaError && NO_SUCH_CONTAINER.test(String(err.stderr ?? ""))) {
        return undefined;
      }
      throw err;
    }
  }

  async start(identifier: string): Promise<void> {
    logger.info({ identifier, backend: this.backend }, "Starting container");
    await this.run(["start", identifier]);
  }

  async stop(identifier: string): Promise<void> {
    logger.info({ identifier, backend: this.backend }, "Stopping container");
    await this.run(["stop", "-t", String(this.stopTimeoutSec), identifier]);
  }

  async restart(identifier: string): Promise<void> {
    logger.info({ identifier, backend: this.backend }, "Restarting container");
    await this.run(["restart", "-t", String(this.stopTimeoutSec), identifier]);
  }

  async fetchLogs(identifier: string, maxLines: number): Promise<string> {
    const result = await this.run(["logs", "--tail", String(maxLines), identifier], {
      all: true,
    });
    return result.all ?? "";
  }

  // Connection flags go before the subcommand for both CLIs.
  private globalArgs(): string[] {
    if (!this.host) {
      return [];
    }
    return this.backend === "docker" ? ["-H", this.host] : ["--url", this.host];
  }

  private async run(args: string[], options: { all?: boolean } = {}) {
    const fullArgs = [...this.globalArgs(), ...args];
    logger.debug({ binary: this.binary, args: fullArgs }, "Running container CLI");
    return execa(this.binary, fullArgs, {
      timeout: this.timeoutMs,
      all: options.all ?? false,
      stripFinalNewline: true,
    });
  }
}
