export type ContainerBackend = "docker" | "podman";

export type ContainerStatus =
  | "created"
  | "running"
  | "paused"
  | "restarting"
  | "exited"
  | "dead"
  | "unknown";

export interface ContainerListEntry {
  id: string;
  identifier: string;
  running: boolean;
  status: ContainerStatus;
}

// Live view of one container; never cached between commands.
export interface ContainerRuntimeState {
  id: string;
  identifier: string;
  running: boolean;
  status: ContainerStatus;
  startedAt?: string;
}

/**
 * Narrow contract the command dispatcher depends on. `inspect` resolves to
 * `undefined` when the runtime has no container with that identifier; every
 * other failure rejects.
 */
export interface RuntimeGateway {
  listContainers(): Promise<ContainerListEntry[]>;
  inspect(identifier: string): Promise<ContainerRuntimeState | undefined>;
  start(identifier: string): Promise<void>;
  stop(identifier: string): Promise<void>;
  restart(identifier: string): Promise<void>;
  fetchLogs(identifier: string, maxLines: number): Promise<string>;
  isAvailable(): Promise<boolean>;
}

export function normalizeContainerStatus(raw: string | undefined): ContainerStatus {
  switch ((raw ?? "").trim().toLowerCase()) {
    case "created":
    case "configured":
    case "initialized":
      return "created";
    case "running":
      return "running";
    case "paused":
      return "paused";
    case "restarting":
      return "restarting";
    case "exited":
    case "stopped":
      return "exited";
    case "dead":
      return "dead";
    default:
      return "unknown";
  }
}

// Paused and restarting containers still hold a live process.
export function isContainerActive(status: ContainerStatus): boolean {
  return status === "running" || status === "paused" || status === "restarting";
}
