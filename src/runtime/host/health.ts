import type { ComponentStatus } from "./types";
import { logger } from "../../logger";
import { summarizeError, withTimeout } from "./commands/errors";

export type HealthChecker = () => Promise<ComponentStatus>;

const DEFAULT_CHECK_TIMEOUT_MS = 10_000;

export type HealthCheckOptions = {
  // Bound for a single checker; a runtime probe can hang on a dead socket.
  checkTimeoutMs?: number;
};

export class HealthCheck {
  private checkers: Map<string, HealthChecker> = new Map();
  private results: Map<string, ComponentStatus> = new Map();
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ComponentStatus[]> | null = null;
  private readonly checkTimeoutMs: number;

  constructor(options: HealthCheckOptions = {}) {
    this.checkTimeoutMs = options.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
  }

  register(name: string, checker: HealthChecker): void {
    this.checkers.set(name, checker);
  }

  /**
   * Runs every checker concurrently. Overlapping calls share the pass that is
   * already running.
   */
  async check(): Promise<ComponentStatus[]> {
    if (!this.inFlight) {
      this.inFlight = this.runAll().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runAll(): Promise<ComponentStatus[]> {
    const entries = Array.from(this.checkers.entries());
    return Promise.all(entries.map(([name, checker]) => this.runOne(name, checker)));
  }

  private async runOne(name: string, checker: HealthChecker): Promise<ComponentStatus> {
    let result: ComponentStatus;
    try {
      result = await withTimeout(checker(), this.checkTimeoutMs, `health check ${name}`);
    } catch (error) {
      result = {
        name,
        status: "unhealthy",
        lastCheck: new Date(),
        details: { error: summarizeError(error) },
      };
    }

    const previous = this.results.get(name);
    this.results.set(name, result);
    if (previous?.status !== result.status) {
      this.logTransition(result, previous === undefined);
    }
    return result;
  }

  private logTransition(result: ComponentStatus, initial: boolean): void {
    const log = { component: result.name, status: result.status, details: result.details };
    if (result.status === "healthy") {
      if (!initial) {
        logger.info(log, "Health check: component recovered");
      }
    } else if (result.status === "degraded") {
      logger.warn(log, "Health check: component is degraded");
    } else {
      logger.error(log, "Health check: component is unhealthy");
    }
  }

  startLoop(intervalMs: number): void {
    if (this.intervalId) {
      return;
    }
    this.intervalId = setInterval(() => {
      void this.check();
    }, intervalMs);
  }

  stopLoop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  getResults(): ComponentStatus[] {
    return Array.from(this.results.values());
  }

  isHealthy(): boolean {
    return this.getResults().every((r) => r.status === "healthy");
  }

  getOverallStatus(): ComponentStatus["status"] {
    const results = this.getResults();
    if (results.some((r) => r.status === "unhealthy")) {
      return "unhealthy";
    }
    if (results.some((r) => r.status === "degraded")) {
      return "degraded";
    }
    return "healthy";
  }
}
