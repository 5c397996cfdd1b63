import { Lifecycle, isProcessRunning } from "../../runtime/host/lifecycle";
import { resolveConfiguredRuntimePaths } from "./runtime-paths";

const STOP_TIMEOUT_MS = 10_000;
const STOP_POLL_MS = 200;

export async function stopRuntime(options: { config?: string } = {}) {
  const runtime = resolveConfiguredRuntimePaths(options.config);
  process.env.HARBORMASTER_PID_FILE = runtime.pidFile;
  if (!Lifecycle.checkExisting()) {
    console.error("Error: Harbormaster is not running.");
    process.exit(1);
  }

  const pid = Lifecycle.getPid();
  if (pid === null) {
    console.error("Error: Harbormaster PID file is missing.");
    process.exit(1);
  }

  console.log(`Stopping Harbormaster (PID: ${pid})...`);

  try {
    process.kill(pid, "SIGTERM");
    const startedAt = Date.now();

    while (Date.now() - startedAt < STOP_TIMEOUT_MS) {
      if (!isProcessRunning(pid)) {
        console.log("Harbormaster stopped.");
        return;
      }
      await new Promise((resolve) => setTimeout(resolve, STOP_POLL_MS));
    }

    console.warn("Harbormaster is still running after 10s. You may need to stop it manually.");
    process.exit(1);
  } catch (error) {
    console.error(
      `Failed to stop Harbormaster: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  }
}
