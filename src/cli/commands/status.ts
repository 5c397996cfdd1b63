import pc from "picocolors";
import { Lifecycle, isProcessRunning } from "../../runtime/host/lifecycle";
import { resolveConfiguredRuntimePaths } from "./runtime-paths";

export async function showStatus(options: { config?: string } = {}) {
  const runtime = resolveConfiguredRuntimePaths(options.config);
  process.env.HARBORMASTER_PID_FILE = runtime.pidFile;

  const pid = Lifecycle.getPid();
  if (pid !== null && isProcessRunning(pid)) {
    console.log(`Harbormaster is ${pc.green("running")} (PID: ${pid}).`);
  } else {
    console.log(`Harbormaster is ${pc.yellow("not running")}.`);
  }
  console.log(`  Config: ${runtime.configPath}`);
  console.log(`  Log: ${runtime.logFile}`);
}
