import { RuntimeHost } from "./index";
import { Lifecycle } from "./lifecycle";
import { registerProcessErrorHandlers } from "./process-error-handlers";

registerProcessErrorHandlers();

const runtime = new RuntimeHost({ daemon: Lifecycle.isDaemon() });

process.on("SIGINT", async () => {
  await runtime.stop();
});

process.on("SIGTERM", async () => {
  await runtime.stop();
});

await runtime.start();
