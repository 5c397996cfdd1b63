import { logger } from "../../logger";

declare global {
  // eslint-disable-next-line no-var
  var __harbormasterProcessErrorHandlersRegistered: boolean | undefined;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__harbormasterProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__harbormasterProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exitCode = 1;
  });
}
