import { logger } from "./logger";

declare global {
  // eslint-disable-next-line no-var
  var __parlorProcessErrorHandlersRegistered: boolean | undefined;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__parlorProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__parlorProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ error: formatError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ error: formatError(error) }, "Uncaught exception");
    process.exitCode = 1;
  });
}
