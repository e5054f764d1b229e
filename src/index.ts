import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { runMigrations } from "./db/migrate.js";
import { getPool, initServices, shutdownServices } from "./instance/services.js";
import { captureError, initSentry } from "./observability/sentry.js";

// Process-level handlers so stray async errors are logged and reported.

export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    operation: "unhandledRejection",
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  captureError(err, { operation: "uncaughtException", extra: { origin } });
  // State is undefined after an uncaught exception. Winston's Console transport is synchronous.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

// No-op when SENTRY_DSN is absent
initSentry(process.env.SENTRY_DSN);

async function main(): Promise<void> {
  await runMigrations(getPool());
  logger.info("Database migrations applied");

  const { reaper } = await initServices();
  reaper.start();
  logger.info("Challenge instance runtime started", { nodeEnv: config.nodeEnv });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    shutdownServices().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
  captureError(err, { operation: "startup" });
  process.exit(1);
});
