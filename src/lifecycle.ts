// pattern: Imperative Shell
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  /** Stops accepting HTTP connections. */
  readonly closeServer: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

function attempt(logger: Logger, failure: string, step: () => void): void {
  try {
    step();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, failure);
  }
}

/**
 * Registers SIGTERM and SIGINT handlers. On the first signal the build
 * schedulers stop, then the HTTP server, then the database; every step runs
 * even if an earlier one throws. Exits with status 0.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      attempt(deps.logger, "error stopping scheduler", scheduler.stop);
    }

    attempt(deps.logger, "error closing http server", () => {
      deps.closeServer();
      deps.logger.info("http server closed");
    });

    attempt(deps.logger, "error closing database", () => {
      deps.closeDb();
      deps.logger.info("database connection closed");
    });

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
