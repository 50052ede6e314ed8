// pattern: Imperative Shell
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer?: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

function attempt(logger: Logger, failureMessage: string, step: () => void): void {
  try {
    step();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, failureMessage);
  }
}

/**
 * Registers SIGTERM and SIGINT handlers that stop the tick scheduler, close
 * the API server and then the database, and exit.
 *
 * A fetch still in flight is abandoned: validators, poll state and ledger
 * rows are only written after a fetch completes, so nothing half-written is
 * left behind. Repeated signals are ignored once shutdown has begun.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      attempt(deps.logger, "error stopping scheduler", () => scheduler.stop());
    }

    const closeServer = deps.closeServer;
    if (closeServer) {
      attempt(deps.logger, "error closing api server", closeServer);
    }

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
