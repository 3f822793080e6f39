// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer: (done: () => void) => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers that stop the schedulers, then close the
 * HTTP server, then exit 0. A second signal during shutdown is ignored, and a
 * step that throws does not prevent the next one.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = errorMessage(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    const finish = () => {
      deps.logger.info("shutdown complete");
      process.exit(0);
    };

    try {
      deps.closeServer(() => {
        deps.logger.info("http server closed");
        finish();
      });
    } catch (err) {
      const message = errorMessage(err);
      deps.logger.error({ error: message }, "error closing http server");
      finish();
    }
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
