import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { InvokeFn } from "./api/context";
import { isNotifierFailure } from "./notifier";
import { errorMessage } from "./errors";

export type NotifierScheduler = {
  readonly stop: () => void;
};

/**
 * Starts a cron task that runs the notifier with the configured defaults.
 * A failed run is logged; the schedule keeps going.
 *
 * @param expression - Cron expression from `schedule.run`
 * @param invoke - Runs the notifier once
 * @param logger - Logger for scheduled run events
 * @returns A scheduler whose stop() halts the cron task
 */
export function createNotifierScheduler(
  expression: string,
  invoke: InvokeFn,
  logger: Logger,
): NotifierScheduler {
  const task: ScheduledTask = cron.schedule(expression, async () => {
    logger.info("scheduled run starting");

    try {
      const response = await invoke(undefined, "schedule");
      if (isNotifierFailure(response)) {
        logger.error({ error: response.error }, "scheduled run failed");
        return;
      }
      logger.info(
        { sent: response.sent, errorCount: response.errors?.length ?? 0 },
        "scheduled run complete",
      );
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ error: message }, "scheduled run failed unexpectedly");
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
