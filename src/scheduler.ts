import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { PollCycle } from "./pipeline/cycle";

export type CycleScheduler = {
  readonly stop: () => void;
};

/**
 * Creates and starts the tick driver: on every `schedule.tick` the poll cycle
 * runs once and decides for itself which feeds are due.
 *
 * @param cycle - The poll cycle to run on each tick
 * @param config - Application configuration including the tick cron expression
 * @param logger - Logger instance for recording tick failures
 * @returns A CycleScheduler with a stop() method to halt further ticks
 */
export function createCycleScheduler(
  cycle: PollCycle,
  config: AppConfig,
  logger: Logger,
): CycleScheduler {
  const task: ScheduledTask = cron.schedule(config.schedule.tick, async () => {
    try {
      await cycle.run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "poll cycle failed unexpectedly");
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
