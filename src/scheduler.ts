import cron from "node-cron";
import type { Logger } from "./logger.js";

export type Tick = () => Promise<unknown>;

/** Wraps a tick so that a call arriving while one is running is skipped. */
export function serializeTick(tick: Tick, logger: Logger): () => Promise<boolean> {
  let running = false;
  return async () => {
    if (running) {
      logger.warn("Previous run still in progress; skipping this tick.");
      return false;
    }
    running = true;
    try {
      await tick();
      return true;
    } finally {
      running = false;
    }
  };
}

export interface Schedule {
  /** Runs a tick outside the schedule, under the same overlap guard. */
  runNow(): Promise<boolean>;
  stop(): void;
}

export function startSchedule(expression: string, tick: Tick, logger: Logger): Schedule {
  const guarded = serializeTick(tick, logger);
  const task = cron.schedule(expression, () => {
    logger.debug(`Scheduled run started at ${new Date().toISOString()}`);
    guarded().catch((err: unknown) => logger.error("Scheduled run error", err));
  });
  return {
    runNow: guarded,
    stop() {
      task.stop();
    },
  };
}
