/**
 * Cron scheduling for repeated export runs.
 * Uses `cron-parser` to compute the next fire time and a single timer that is
 * re-armed after each tick. Ticks never overlap: a tick that fires while the
 * previous job is still running is skipped.
 */

import cronParser from "cron-parser";
import type { Logger } from "pino";
import { errorMessage } from "./errors.js";

/** Longest delay setTimeout accepts; longer waits are chained. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface ScheduleOptions {
  cron: string;
  job: () => Promise<unknown>;
  logger: Logger;
}

export interface ScheduleHandle {
  stop(): void;
  /** Next planned fire time, or undefined once stopped. */
  nextRun(): Date | undefined;
}

export function nextRunAt(cron: string, from: Date = new Date()): Date {
  return cronParser.parseExpression(cron, { currentDate: from }).next().toDate();
}

export function startSchedule(options: ScheduleOptions): ScheduleHandle {
  const { cron, job, logger } = options;
  let timer: NodeJS.Timeout | undefined;
  let planned: Date | undefined;
  let running = false;
  let stopped = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn({ cron }, "Previous run still active, skipping scheduled run");
      return;
    }
    running = true;
    try {
      await job();
    } catch (err) {
      logger.error({ err: errorMessage(err) }, "Scheduled run failed");
    } finally {
      running = false;
    }
  };

  const wait = (fireAt: Date): void => {
    if (stopped) return;
    const delay = Math.max(0, fireAt.getTime() - Date.now());
    timer = setTimeout(() => {
      if (Date.now() < fireAt.getTime()) {
        wait(fireAt);
        return;
      }
      // Re-arm first so a long run does not delay the following tick.
      arm();
      void tick();
    }, Math.min(delay, MAX_TIMER_DELAY_MS));
  };

  const arm = (): void => {
    if (stopped) return;
    planned = nextRunAt(cron);
    logger.info({ cron, nextRun: planned.toISOString() }, "Next export scheduled");
    wait(planned);
  };

  arm();

  return {
    stop() {
      stopped = true;
      planned = undefined;
      if (timer) clearTimeout(timer);
    },
    nextRun() {
      return planned;
    },
  };
}
