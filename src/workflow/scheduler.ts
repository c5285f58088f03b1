/**
 * Scheduler: runs the daily workflow on a cron expression.
 * Started by `trendscribe schedule`.
 */

import cron from 'node-cron';
import { errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';

export interface ScheduleHandle {
  stop(): void;
}

/**
 * Schedule `job` on `cronExpr`. Returns null when the expression is invalid.
 * A failing or overlapping run is logged; the schedule keeps going.
 */
export function startDailySchedule(
  cronExpr: string,
  job: () => Promise<unknown>,
  logger: Logger,
): ScheduleHandle | null {
  if (!cron.validate(cronExpr)) {
    logger.warn({ cron: cronExpr }, 'Invalid daily_cron expression, scheduler not started');
    return null;
  }

  let running = false;

  const task = cron.schedule(cronExpr, () => {
    if (running) {
      logger.warn({ cron: cronExpr }, 'Previous scheduled run still in progress, skipping');
      return;
    }
    running = true;
    logger.info('Scheduled run starting');
    job()
      .then(() => logger.info('Scheduled run finished'))
      .catch((err: unknown) => logger.error({ err: errorMessage(err) }, 'Scheduled run failed'))
      .finally(() => {
        running = false;
      });
  });

  logger.info({ cron: cronExpr }, 'Scheduler started');

  return {
    stop() {
      task.stop();
      logger.info('Scheduler stopped');
    },
  };
}
