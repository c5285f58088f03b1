import type { Config } from './config.js';
import { generateId } from './utils.js';
import { logger as defaultLogger, type Logger } from './logger.js';

export type Clock = () => Date;

/**
 * Everything a run needs that would otherwise be process-wide state.
 * Passed explicitly to the workflow and the repositories.
 */
export interface RunContext {
  runId: string;
  config: Config;
  logger: Logger;
  clock: Clock;
}

export function createRunContext(
  config: Config,
  opts: { logger?: Logger; clock?: Clock; runId?: string } = {},
): RunContext {
  const runId = opts.runId ?? generateId(10);
  return {
    runId,
    config,
    logger: (opts.logger ?? defaultLogger).child({ run_id: runId }),
    clock: opts.clock ?? (() => new Date()),
  };
}
