import { setTimeout as delay } from 'timers/promises';
import { describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollOptions {
  intervalMs: number;
  signal?: AbortSignal;
  /** Errors for which this returns true end the loop and are rethrown. */
  shouldStop?: (error: unknown) => boolean;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Runs `task` every `intervalMs` until `signal` aborts. Returns how many
 * iterations ran.
 */
export async function pollEvery(
  task: (iteration: number) => Promise<void>,
  options: PollOptions
): Promise<number> {
  const { intervalMs, signal, shouldStop = () => false, sleep = defaultSleep } = options;
  let iteration = 0;

  while (!signal?.aborted) {
    iteration++;
    try {
      await task(iteration);
    } catch (error) {
      if (shouldStop(error)) throw error;
      logger.error(`Check #${iteration} failed: ${describeError(error)}`);
    }

    if (signal?.aborted) break;
    try {
      await sleep(intervalMs, signal);
    } catch (error) {
      if (signal?.aborted) break;
      throw error;
    }
  }

  return iteration;
}
