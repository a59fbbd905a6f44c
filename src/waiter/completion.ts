import { setTimeout as delay } from 'timers/promises';
import type { DetectionEnvelope, TaskStatusProvider } from '../types.js';
import { TaskFailedError, WaitCancelledError, WaitTimeoutError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { noopLogger } from '../logging/logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WaitOptions {
  maxWaitMs: number;
  pollIntervalMs: number;
  /** Stop on a `failed` status instead of waiting it out. */
  failFast?: boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
}

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Polls the provider every `pollIntervalMs` until the task completes.
 * The first poll happens after one interval; elapsed time is counted in
 * intervals, and the last sleep is shortened so no poll lands past
 * `maxWaitMs`. `WaitTimeoutError` follows the poll at the deadline. A provider that returns null counts as not done.
 */
export async function waitForCompletion(
  taskId: string,
  provider: TaskStatusProvider,
  options: WaitOptions
): Promise<DetectionEnvelope> {
  const { maxWaitMs, signal } = options;
  const interval = Math.max(1, options.pollIntervalMs);
  const sleep = options.sleep ?? defaultSleep;
  const failFast = options.failFast ?? true;
  const logger = options.logger ?? noopLogger;

  let waited = 0;
  while (waited < maxWaitMs) {
    if (signal?.aborted) throw new WaitCancelledError(taskId);
    const step = Math.min(interval, maxWaitMs - waited);
    try {
      await sleep(step, signal);
    } catch (err) {
      if (signal?.aborted) throw new WaitCancelledError(taskId);
      throw err;
    }
    if (signal?.aborted) throw new WaitCancelledError(taskId);
    waited += step;

    const task = await provider.getTaskStatus(taskId);
    logger.debug('polled task status', { taskId, status: task?.status ?? 'not-found', waited });

    if (task?.status === 'completed') {
      return task.result ?? { detectionResults: null, filePath: '' };
    }
    if (task?.status === 'failed' && failFast) {
      throw new TaskFailedError(taskId);
    }
  }

  throw new WaitTimeoutError(taskId, waited);
}
