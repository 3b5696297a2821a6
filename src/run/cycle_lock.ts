/**
 * Runs one batch stage under the singleton cycle lock.
 */

import { toError } from '@/core/errors';
import { acquireRunLock, releaseRunLock, type CycleStage } from '@/data/repositories/run_lock_repo';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('cycle_lock');

export class CycleLockedError extends Error {
  constructor(public readonly stage: CycleStage, public readonly cycleDate: string) {
    super(`Another stage holds the cycle lock; refusing to run ${stage} for ${cycleDate}`);
    this.name = 'CycleLockedError';
  }
}

/**
 * Acquire the lock, run `fn`, release. On failure the lock is released as
 * failed with the error message and the error is rethrown.
 */
export async function withCycleLock<T>(
  stage: CycleStage,
  cycleDate: string,
  fn: () => T | Promise<T>,
  startedBy: string = 'cli'
): Promise<T> {
  if (!acquireRunLock({ stage, cycleDate, startedBy })) {
    throw new CycleLockedError(stage, cycleDate);
  }

  try {
    const result = await fn();
    releaseRunLock();
    return result;
  } catch (error) {
    const err = toError(error);
    logger.error({ stage, cycleDate, error: err.message, name: err.name }, 'Cycle stage failed');
    releaseRunLock(err.message);
    throw err;
  }
}
