import { setTimeout as sleep } from 'node:timers/promises';

/** Resolves `false` instead of waiting out the timer when the signal aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const delay: Sleeper = async (ms, signal) => {
  if (signal?.aborted) {
    return false;
  }
  if (ms <= 0) {
    return true;
  }
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
};
