import { setTimeout as delay } from 'timers/promises';

/**
 * Waits `ms` milliseconds. Resolves `true` when the full delay elapsed and
 * `false` as soon as `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  if (ms <= 0) {
    return true;
  }

  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}
