import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Waits `ms` milliseconds, resolving early when `signal` aborts.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }
  try {
    await sleep(ms, undefined, { signal });
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      return;
    }
    throw error;
  }
}
