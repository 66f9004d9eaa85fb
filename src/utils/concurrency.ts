/**
 * Concurrency control utilities
 */

/**
 * Largest delay setTimeout and setInterval honour; Node fires anything longer after 1ms
 */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Sleep for specified milliseconds. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential backoff delay for a zero-based attempt number, capped at MAX_TIMER_MS
 */
export function backoffDelay(baseMs: number, attempt: number): number {
  return Math.min(baseMs * Math.pow(2, attempt), MAX_TIMER_MS);
}

export interface Deadline {
  signal: AbortSignal;
  clear(): void;
}

/**
 * Start a wall-clock deadline. The signal aborts once `ms` have elapsed.
 */
export function startDeadline(ms: number): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error('deadline reached')), ms);

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  };
}
