/**
 * Injectable time source.
 *
 * Every timer in the speech queue, activity detector and capture controller
 * goes through a Clock so tests can drive time by hand.
 */

// ============================================================================
// INTERFACES
// ============================================================================

/** A pending callback returned by Clock.schedule */
export interface ScheduledTask {
  cancel(): void;
}

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
  /** Run `callback` once after `delayMs`. Negative delays run as soon as possible. */
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/** Wall clock backed by Date.now and setTimeout */
export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, Math.max(0, delayMs));
    return { cancel: () => clearTimeout(timer) };
  },
};

/**
 * Resolve after `delayMs` on the given clock, or early when `signal` aborts.
 *
 * @param clock - Time source
 * @param delayMs - Delay in milliseconds
 * @param signal - Optional abort signal that ends the wait early
 */
export function sleep(clock: Clock, delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      task.cancel();
      resolve();
    };
    const task = clock.schedule(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
