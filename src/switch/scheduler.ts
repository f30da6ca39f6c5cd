/**
 * Switch Module - Scheduler
 *
 * Single-shot callbacks at an absolute time. The switch only talks to this
 * interface, so tests and hosts can drive time themselves.
 */

/**
 * Cancels a scheduled callback. Safe to call more than once, and after
 * the callback has fired.
 */
export type CancelHandle = () => void;

export interface Scheduler {
  /** Current time in epoch ms */
  now(): number;
  /**
   * Run `callback` once at `at` (epoch ms), or as soon as possible if past.
   * May run early; the callback must re-check the time.
   */
  scheduleAt(at: number, callback: () => void): CancelHandle;
}

/** Longest delay setTimeout honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Scheduler backed by the process clock and setTimeout.
 *
 * A deadline beyond MAX_TIMER_DELAY_MS fires early, at the cap. Callers
 * check `now()` against their deadline and schedule again.
 */
export function createTimerScheduler(): Scheduler {
  return {
    now: () => Date.now(),
    scheduleAt: (at, callback) => {
      const delay = Math.min(Math.max(0, at - Date.now()), MAX_TIMER_DELAY_MS);
      let timer: ReturnType<typeof setTimeout> | null = setTimeout(() => {
        timer = null;
        callback();
      }, delay);

      return () => {
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
      };
    },
  };
}
