import type { TimerService, DelayFn } from "../ports/timer.js";
import { cancelled } from "../errors/catalog.js";

/**
 * Real timer service using global setTimeout/clearTimeout.
 */
export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Real delay function using setTimeout.
 * Rejects with CANCELLED as soon as the signal aborts.
 */
export const realDelay: DelayFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }

    const onAbort = () => {
      globalThis.clearTimeout(timer);
      reject(cancelled());
    };

    const timer = globalThis.setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
