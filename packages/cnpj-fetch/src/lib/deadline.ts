import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";

/**
 * An abort signal that fires after `timeoutMs` of inactivity or when a
 * parent signal aborts, whichever comes first.
 */
export interface Deadline {
  readonly signal: AbortSignal;
  /** Restart the countdown (e.g. after a body chunk arrives) */
  touch(): void;
  /** True once the countdown ran out */
  expired(): boolean;
  /** True when the parent signal aborted before the countdown ran out */
  cancelled(): boolean;
  /** Stop the countdown and detach from the parent */
  dispose(): void;
}

export interface DeadlineOptions {
  parent?: AbortSignal;
  timers?: TimerService;
}

export function createDeadline(timeoutMs: number, options: DeadlineOptions = {}): Deadline {
  const { parent, timers = realTimerService } = options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let didExpire = false;
  let disposed = false;

  const onParentAbort = () => {
    if (timer) timers.clearTimeout(timer);
    controller.abort(parent?.reason);
  };

  function arm(): void {
    if (timer) timers.clearTimeout(timer);
    timer = timers.setTimeout(() => {
      didExpire = true;
      controller.abort(new Error(`No activity for ${timeoutMs}ms`));
    }, timeoutMs);
  }

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
    arm();
  }

  return {
    signal: controller.signal,
    touch() {
      if (!disposed && !controller.signal.aborted) arm();
    },
    expired: () => didExpire,
    cancelled: () => !didExpire && parent?.aborted === true,
    dispose() {
      disposed = true;
      if (timer) timers.clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
