/**
 * Abstraction for timer operations.
 * The downloader arms its idle watchdog through this.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/**
 * Promise-based delay used for retry backoff.
 * Settles early (rejecting) when the signal aborts.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;
