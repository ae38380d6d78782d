/**
 * Abstraction for process signal handling.
 * Lets the fetch command cancel a run without touching real signals in tests.
 */
export interface SignalHandler {
  /** Register a callback for SIGINT/SIGTERM */
  onShutdown(callback: (signal: NodeJS.Signals) => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
